import type { AttributeRule, ElementRule, RuleIndex } from "../types.js";

/**
 * Accumulates element rules across one or more whitelist strings.
 * `build()` snapshots the state into an immutable RuleIndex; the builder
 * itself is never consulted while sanitizing.
 */
export class RuleIndexBuilder {
  private readonly elements = new Map<string, ElementRule>();
  private readonly elementPatterns: ElementRule[] = [];
  private globalAttributes: ReadonlyMap<string, AttributeRule> | undefined;

  /** Attributes every element declared from now on starts with */
  get inheritedAttributes(): ReadonlyMap<string, AttributeRule> | undefined {
    return this.globalAttributes;
  }

  /**
   * Store a copy of the given attributes as the global baseline.
   * Only the first non-empty capture takes effect.
   */
  captureGlobalAttributes(attributes: ReadonlyMap<string, AttributeRule>): boolean {
    if (this.globalAttributes !== undefined && this.globalAttributes.size > 0) {
      return false;
    }
    this.globalAttributes = new Map(attributes);
    return true;
  }

  /**
   * Register a rule under its output name (if any) and under its own name,
   * as an exact entry or, for wildcard names, at the end of the pattern list.
   * A later exact registration replaces an earlier one.
   */
  addElement(rule: ElementRule): void {
    if (rule.outputName !== undefined) {
      this.elements.set(rule.outputName, rule);
    }
    if (rule.pattern !== undefined) {
      this.elementPatterns.push(rule);
    } else {
      this.elements.set(rule.name, rule);
    }
  }

  build(): RuleIndex {
    return Object.freeze({
      elements: new Map(this.elements),
      elementPatterns: Object.freeze([...this.elementPatterns]),
      globalAttributes: this.globalAttributes,
    });
  }
}
