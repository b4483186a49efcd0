import { SanitizeDocumentError } from "@richtext/errors";
import { resolveSanitizerConfig } from "./config.js";
import { CONTENT_DROPPING_ELEMENTS, EMPTY_PADDING, LOG_TAG } from "./constants.js";
import { applyLinkRelPolicy } from "./link-rel.js";
import type { ElementRule, HtmlSanitizerConfig, RuleIndex } from "./types.js";
import { stripDangerousUris } from "./uri.js";
import { attributePasses, elementPasses } from "./validation.js";
import { compileWhitelist, isEmptyIndex, ruleForAttribute, ruleForElement } from "./whitelist/index.js";

interface EmptyCheck {
  readonly element: Element;
  readonly rule: ElementRule;
}

function childElements(parent: ParentNode): Element[] {
  return Array.from(parent.children);
}

function requireParent(element: Element): ParentNode {
  const parent = element.parentNode;
  if (parent === null) {
    throw new SanitizeDocumentError(element.localName, "element has no parent node");
  }
  return parent;
}

/** Replace the element with its own children, returning the child elements now in its place */
function unwrap(element: Element): Element[] {
  const parent = requireParent(element);
  const exposed = childElements(element);
  const fragment = element.ownerDocument.createDocumentFragment();
  while (element.firstChild !== null) {
    fragment.appendChild(element.firstChild);
  }
  parent.replaceChild(fragment, element);
  return exposed;
}

function remove(element: Element): void {
  requireParent(element).removeChild(element);
}

/** Take a failed element out: script and style go with their content, anything else is unwrapped */
function strip(element: Element): Element[] {
  if (CONTENT_DROPPING_ELEMENTS.has(element.localName)) {
    remove(element);
    return [];
  }
  return unwrap(element);
}

/**
 * Strips a DOM document down to a `valid_elements` whitelist.
 *
 * The whitelist is compiled once, from the base and then the extended
 * string, and never changes afterwards; one instance can sanitize any
 * number of documents.
 */
export class HtmlSanitizer {
  private readonly index: RuleIndex;
  private readonly linkRelValue: string | null;

  constructor(config?: HtmlSanitizerConfig) {
    const resolved = resolveSanitizerConfig(config);
    this.index = compileWhitelist(resolved.validElements, resolved.extendedValidElements);
    this.linkRelValue = resolved.linkRelValue;

    if (isEmptyIndex(this.index)) {
      console.warn(`[${LOG_TAG}] Whitelist is empty: every element will be unwrapped`);
    }
  }

  get rules(): RuleIndex {
    return this.index;
  }

  /**
   * Sanitize every element under the document body, in place.
   *
   * Elements are visited depth-first in document order from an explicit
   * stack. Children exposed by unwrapping a parent are visited next, in
   * their original order. Empty-element rules are settled bottom-up once
   * the walk is done, since removing descendants can empty an ancestor
   * that was already visited.
   */
  sanitize(document: Document): void {
    const body: HTMLElement | null = document.body;
    if (body === null) return;

    const emptyChecks: EmptyCheck[] = [];
    const stack = childElements(body).reverse();

    for (let element = stack.pop(); element !== undefined; element = stack.pop()) {
      const next = this.visit(element, emptyChecks);
      for (const child of next.reverse()) {
        stack.push(child);
      }
    }

    for (const { element, rule } of emptyChecks.reverse()) {
      if (element.firstChild !== null) continue;
      if (rule.removeIfEmpty) {
        remove(element);
      } else if (rule.padEmptyContent) {
        element.textContent = EMPTY_PADDING;
      }
    }
  }

  /** Process one element and return the child elements to visit next */
  private visit(element: Element, emptyChecks: EmptyCheck[]): Element[] {
    const tagName = element.localName;
    const rule = ruleForElement(this.index, tagName);

    if (!elementPasses(element, rule)) {
      return strip(element);
    }

    this.tidy(element, rule);

    // Filtering can take away the attribute that satisfied a required rule
    if (!elementPasses(element, rule)) {
      return strip(element);
    }

    if (tagName === "a") {
      applyLinkRelPolicy(element, this.linkRelValue);
    }
    if (rule.removeIfEmpty || rule.padEmptyContent) {
      emptyChecks.push({ element, rule });
    }
    return childElements(element);
  }

  private tidy(element: Element, rule: ElementRule): void {
    if (rule.padEmptyContent && element.firstChild === null) {
      element.textContent = EMPTY_PADDING;
    }

    for (const attribute of Array.from(element.attributes)) {
      if (!attributePasses(attribute, ruleForAttribute(rule, attribute.name))) {
        element.removeAttributeNode(attribute);
      }
    }

    for (const [name, value] of rule.defaultAttributeValues) {
      if ((element.getAttribute(name) ?? "") === "") {
        element.setAttribute(name, value);
      }
    }

    for (const [name, value] of rule.forcedAttributeValues) {
      element.setAttribute(name, value);
    }

    stripDangerousUris(element);
  }
}
