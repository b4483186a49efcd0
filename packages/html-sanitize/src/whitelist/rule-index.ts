import type { AttributeRule, ElementRule, RuleIndex } from "../types.js";

/** Exact rule for the tag if there is one, else the first matching pattern rule */
export function ruleForElement(index: RuleIndex, tagName: string): ElementRule | undefined {
  const exact = index.elements.get(tagName);
  if (exact !== undefined) return exact;
  return index.elementPatterns.find((rule) => rule.pattern?.regex.test(tagName) === true);
}

/** Same two-tier lookup, scoped to one element rule's attributes */
export function ruleForAttribute(
  elementRule: ElementRule,
  attributeName: string,
): AttributeRule | undefined {
  const exact = elementRule.attributes.get(attributeName);
  if (exact !== undefined) return exact;
  return elementRule.attributePatterns.find(
    (rule) => rule.pattern?.regex.test(attributeName) === true,
  );
}

export function isEmptyIndex(index: RuleIndex): boolean {
  return index.elements.size === 0 && index.elementPatterns.length === 0;
}
