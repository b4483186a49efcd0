import type { AttributeRule, ElementRule } from "./types.js";

/**
 * Whether an element may stay. It needs a rule, at least one non-empty
 * attribute from the rule's required set (when the set is non-empty), and
 * children if the rule removes empty elements.
 */
export function elementPasses(
  element: Element,
  rule: ElementRule | undefined,
): rule is ElementRule {
  if (rule === undefined) return false;

  if (rule.requiredAttributeNames.size > 0) {
    const hasRequired = [...rule.requiredAttributeNames].some(
      (name) => (element.getAttribute(name) ?? "") !== "",
    );
    if (!hasRequired) return false;
  }

  if (rule.removeIfEmpty && element.firstChild === null) return false;

  return true;
}

/** Whether an attribute may stay: it needs a rule and, if listed, one of the valid values */
export function attributePasses(
  attribute: Pick<Attr, "name" | "value">,
  rule: AttributeRule | undefined,
): rule is AttributeRule {
  if (rule === undefined) return false;
  if (rule.validValues !== undefined && !rule.validValues.has(attribute.value)) return false;
  return true;
}
