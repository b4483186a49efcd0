/**
 * Parser for the `valid_elements` whitelist syntax:
 *
 *   [#|-|+]name[/outputName][[attr|attr|...]]
 *
 * where each attr is `[!|-]name[(=|:|<)value]`. Clauses that do not fit the
 * grammar are skipped without registering anything.
 */

import { GLOBAL_ELEMENT_NAME } from "../constants.js";
import type { AttributeRule, ElementRule } from "../types.js";
import type { RuleIndexBuilder } from "./builder.js";
import { compilePattern, hasPattern } from "./pattern.js";

const ELEMENT_CLAUSE_PATTERN = /^([#+-])?([^[/]+)(?:\/([^[]+))?(?:\[([^\]]+)\])?$/;
const ATTRIBUTE_CLAUSE_PATTERN = /^([!-])?(\w+::\w+|[^=:<]+)?(?:([=:<])(.*))?$/;

type ParsedAttribute =
  | { readonly kind: "denied"; readonly name: string }
  | { readonly kind: "allowed"; readonly rule: AttributeRule };

function parseAttribute(token: string): ParsedAttribute | undefined {
  const match = ATTRIBUTE_CLAUSE_PATTERN.exec(token);
  if (match === null) return undefined;

  const modifier: string | undefined = match[1];
  const rawName: string | undefined = match[2];
  const relation: string | undefined = match[3];
  const value: string = match[4] ?? "";

  const name = rawName?.trim().replace("::", ":");
  if (name === undefined || name === "") return undefined;

  if (modifier === "-") {
    return { kind: "denied", name };
  }

  const rule: AttributeRule = Object.freeze({
    name,
    required: modifier === "!",
    ...(relation === "=" ? { defaultValue: value } : {}),
    ...(relation === ":" ? { forcedValue: value } : {}),
    ...(relation === "<" ? { validValues: new Set(value.split("?")) } : {}),
    ...(hasPattern(name) ? { pattern: compilePattern(name) } : {}),
  });
  return { kind: "allowed", rule };
}

function parseElement(clause: string, builder: RuleIndexBuilder): void {
  const match = ELEMENT_CLAUSE_PATTERN.exec(clause);
  if (match === null) return;

  const prefix: string | undefined = match[1];
  const name = (match[2] ?? "").trim();
  const outputName = match[3]?.trim();
  const attributeData: string | undefined = match[4];
  if (name === "") return;

  const attributes = new Map<string, AttributeRule>(builder.inheritedAttributes ?? []);
  const attributePatterns: AttributeRule[] = [];
  const requiredAttributeNames = new Set<string>();
  const defaultAttributeValues = new Map<string, string>();
  const forcedAttributeValues = new Map<string, string>();

  for (const token of attributeData?.split("|") ?? []) {
    const parsed = parseAttribute(token.trim());
    if (parsed === undefined) continue;

    if (parsed.kind === "denied") {
      attributes.delete(parsed.name);
      continue;
    }

    const { rule } = parsed;
    if (rule.required) requiredAttributeNames.add(rule.name);

    // Defaults and forced values need a concrete attribute name to write
    if (rule.pattern !== undefined) {
      attributePatterns.push(rule);
      continue;
    }
    if (rule.defaultValue !== undefined) defaultAttributeValues.set(rule.name, rule.defaultValue);
    if (rule.forcedValue !== undefined) forcedAttributeValues.set(rule.name, rule.forcedValue);
    attributes.set(rule.name, rule);
  }

  if (name === GLOBAL_ELEMENT_NAME) {
    builder.captureGlobalAttributes(attributes);
    return;
  }

  const elementRule: ElementRule = Object.freeze({
    name,
    padEmptyContent: prefix === "#",
    removeIfEmpty: prefix === "-",
    attributes,
    attributePatterns: Object.freeze(attributePatterns),
    requiredAttributeNames,
    defaultAttributeValues,
    forcedAttributeValues,
    ...(outputName ? { outputName } : {}),
    ...(hasPattern(name) ? { pattern: compilePattern(name) } : {}),
  });
  builder.addElement(elementRule);
}

/**
 * Parse a comma separated whitelist into the builder. Rules are registered
 * in declaration order; each element starts from the global attributes
 * captured so far.
 */
export function parseWhitelist(whitelist: string, builder: RuleIndexBuilder): void {
  for (const clause of whitelist.split(",")) {
    const trimmed = clause.trim();
    if (trimmed === "") continue;
    parseElement(trimmed, builder);
  }
}
