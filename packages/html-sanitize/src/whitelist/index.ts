import type { RuleIndex } from "../types.js";
import { RuleIndexBuilder } from "./builder.js";
import { parseWhitelist } from "./parser.js";

/** Compile whitelist strings, in order, into one read-only index */
export function compileWhitelist(...whitelists: readonly string[]): RuleIndex {
  const builder = new RuleIndexBuilder();
  for (const whitelist of whitelists) {
    parseWhitelist(whitelist, builder);
  }
  return builder.build();
}

export { RuleIndexBuilder } from "./builder.js";
export { parseWhitelist } from "./parser.js";
export { compilePattern, hasPattern } from "./pattern.js";
export { isEmptyIndex, ruleForAttribute, ruleForElement } from "./rule-index.js";
