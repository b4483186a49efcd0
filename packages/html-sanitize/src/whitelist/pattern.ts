import type { CompiledPattern } from "../types.js";

const WILDCARD_PATTERN = /[?+*]/;
const WILDCARD_CHARS = /[?+*]/g;
const REGEX_SPECIAL_CHARS = /[.^$|()[\]{}\\]/g;

/** Whether a whitelist name is a wildcard pattern rather than an exact name */
export function hasPattern(name: string): boolean {
  return WILDCARD_PATTERN.test(name);
}

/**
 * Compile a whitelist name token into an anchored matcher.
 *
 * Each `?`, `+` or `*` stands for "any character" with that quantifier, so
 * `t*` matches `t`, `td` and `thead`, `h?` matches `h` and `h1`, and `a+`
 * needs at least one character after the `a`. Everything else matches
 * literally and case-sensitively.
 */
export function compilePattern(token: string): CompiledPattern {
  const body = token.replace(REGEX_SPECIAL_CHARS, "\\$&").replace(WILDCARD_CHARS, ".$&");
  return Object.freeze({ source: token, regex: new RegExp(`^${body}$`) });
}
