import { DANGEROUS_URI_SCHEMES, URI_ATTRIBUTES } from "./constants.js";

function escapeRegExp(char: string): string {
  return char.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

/** `javascript:` becomes `j\s*a\s*v…\s*:` so whitespace smuggled between characters still matches */
function spacedScheme(scheme: string): string {
  return [...scheme].map(escapeRegExp).join("\\s*");
}

/**
 * Matches a value that starts, after optional whitespace, with one of the
 * dangerous schemes, with any whitespace between its characters.
 */
export const DANGEROUS_URI_PATTERN = new RegExp(
  `^\\s*(?:${DANGEROUS_URI_SCHEMES.map(spacedScheme).join("|")})`,
  "i",
);

export function isDangerousUri(value: string): boolean {
  return DANGEROUS_URI_PATTERN.test(value);
}

/** Remove src, href and data attributes that point at a dangerous scheme */
export function stripDangerousUris(element: Element): void {
  for (const name of URI_ATTRIBUTES) {
    const value = element.getAttribute(name);
    if (value !== null && isDangerousUri(value)) {
      element.removeAttribute(name);
    }
  }
}
