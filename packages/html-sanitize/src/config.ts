/**
 * Zod schema for sanitizer configuration.
 */

import { SanitizeConfigurationError, type ValidationIssue } from "@richtext/errors";
import { z } from "zod";
import { DEFAULT_LINK_REL_VALUE } from "./constants.js";
import type { ResolvedHtmlSanitizerConfig } from "./types.js";

export const HtmlSanitizerConfigSchema = z
  .object({
    validElements: z.string().optional(),
    extendedValidElements: z.string().optional(),
    linkRelValue: z.string().nullable().optional(),
  })
  .strict();

function toValidationIssue(issue: z.ZodIssue): ValidationIssue {
  return {
    field: issue.path.length > 0 ? issue.path.join(".") : "config",
    message: issue.message,
    code: issue.code,
  };
}

/**
 * Validate raw configuration and fill in defaults.
 * @throws SanitizeConfigurationError when the input does not match the schema
 */
export function resolveSanitizerConfig(config: unknown = {}): ResolvedHtmlSanitizerConfig {
  const result = HtmlSanitizerConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map(toValidationIssue);
    throw new SanitizeConfigurationError(
      `Invalid sanitizer configuration: ${issues.map((i) => `${i.field}: ${i.message}`).join("; ")}`,
      issues,
    );
  }

  const { validElements, extendedValidElements, linkRelValue } = result.data;
  return {
    validElements: validElements ?? "",
    extendedValidElements: extendedValidElements ?? "",
    linkRelValue: linkRelValue === undefined ? DEFAULT_LINK_REL_VALUE : linkRelValue,
  };
}
