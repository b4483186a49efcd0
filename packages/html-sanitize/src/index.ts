export const PACKAGE_NAME = "@richtext/html-sanitize" as const;

// Constants
export {
  CONTENT_DROPPING_ELEMENTS,
  DANGEROUS_URI_SCHEMES,
  DEFAULT_LINK_REL_VALUE,
  URI_ATTRIBUTES,
} from "./constants.js";

// Configuration
export { HtmlSanitizerConfigSchema, resolveSanitizerConfig } from "./config.js";

// Whitelist
export {
  compilePattern,
  compileWhitelist,
  hasPattern,
  parseWhitelist,
  RuleIndexBuilder,
  ruleForAttribute,
  ruleForElement,
} from "./whitelist/index.js";

// Core
export { sanitizeHtml } from "./html.js";
export { applyLinkRelPolicy } from "./link-rel.js";
export { HtmlSanitizer } from "./sanitizer.js";
export { DANGEROUS_URI_PATTERN, isDangerousUri } from "./uri.js";
export { attributePasses, elementPasses } from "./validation.js";

// Types
export type {
  AttributeRule,
  CompiledPattern,
  ElementRule,
  HtmlSanitizerConfig,
  ResolvedHtmlSanitizerConfig,
  RuleIndex,
} from "./types.js";
