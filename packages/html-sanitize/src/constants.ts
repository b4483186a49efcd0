/** rel value applied to links that open in a new browsing context (reverse tabnabbing) */
export const DEFAULT_LINK_REL_VALUE = "noopener noreferrer";

/** Elements whose content is dropped along with them when they fail the whitelist */
export const CONTENT_DROPPING_ELEMENTS: ReadonlySet<string> = new Set(["script", "style"]);

/** Attributes whose values are checked for executable URI schemes */
export const URI_ATTRIBUTES: readonly string[] = ["src", "href", "data"];

/** Scheme prefixes that execute or render script when followed */
export const DANGEROUS_URI_SCHEMES: readonly string[] = ["javascript:", "data:text/html;"];

/** Placeholder content for empty elements declared with `#` */
export const EMPTY_PADDING = "\u00a0";

/** Pseudo element whose attributes every later element inherits */
export const GLOBAL_ELEMENT_NAME = "@";

export const LOG_TAG = "html-sanitize";
