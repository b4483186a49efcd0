/** An anchored, whole-string matcher compiled from a whitelist name token */
export interface CompiledPattern {
  /** The token as written in the whitelist */
  readonly source: string;
  readonly regex: RegExp;
}

/** Permission record for one attribute (or attribute-name pattern) of an element */
export interface AttributeRule {
  readonly name: string;
  readonly required: boolean;
  readonly defaultValue?: string;
  readonly forcedValue?: string;
  /** When present the attribute's value must be one of these */
  readonly validValues?: ReadonlySet<string>;
  /** Present only for rules declared with a wildcard name */
  readonly pattern?: CompiledPattern;
}

/** Permission record for one element (or element-name pattern) */
export interface ElementRule {
  readonly name: string;
  /** `#` prefix: an element left without children gets a non-breaking space */
  readonly padEmptyContent: boolean;
  /** `-` prefix: an element without children fails the whitelist */
  readonly removeIfEmpty: boolean;
  readonly attributes: ReadonlyMap<string, AttributeRule>;
  /** Checked in declaration order after an exact lookup misses */
  readonly attributePatterns: readonly AttributeRule[];
  readonly requiredAttributeNames: ReadonlySet<string>;
  readonly defaultAttributeValues: ReadonlyMap<string, string>;
  readonly forcedAttributeValues: ReadonlyMap<string, string>;
  /**
   * Substitute name from a `name/outputName` declaration. The rule is also
   * registered under this name; elements are never renamed.
   */
  readonly outputName?: string;
  readonly pattern?: CompiledPattern;
}

/** The compiled, read-only whitelist */
export interface RuleIndex {
  readonly elements: ReadonlyMap<string, ElementRule>;
  /** Checked in declaration order after an exact lookup misses */
  readonly elementPatterns: readonly ElementRule[];
  /** Attributes captured from the `@` declaration, if any */
  readonly globalAttributes?: ReadonlyMap<string, AttributeRule>;
}

/** Configuration for HtmlSanitizer */
export interface HtmlSanitizerConfig {
  /** Base whitelist in `valid_elements` syntax */
  readonly validElements?: string;
  /** Added after the base whitelist; replaces base entries with the same exact name */
  readonly extendedValidElements?: string;
  /**
   * rel value for links with a target. `null` disables the policy, `""`
   * strips rel from such links instead.
   */
  readonly linkRelValue?: string | null;
}

/** HtmlSanitizerConfig with defaults applied */
export interface ResolvedHtmlSanitizerConfig {
  readonly validElements: string;
  readonly extendedValidElements: string;
  readonly linkRelValue: string | null;
}
