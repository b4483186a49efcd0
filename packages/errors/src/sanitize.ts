/**
 * Errors raised by @richtext/html-sanitize
 */

import { InternalError } from "./bases/internal-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ValidationIssue } from "./types.js";

/**
 * Thrown when a sanitizer is constructed from configuration that fails its schema
 */
export class SanitizeConfigurationError extends ValidationError<"SANITIZE_CONFIGURATION_INVALID"> {
  constructor(
    message: string,
    issues: readonly ValidationIssue[] = [],
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    super({
      code: "SANITIZE_CONFIGURATION_INVALID",
      message,
      metadata,
      traceId,
      issues,
    });
  }
}

/**
 * Thrown when the document handed to the sanitizer breaks the DOM contract,
 * e.g. an element that must be unwrapped has no parent
 */
export class SanitizeDocumentError extends InternalError<"SANITIZE_DOCUMENT_INVALID"> {
  readonly tagName: string;

  constructor(tagName: string, reason: string, metadata?: Record<string, string>, traceId?: string) {
    super({
      code: "SANITIZE_DOCUMENT_INVALID",
      message: `Cannot sanitize <${tagName}>: ${reason}`,
      metadata: { ...metadata, tagName },
      traceId,
    });
    this.tagName = tagName;
  }
}
