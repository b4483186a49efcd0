/**
 * @richtext/errors
 *
 * Shared error taxonomy for the rich-text packages.
 *
 * Errors are built on two behavioral base types, ValidationError and
 * InternalError. Each carries a `.code` from the catalog that discriminates
 * the specific condition. Use `error.code === "XXX"` for fine-grained
 * matching, or `instanceof BaseType` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isError, isRichTextError, RichTextError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { InternalError, ValidationError } from "./bases/index.js";

// ============================================================================
// TYPE INFRASTRUCTURE
// ============================================================================

export type {
  InternalCodes,
  RichTextErrorOptions,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export { isInternalError, isValidationError } from "./guards.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export { SanitizeConfigurationError, SanitizeDocumentError } from "./sanitize.js";
