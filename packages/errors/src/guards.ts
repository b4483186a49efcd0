/**
 * Type guards for the base error types.
 */

import { InternalError } from "./bases/internal-error.js";
import { ValidationError } from "./bases/validation-error.js";

/** Check if an error is a ValidationError (bad input, config) */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/** Check if an error is an InternalError (bug, broken contract) */
export function isInternalError(error: unknown): error is InternalError {
  return error instanceof InternalError;
}
