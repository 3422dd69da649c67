/**
 * Type guards for the base error types + code-level discrimination.
 */

import type { DevinfoError } from "./base.js";
import { ConflictError } from "./bases/conflict-error.js";
import { ExternalError } from "./bases/external-error.js";
import { InternalError } from "./bases/internal-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ErrorCode } from "./catalog.js";

/** Check if an error is a ValidationError (bad input, config) */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/** Check if an error is a NotFoundError (resource missing) */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

/** Check if an error is a ConflictError (state conflict) */
export function isConflictError(error: unknown): error is ConflictError {
  return error instanceof ConflictError;
}

/** Check if an error is an ExternalError (collaborator failure) */
export function isExternalError(error: unknown): error is ExternalError {
  return error instanceof ExternalError;
}

/** Check if an error is an InternalError (bug/broken invariant) */
export function isInternalError(error: unknown): error is InternalError {
  return error instanceof InternalError;
}

/**
 * Check if a DevinfoError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: DevinfoError,
  code: C,
): error is DevinfoError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error represents an expected condition (4xx-class).
 * Returns false for non-DevinfoError values.
 */
export function isExpectedError(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === "object" &&
    "isExpected" in error &&
    error.isExpected === true
  );
}
