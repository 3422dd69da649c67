/**
 * @devinfo/errors
 *
 * Shared error taxonomy for the devinfo workspace.
 *
 * Five behavioral base types (ValidationError, NotFoundError, ConflictError,
 * ExternalError, InternalError) each carry a `.code` from the catalog.
 * Use `error.code === "XXX"` for fine-grained matching, or
 * `instanceof BaseType` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { DevinfoError, type ErrorJSON, isDevinfoError, isError } from "./base.js";

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

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByDomain,
  getErrorMessage,
  isValidErrorCode,
  validateCatalog,
  wrapError,
} from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export {
  ConflictError,
  ExternalError,
  InternalError,
  NotFoundError,
  ValidationError,
} from "./bases/index.js";

// ============================================================================
// TYPE INFRASTRUCTURE
// ============================================================================

export type {
  ConflictCodes,
  DevinfoErrorOptions,
  ExternalCodes,
  InternalCodes,
  NotFoundCodes,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isConflictError,
  isExpectedError,
  isExternalError,
  isInternalError,
  isNotFoundError,
  isValidationError,
} from "./guards.js";

// ============================================================================
// REPORT DOMAIN ERRORS
// ============================================================================

export {
  DeviceSnapshotInvalidError,
  DuplicateReportError,
  ReportConfigurationError,
  ReportNamespaceError,
  ReportNotFoundError,
  ReportReadRangeError,
  ReportRegistrationError,
  StateLockDeadlockError,
} from "./reports.js";
