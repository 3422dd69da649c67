/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the devinfo workspace. Each code maps to an
 * HTTP status, a gRPC canonical code and one of the behavioral base types.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: INTERNAL, RESOURCE, VALIDATION, REPORT, LOCK, DEVICE
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "NotFoundError"
  | "ConflictError"
  | "ExternalError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    grpcCode: "INTERNAL",
    baseType: "InternalError",
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },
  INTERNAL_UNAVAILABLE: {
    domain: "internal",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE",
    baseType: "ExternalError",
    isExpected: false,
    title: "Service unavailable",
    description: "A collaborator is temporarily unavailable",
  },

  // ============================================================================
  // RESOURCE ERRORS - Generic resource operations
  // ============================================================================
  RESOURCE_NOT_FOUND: {
    domain: "resource",
    httpStatus: 404,
    grpcCode: "NOT_FOUND",
    baseType: "NotFoundError",
    isExpected: true,
    title: "Resource not found",
    description: "The requested resource does not exist",
  },
  RESOURCE_CONFLICT: {
    domain: "resource",
    httpStatus: 409,
    grpcCode: "ALREADY_EXISTS",
    baseType: "ConflictError",
    isExpected: true,
    title: "Resource conflict",
    description: "The operation conflicts with the current resource state",
  },

  // ============================================================================
  // VALIDATION ERRORS - Input validation
  // ============================================================================
  VALIDATION_FAILED: {
    domain: "validation",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT",
    baseType: "ValidationError",
    isExpected: true,
    title: "Validation failed",
    description: "The input failed validation",
  },

  // ============================================================================
  // REPORT ERRORS - Diagnostic report registration and reads
  // ============================================================================
  REPORT_CONFIGURATION_INVALID: {
    domain: "report",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT",
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid diagnostics configuration",
    description: "The diagnostics configuration failed validation",
  },
  REPORT_READ_RANGE_INVALID: {
    domain: "report",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT",
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid read range",
    description: "Read offset and length must be non-negative safe integers",
  },
  REPORT_NOT_FOUND: {
    domain: "report",
    httpStatus: 404,
    grpcCode: "NOT_FOUND",
    baseType: "NotFoundError",
    isExpected: true,
    title: "Report not found",
    description: "No report with this name is registered for the device",
  },
  REPORT_NAME_DUPLICATE: {
    domain: "report",
    httpStatus: 409,
    grpcCode: "ALREADY_EXISTS",
    baseType: "ConflictError",
    isExpected: true,
    title: "Duplicate report name",
    description: "A report with this name already exists for the device",
  },
  REPORT_NAMESPACE_CREATE_FAILED: {
    domain: "report",
    httpStatus: 502,
    grpcCode: "UNAVAILABLE",
    baseType: "ExternalError",
    isExpected: false,
    title: "Report namespace creation failed",
    description: "The host could not create the device diagnostics directory",
  },
  REPORT_REGISTRATION_FAILED: {
    domain: "report",
    httpStatus: 502,
    grpcCode: "UNAVAILABLE",
    baseType: "ExternalError",
    isExpected: false,
    title: "Report registration failed",
    description: "The host could not create a report entry; registration was rolled back",
  },

  // ============================================================================
  // LOCK ERRORS - State snapshot lock
  // ============================================================================
  LOCK_DEADLOCK_DETECTED: {
    domain: "lock",
    httpStatus: 500,
    grpcCode: "ABORTED",
    baseType: "InternalError",
    isExpected: false,
    title: "State lock deadlock",
    description: "The state lock could not be acquired within the spin ceiling",
  },

  // ============================================================================
  // DEVICE ERRORS - Device snapshot loading
  // ============================================================================
  DEVICE_SNAPSHOT_INVALID: {
    domain: "device",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT",
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid device snapshot",
    description: "The device snapshot document failed schema validation",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * gRPC canonical status codes used in the catalog
 */
export type GrpcStatusCode = ErrorCatalogEntry["grpcCode"];

/**
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
