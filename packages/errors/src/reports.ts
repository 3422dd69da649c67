import { ConflictError } from "./bases/conflict-error.js";
import { ExternalError } from "./bases/external-error.js";
import { InternalError } from "./bases/internal-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ValidationIssue } from "./types.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * Thrown when the diagnostics configuration fails schema validation.
 */
export class ReportConfigurationError extends ValidationError<"REPORT_CONFIGURATION_INVALID"> {
  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super({
      code: "REPORT_CONFIGURATION_INVALID",
      message: `Invalid diagnostics configuration: ${message}`,
      issues,
    });
  }
}

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

/**
 * Thrown when a read is requested with a negative, fractional or unsafe
 * offset or length.
 */
export class ReportReadRangeError extends ValidationError<"REPORT_READ_RANGE_INVALID"> {
  readonly offset: number;
  readonly length: number;

  constructor(offset: number, length: number) {
    super({
      code: "REPORT_READ_RANGE_INVALID",
      message: `Invalid read range: offset=${offset}, length=${length}`,
      metadata: { offset: String(offset), length: String(length) },
    });
    this.offset = offset;
    this.length = length;
  }
}

/**
 * Thrown when a read targets a report name the device never registered.
 */
export class ReportNotFoundError extends NotFoundError<"REPORT_NOT_FOUND"> {
  readonly reportName: string;

  constructor(reportName: string, deviceIndex: number) {
    super({
      code: "REPORT_NOT_FOUND",
      message: `Report '${reportName}' is not registered for device ${deviceIndex}`,
      metadata: { reportName, deviceIndex: String(deviceIndex) },
    });
    this.reportName = reportName;
  }
}

/**
 * Thrown when two descriptors share a name within one device instance.
 */
export class DuplicateReportError extends ConflictError<"REPORT_NAME_DUPLICATE"> {
  readonly reportName: string;

  constructor(reportName: string) {
    super({
      code: "REPORT_NAME_DUPLICATE",
      message: `Report '${reportName}' is already defined`,
      metadata: { reportName },
    });
    this.reportName = reportName;
  }
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

/**
 * Thrown when the host cannot create the per-device diagnostics directory.
 * Nothing has been registered when this is raised.
 */
export class ReportNamespaceError extends ExternalError<"REPORT_NAMESPACE_CREATE_FAILED"> {
  readonly path: string;

  constructor(path: string, cause?: Error) {
    super({
      code: "REPORT_NAMESPACE_CREATE_FAILED",
      message: `Cannot create ${path}`,
      metadata: { path },
      cause,
    });
    this.path = path;
  }
}

/**
 * Thrown when the host cannot create one report entry. Every entry
 * registered before it has been removed again, along with the directory.
 */
export class ReportRegistrationError extends ExternalError<"REPORT_REGISTRATION_FAILED"> {
  readonly path: string;
  readonly reportName: string;
  readonly rolledBack: readonly string[];

  constructor(path: string, reportName: string, rolledBack: readonly string[], cause?: Error) {
    super({
      code: "REPORT_REGISTRATION_FAILED",
      message: `Cannot create ${path}/${reportName}`,
      metadata: { path, reportName, rolledBack: rolledBack.join(",") },
      cause,
    });
    this.path = path;
    this.reportName = reportName;
    this.rolledBack = rolledBack;
  }
}

// ---------------------------------------------------------------------------
// State lock
// ---------------------------------------------------------------------------

/**
 * Thrown when the state lock stays held past the spin ceiling, typically
 * because a holder crashed or a generation re-entered the lock.
 */
export class StateLockDeadlockError extends InternalError<"LOCK_DEADLOCK_DETECTED"> {
  readonly iterations: number;

  constructor(iterations: number) {
    super({
      code: "LOCK_DEADLOCK_DETECTED",
      message: `State lock deadlock detected: not acquired after ${iterations} iterations`,
      metadata: { iterations: String(iterations) },
    });
    this.iterations = iterations;
  }
}

// ---------------------------------------------------------------------------
// Device snapshots
// ---------------------------------------------------------------------------

/**
 * Thrown when a device snapshot document does not match the schema.
 */
export class DeviceSnapshotInvalidError extends ValidationError<"DEVICE_SNAPSHOT_INVALID"> {
  constructor(source: string, issues: readonly ValidationIssue[]) {
    super({
      code: "DEVICE_SNAPSHOT_INVALID",
      message: `Invalid device snapshot ${source}: ${issues.map((i) => `${i.field}: ${i.message}`).join("; ")}`,
      issues,
    });
  }
}
