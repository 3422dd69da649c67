// ============================================================================
// @devinfo/reports: paginated diagnostic reports for graphics devices
// ============================================================================

// Built-in reports
export {
  BufsReport,
  ClientsReport,
  GemNamesReport,
  GemObjectsReport,
  getBuiltinReports,
  isX86,
  MemReport,
  mapTypeTag,
  NameReport,
  ObjectsReport,
  pageProtectionFlags,
  QueuesReport,
  VmaReport,
  VmReport,
} from "./generators/index.js";

// Registry & lifecycle
export { DeviceDiagnostics, type DeviceDiagnosticsOptions } from "./diagnostics.js";
export { ReportSession } from "./session.js";

// Read protocol
export { assertReadRange, drainReport, type ReportBounds, readReport, sliceReport } from "./paginate.js";
export { ReportBuffer } from "./report-buffer.js";
export { dec, fixed, flag, hex, left } from "./format.js";

// Configuration
export { DiagnosticsConfigSchema, resolveDiagnosticsConfig } from "./config.js";

// Hosts
export {
  MemoryNamespaceHost,
  type NamespaceEntryType,
  type NamespaceListing,
} from "./host/memory-host.js";

// Types
export type {
  CoreReportName,
  DebugReportName,
  DiagnosticsConfig,
  NamespaceHost,
  ReportChunk,
  ReportContext,
  ReportDescriptor,
  ReportName,
  ReportReader,
  ResolvedDiagnosticsConfig,
} from "./types.js";

// Package metadata
export {
  CORE_REPORT_NAMES,
  DEBUG_REPORT_NAMES,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_PAGE_SIZE,
  PACKAGE_NAME,
  PACKAGE_VERSION,
} from "./constants.js";
