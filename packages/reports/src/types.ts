import type { GraphicsDevice } from "@devinfo/device";
import type { CORE_REPORT_NAMES, DEBUG_REPORT_NAMES } from "./constants.js";
import type { ReportBuffer } from "./report-buffer.js";

// ---------------------------------------------------------------------------
// Report names
// ---------------------------------------------------------------------------

export type CoreReportName = (typeof CORE_REPORT_NAMES)[number];
export type DebugReportName = (typeof DEBUG_REPORT_NAMES)[number];
export type ReportName = CoreReportName | DebugReportName;

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface DiagnosticsConfig {
  readonly pageSize?: number;
  readonly sizeLimit?: number;
  readonly bufferCapacity?: number;
  readonly maxOrder?: number;
  readonly bufferListWrap?: number;
  readonly debug?: boolean;
  readonly architecture?: string;
}

export interface ResolvedDiagnosticsConfig {
  readonly pageSize: number;
  /** Reads starting past this offset end immediately. */
  readonly sizeLimit: number;
  /** Bytes a single generation may hold. */
  readonly bufferCapacity: number;
  readonly maxOrder: number;
  readonly bufferListWrap: number;
  readonly debug: boolean;
  readonly architecture: string;
}

// ---------------------------------------------------------------------------
// Generation
// ---------------------------------------------------------------------------

export interface ReportContext {
  readonly device: GraphicsDevice;
  readonly config: ResolvedDiagnosticsConfig;
}

/**
 * A named report and the generator that renders it.
 */
export interface ReportDescriptor {
  readonly name: string;
  /** Whether generation runs under the device's state lock. */
  readonly requiresLock: boolean;
  generate(context: ReportContext, out: ReportBuffer): void;
}

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

export interface ReportChunk {
  readonly bytes: Uint8Array;
  /** True when no bytes remain past this chunk. */
  readonly eof: boolean;
}

export interface ReportReader {
  read(offset: number, length: number): ReportChunk;
}

// ---------------------------------------------------------------------------
// Host namespace
// ---------------------------------------------------------------------------

/**
 * Virtual filesystem the diagnostics mount into.
 *
 * `createDirectory` and `createEntry` signal failure by returning
 * `undefined` / `false` or by throwing.
 */
export interface NamespaceHost<D> {
  createDirectory(name: string, parent: D): D | undefined;
  createEntry(name: string, directory: D, reader: ReportReader): boolean;
  removeEntry(name: string, directory: D): void;
  removeDirectory(name: string, parent: D): void;
  pathOf(directory: D): string;
}
