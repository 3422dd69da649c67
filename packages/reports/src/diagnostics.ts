import type { GraphicsDevice } from "@devinfo/device";
import {
  DuplicateReportError,
  ReportNamespaceError,
  ReportNotFoundError,
  ReportRegistrationError,
} from "@devinfo/errors";
import { resolveDiagnosticsConfig } from "./config.js";
import { DEFAULT_CHUNK_SIZE } from "./constants.js";
import { getBuiltinReports } from "./generators/index.js";
import { drainReport, readReport } from "./paginate.js";
import { ReportBuffer } from "./report-buffer.js";
import { ReportSession } from "./session.js";
import type {
  DiagnosticsConfig,
  NamespaceHost,
  ReportChunk,
  ReportContext,
  ReportDescriptor,
  ReportReader,
  ResolvedDiagnosticsConfig,
} from "./types.js";

export interface DeviceDiagnosticsOptions {
  readonly config?: DiagnosticsConfig;
  /** Replaces the built-in report set. */
  readonly reports?: readonly ReportDescriptor[];
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

// ---------------------------------------------------------------------------
// DeviceDiagnostics
// ---------------------------------------------------------------------------

/**
 * Diagnostic reports of one device instance, mounted as a directory named
 * after the device index.
 *
 * Lifecycle: `init(parent)` registers every report or none, `teardown`
 * removes them again. Reads re-render the report on every call.
 */
export class DeviceDiagnostics<D> {
  readonly config: ResolvedDiagnosticsConfig;
  private readonly _device: GraphicsDevice;
  private readonly _host: NamespaceHost<D>;
  private readonly _reports: ReadonlyMap<string, ReportDescriptor>;
  private _directory: D | undefined;

  /**
   * @throws {ReportConfigurationError} when `options.config` is invalid
   * @throws {DuplicateReportError} when two reports share a name
   */
  constructor(device: GraphicsDevice, host: NamespaceHost<D>, options: DeviceDiagnosticsOptions = {}) {
    this.config = resolveDiagnosticsConfig(options.config);
    this._device = device;
    this._host = host;

    const reports = new Map<string, ReportDescriptor>();
    for (const report of options.reports ?? getBuiltinReports(this.config)) {
      if (reports.has(report.name)) {
        throw new DuplicateReportError(report.name);
      }
      reports.set(report.name, report);
    }
    this._reports = reports;
  }

  get device(): GraphicsDevice {
    return this._device;
  }

  /** Report names in registration order. */
  get reportNames(): readonly string[] {
    return [...this._reports.keys()];
  }

  get isRegistered(): boolean {
    return this._directory !== undefined;
  }

  get directory(): D | undefined {
    return this._directory;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Creates the device directory under `parent` and one entry per report.
   *
   * If an entry cannot be created, the entries created before it are
   * removed in reverse order along with the directory. A removal that fails
   * is logged and the remaining removals still run.
   *
   * @throws {ReportNamespaceError} when the directory cannot be created
   * @throws {ReportRegistrationError} when an entry cannot be created
   */
  init(parent: D): D {
    if (this._directory !== undefined) {
      return this._directory;
    }

    const directoryName = String(this._device.index);
    const directoryPath = `${this._host.pathOf(parent)}/${directoryName}`;

    let directory: D | undefined;
    let cause: Error | undefined;
    try {
      directory = this._host.createDirectory(directoryName, parent);
    } catch (error) {
      cause = toError(error);
    }
    if (directory === undefined) {
      console.error(
        `[DeviceDiagnostics] Cannot create ${directoryPath}${cause ? `: ${cause.message}` : ""}`,
      );
      throw new ReportNamespaceError(directoryPath, cause);
    }

    const registered: string[] = [];
    for (const name of this._reports.keys()) {
      let created = false;
      let entryCause: Error | undefined;
      try {
        created = this._host.createEntry(name, directory, this.reader(name));
      } catch (error) {
        entryCause = toError(error);
      }

      if (!created) {
        const rolledBack = registered.reverse();
        for (const done of rolledBack) {
          this.removeDuringRollback(`${directoryPath}/${done}`, () =>
            this._host.removeEntry(done, directory),
          );
        }
        this.removeDuringRollback(directoryPath, () =>
          this._host.removeDirectory(directoryName, parent),
        );
        console.error(
          `[DeviceDiagnostics] Cannot create ${directoryPath}/${name}` +
            `${entryCause ? `: ${entryCause.message}` : ""}; ` +
            `removed ${rolledBack.length} registered report(s)`,
        );
        throw new ReportRegistrationError(directoryPath, name, rolledBack, entryCause);
      }
      registered.push(name);
    }

    this._directory = directory;
    return directory;
  }

  /**
   * Removes every report entry and the device directory. Does nothing when
   * not registered.
   */
  teardown(parent: D): void {
    const directory = this._directory;
    if (directory === undefined) return;

    for (const name of this._reports.keys()) {
      this._host.removeEntry(name, directory);
    }
    this._host.removeDirectory(String(this._device.index), parent);
    this._directory = undefined;
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  /**
   * Reads up to `length` bytes of report `name` starting at `offset`.
   *
   * @throws {ReportNotFoundError} for an unknown report
   * @throws {ReportReadRangeError} for a negative or fractional range
   */
  read(name: string, offset: number, length: number): ReportChunk {
    const report = this.descriptor(name);
    return readReport((out) => this.generate(report, out), offset, length, this.config);
  }

  /** Reads report `name` from offset 0 until end-of-report. */
  readAll(name: string, chunkSize: number = DEFAULT_CHUNK_SIZE): Uint8Array {
    return drainReport(this.reader(name), chunkSize);
  }

  /** Reader bound to report `name`, as handed to the host. */
  reader(name: string): ReportReader {
    this.descriptor(name);
    return { read: (offset, length) => this.read(name, offset, length) };
  }

  /**
   * Renders report `name` once and returns a session that serves every
   * chunk from those bytes.
   */
  openSession(name: string): ReportSession {
    const report = this.descriptor(name);
    const out = new ReportBuffer(this.config.sizeLimit, this.config.bufferCapacity);
    this.generate(report, out);
    return new ReportSession(name, out);
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private descriptor(name: string): ReportDescriptor {
    const report = this._reports.get(name);
    if (!report) {
      throw new ReportNotFoundError(name, this._device.index);
    }
    return report;
  }

  /** Runs one rollback removal; a failure is logged and the rollback goes on. */
  private removeDuringRollback(path: string, remove: () => void): void {
    try {
      remove();
    } catch (error) {
      console.error(`[DeviceDiagnostics] Rollback could not remove ${path}: ${toError(error).message}`);
    }
  }

  private generate(report: ReportDescriptor, out: ReportBuffer): void {
    const context: ReportContext = { device: this._device, config: this.config };
    if (report.requiresLock) {
      this._device.structLock.runExclusive(() => report.generate(context, out));
    } else {
      report.generate(context, out);
    }
  }
}
