import type { ReportBuffer } from "./report-buffer.js";
import { assertReadRange, drainReport, sliceReport } from "./paginate.js";
import type { ReportChunk, ReportReader } from "./types.js";

/**
 * A report rendered once and then read in chunks from the same bytes.
 *
 * Every chunk of a session reflects a single device state. The rendered
 * bytes belong to the session; closing it or dropping the reference
 * releases them.
 */
export class ReportSession implements ReportReader {
  readonly name: string;
  private readonly _sizeLimit: number;
  private _out: ReportBuffer | undefined;

  constructor(name: string, out: ReportBuffer) {
    this.name = name;
    this._sizeLimit = out.limit;
    this._out = out;
  }

  get closed(): boolean {
    return this._out === undefined;
  }

  /** Bytes rendered for this session; zero once closed. */
  get length(): number {
    return this._out?.length ?? 0;
  }

  read(offset: number, length: number): ReportChunk {
    assertReadRange(offset, length);
    const out = this._out;
    if (!out || offset > this._sizeLimit) {
      return { bytes: new Uint8Array(0), eof: true };
    }
    return sliceReport(out, offset, length);
  }

  readAll(chunkSize: number): Uint8Array {
    return drainReport(this, chunkSize);
  }

  close(): void {
    this._out = undefined;
  }
}
