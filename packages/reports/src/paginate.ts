import { ReportReadRangeError } from "@devinfo/errors";
import { ReportBuffer } from "./report-buffer.js";
import type { ReportChunk, ReportReader } from "./types.js";

const END_OF_REPORT: ReportChunk = Object.freeze({ bytes: new Uint8Array(0), eof: true });

export interface ReportBounds {
  readonly sizeLimit: number;
  readonly bufferCapacity: number;
}

function isReadCount(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * @throws {ReportReadRangeError} unless both values are non-negative safe integers
 */
export function assertReadRange(offset: number, length: number): void {
  if (!isReadCount(offset) || !isReadCount(length)) {
    throw new ReportReadRangeError(offset, length);
  }
}

/**
 * Takes the `[offset, offset + length)` window of a rendered report.
 *
 * More content past the window yields exactly `length` bytes with
 * `eof: false`; otherwise the tail (possibly empty) with `eof: true`.
 */
export function sliceReport(out: ReportBuffer, offset: number, length: number): ReportChunk {
  const total = out.length;
  if (total > offset + length) {
    return { bytes: out.slice(offset, offset + length), eof: false };
  }
  if (offset >= total) {
    return END_OF_REPORT;
  }
  return { bytes: out.slice(offset, total), eof: true };
}

/**
 * One paginated read.
 *
 * Offsets past `sizeLimit` end the report without rendering. Otherwise the
 * whole report is rendered from scratch into a fresh buffer, whatever the
 * offset, and the requested window is returned. Nothing survives between
 * calls, so consecutive chunks may come from different device states.
 */
export function readReport(
  render: (out: ReportBuffer) => void,
  offset: number,
  length: number,
  bounds: ReportBounds,
): ReportChunk {
  assertReadRange(offset, length);
  if (offset > bounds.sizeLimit) {
    return END_OF_REPORT;
  }

  const out = new ReportBuffer(bounds.sizeLimit, bounds.bufferCapacity);
  render(out);
  return sliceReport(out, offset, length);
}

/**
 * Reads a report from offset 0 in `chunkSize` steps until end-of-report and
 * concatenates the chunks.
 */
export function drainReport(reader: ReportReader, chunkSize: number): Uint8Array {
  if (!Number.isSafeInteger(chunkSize) || chunkSize < 1) {
    throw new ReportReadRangeError(0, chunkSize);
  }

  const chunks: Uint8Array[] = [];
  let offset = 0;
  for (;;) {
    const chunk = reader.read(offset, chunkSize);
    chunks.push(chunk.bytes);
    offset += chunk.bytes.length;
    if (chunk.eof) break;
  }

  const result = new Uint8Array(offset);
  let position = 0;
  for (const chunk of chunks) {
    result.set(chunk, position);
    position += chunk.length;
  }
  return result;
}
