const encoder = new TextEncoder();
const decoder = new TextDecoder();

const INITIAL_BYTES = 256;

/**
 * Text emission buffer for one report generation.
 *
 * Storage grows on demand but never past `capacity`; text beyond it is
 * dropped. `overflowed` turns true once the content passes `limit` or any
 * text was dropped.
 */
export class ReportBuffer {
  readonly limit: number;
  readonly capacity: number;
  private _bytes: Uint8Array;
  private _length = 0;
  private _truncated = false;

  constructor(limit: number, capacity: number) {
    this.limit = limit;
    this.capacity = capacity;
    this._bytes = new Uint8Array(Math.min(capacity, INITIAL_BYTES));
  }

  get length(): number {
    return this._length;
  }

  get overflowed(): boolean {
    return this._truncated || this._length > this.limit;
  }

  print(text: string): void {
    const encoded = encoder.encode(text);
    const room = this.capacity - this._length;
    if (encoded.length > room) {
      this._truncated = true;
    }
    const take = Math.min(room, encoded.length);
    if (take === 0) return;

    this.reserve(this._length + take);
    this._bytes.set(encoded.subarray(0, take), this._length);
    this._length += take;
  }

  /** Copy of the bytes in `[start, end)`, clamped to the content. */
  slice(start: number, end: number = this._length): Uint8Array {
    return this._bytes.slice(Math.min(start, this._length), Math.min(end, this._length));
  }

  toString(): string {
    return decoder.decode(this._bytes.subarray(0, this._length));
  }

  private reserve(size: number): void {
    if (size <= this._bytes.length) return;
    let next = this._bytes.length;
    while (next < size) {
      next *= 2;
    }
    const grown = new Uint8Array(Math.min(next, this.capacity));
    grown.set(this._bytes.subarray(0, this._length));
    this._bytes = grown;
  }
}
