/**
 * Shared 32-bit counter.
 *
 * Backed by one `Int32Array` slot over a `SharedArrayBuffer`, so a counter
 * handed to a worker thread keeps a single value across threads.
 */
/** Largest value an {@link AtomicCounter} holds before it wraps. */
export const ATOMIC_COUNTER_MAX = 0x7fffffff;

export class AtomicCounter {
  private readonly _view: Int32Array;
  private readonly _slot: number;

  constructor(initial = 0, buffer?: SharedArrayBuffer, slot = 0) {
    this._view = new Int32Array(buffer ?? new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
    this._slot = slot;
    if (!buffer) {
      Atomics.store(this._view, this._slot, initial);
    }
  }

  get value(): number {
    return Atomics.load(this._view, this._slot);
  }

  /** Returns the value after the increment. */
  increment(): number {
    return Atomics.add(this._view, this._slot, 1) + 1;
  }

  /** Returns the value after the decrement. */
  decrement(): number {
    return Atomics.sub(this._view, this._slot, 1) - 1;
  }

  set(value: number): void {
    Atomics.store(this._view, this._slot, value);
  }
}
