import { InternalError, StateLockDeadlockError } from "@devinfo/errors";

// ===========================================================================
// Layout of the shared lock word
// ===========================================================================

const MUTEX_SLOT = 0;
const YIELD_SLOT = 1;
const MUTEX_UNLOCKED = 0;
const MUTEX_LOCKED = 1;
const LOCK_BUFFER_BYTES = 2 * Int32Array.BYTES_PER_ELEMENT;

export const DEFAULT_YIELD_AFTER_SPINS = 100;
export const DEFAULT_PANIC_THRESHOLD = 1_000_000;

export interface StateLockOptions {
  /** Spins before the acquirer sleeps for 1ms (default: 100) */
  readonly yieldAfterSpins?: number;
  /** Failed acquisition attempts before giving up with a deadlock error (default: 1,000,000) */
  readonly panicThreshold?: number;
}

/**
 * Per-device mutual-exclusion lock guarding the mutable collections that
 * report generators enumerate.
 *
 * The lock word lives in a `SharedArrayBuffer`, so the same lock can be
 * reconstructed in a worker with {@link StateLock.fromBuffer}. Acquisition
 * is a CAS spin (0 → 1) that sleeps via `Atomics.wait` every
 * `yieldAfterSpins` attempts and throws {@link StateLockDeadlockError} once
 * `panicThreshold` attempts have failed. The lock is not re-entrant.
 */
export class StateLock {
  private readonly _buffer: SharedArrayBuffer;
  private readonly _view: Int32Array;
  private readonly _yieldAfterSpins: number;
  private readonly _panicThreshold: number;

  constructor(options: StateLockOptions = {}, buffer?: SharedArrayBuffer) {
    this._buffer = buffer ?? new SharedArrayBuffer(LOCK_BUFFER_BYTES);
    this._view = new Int32Array(this._buffer);
    this._yieldAfterSpins = options.yieldAfterSpins ?? DEFAULT_YIELD_AFTER_SPINS;
    this._panicThreshold = options.panicThreshold ?? DEFAULT_PANIC_THRESHOLD;
  }

  /**
   * Attaches to a lock word created elsewhere (usually in another thread).
   */
  static fromBuffer(buffer: SharedArrayBuffer, options: StateLockOptions = {}): StateLock {
    if (buffer.byteLength < LOCK_BUFFER_BYTES) {
      throw new InternalError(
        `State lock buffer must be at least ${LOCK_BUFFER_BYTES} bytes, got ${buffer.byteLength}`,
      );
    }
    return new StateLock(options, buffer);
  }

  get buffer(): SharedArrayBuffer {
    return this._buffer;
  }

  get isLocked(): boolean {
    return Atomics.load(this._view, MUTEX_SLOT) === MUTEX_LOCKED;
  }

  tryAcquire(): boolean {
    return (
      Atomics.compareExchange(this._view, MUTEX_SLOT, MUTEX_UNLOCKED, MUTEX_LOCKED) ===
      MUTEX_UNLOCKED
    );
  }

  /**
   * @throws {StateLockDeadlockError} when the lock stays held past the panic threshold
   */
  acquire(): void {
    let spins = 0;
    let attempts = 0;

    while (!this.tryAcquire()) {
      attempts++;
      if (attempts >= this._panicThreshold) {
        throw new StateLockDeadlockError(attempts);
      }

      spins++;
      if (spins >= this._yieldAfterSpins) {
        Atomics.wait(this._view, YIELD_SLOT, 0, 1);
        spins = 0;
      }
    }
  }

  release(): void {
    const previous = Atomics.compareExchange(
      this._view,
      MUTEX_SLOT,
      MUTEX_LOCKED,
      MUTEX_UNLOCKED,
    );
    if (previous !== MUTEX_LOCKED) {
      throw new InternalError("State lock released while not held");
    }
  }

  /**
   * Runs `fn` with the lock held and always releases it afterwards.
   */
  runExclusive<T>(fn: () => T): T {
    this.acquire();
    try {
      return fn();
    } finally {
      this.release();
    }
  }
}
