import { InternalError, StateLockDeadlockError } from "@devinfo/errors";
import { describe, expect, it } from "vitest";
import { StateLock } from "../../state-lock.js";

describe("StateLock", () => {
  it("returns the callback result and releases afterwards", () => {
    const lock = new StateLock();
    const result = lock.runExclusive(() => {
      expect(lock.isLocked).toBe(true);
      return 42;
    });
    expect(result).toBe(42);
    expect(lock.isLocked).toBe(false);
  });

  it("releases when the callback throws", () => {
    const lock = new StateLock();
    expect(() =>
      lock.runExclusive(() => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(lock.isLocked).toBe(false);
  });

  it("refuses tryAcquire while held", () => {
    const lock = new StateLock();
    expect(lock.tryAcquire()).toBe(true);
    expect(lock.tryAcquire()).toBe(false);
    lock.release();
    expect(lock.tryAcquire()).toBe(true);
  });

  it("shares the lock word with a lock attached to the same buffer", () => {
    const owner = new StateLock();
    const peer = StateLock.fromBuffer(owner.buffer);
    owner.acquire();
    expect(peer.isLocked).toBe(true);
    expect(peer.tryAcquire()).toBe(false);
    owner.release();
    expect(peer.tryAcquire()).toBe(true);
    peer.release();
  });

  it("throws a deadlock error once the panic threshold is reached", () => {
    const lock = new StateLock({ panicThreshold: 5, yieldAfterSpins: 1_000 });
    lock.acquire();

    let caught: unknown;
    try {
      lock.acquire();
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(StateLockDeadlockError);
    expect(caught).toMatchObject({ code: "LOCK_DEADLOCK_DETECTED", iterations: 5 });
    lock.release();
  });

  it("sleeps between spins without losing the deadlock ceiling", () => {
    const lock = new StateLock({ panicThreshold: 3, yieldAfterSpins: 1 });
    lock.acquire();
    expect(() => lock.acquire()).toThrow(StateLockDeadlockError);
    lock.release();
  });

  it("rejects a release without a matching acquire", () => {
    const lock = new StateLock();
    expect(() => lock.release()).toThrow(InternalError);
  });

  it("rejects buffers too small for the lock word", () => {
    expect(() => StateLock.fromBuffer(new SharedArrayBuffer(4))).toThrow(InternalError);
  });
});
