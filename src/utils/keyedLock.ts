/**
 * @file src/utils/keyedLock.ts
 * @description In-process async mutex keyed by string. Operations on the
 *   same key run one at a time in arrival order; different keys never wait on
 *   each other.
 */

import { CancelledError } from "./errors.js";

export type Release = () => void;

export class KeyedLock {
  // Last holder (or waiter) per key; each new caller chains behind it.
  private readonly tails = new Map<string, Promise<void>>();

  /** Number of keys currently held or awaited. */
  get size(): number {
    return this.tails.size;
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /**
   * Wait for the lock on `key`. The returned function releases it and must be
   * called exactly once.
   * @throws CancelledError if `signal` fires before the lock is obtained.
   */
  async acquire(key: string, signal?: AbortSignal): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    let released = false;
    const unlock: Release = () => {
      if (released) return;
      released = true;
      release();
      void tail.then(() => {
        if (this.tails.get(key) === tail) this.tails.delete(key);
      });
    };

    try {
      await waitUnlessAborted(previous, signal);
    } catch (err) {
      // Our slot still opens when the previous holder leaves; give it up then.
      void previous.then(unlock);
      throw err;
    }
    return unlock;
  }

  /**
   * Run `fn` while holding the lock on `key`.
   */
  async runExclusive<T>(
    key: string,
    fn: () => Promise<T> | T,
    signal?: AbortSignal
  ): Promise<T> {
    const unlock = await this.acquire(key, signal);
    try {
      return await fn();
    } finally {
      unlock();
    }
  }
}

function waitUnlessAborted(
  promise: Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  if (!signal) return promise;
  if (signal.aborted) {
    return Promise.reject(new CancelledError({ cause: signal.reason }));
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void =>
      reject(new CancelledError({ cause: signal.reason }));
    signal.addEventListener("abort", onAbort, { once: true });
    void promise.then(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    });
  });
}
