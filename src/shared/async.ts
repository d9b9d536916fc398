/**
 * Small async primitives shared by the rate limiter and dispatcher:
 * abortable sleep, abortable wait, and a FIFO promise-chain mutex.
 */

import { setTimeout as delay } from 'node:timers/promises';

/** Error raised by the helpers below when their signal fires. */
export class AbortedError extends Error {
  constructor(public readonly reason: unknown) {
    super('Operation aborted');
    this.name = 'AbortedError';
  }
}

/** Largest delay a single Node timer accepts (2^31 - 1 ms). */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Sleep for `ms` milliseconds. Rejects with AbortedError if the signal fires first.
 * Resolves immediately for non-positive durations. Longer sleeps than one timer
 * allows are split into consecutive timers.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw new AbortedError(signal.reason);
  }
  let remaining = ms;
  while (remaining > 0) {
    const step = Math.min(remaining, MAX_TIMER_DELAY_MS);
    try {
      await delay(step, undefined, { signal });
    } catch (err) {
      if (signal?.aborted) {
        throw new AbortedError(signal.reason);
      }
      throw err;
    }
    remaining -= step;
  }
}

/**
 * Wait for a promise, rejecting with AbortedError if the signal fires first.
 * The underlying promise keeps running; only this waiter gives up.
 */
export function waitFor<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(new AbortedError(signal.reason));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new AbortedError(signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/**
 * FIFO mutual exclusion over async critical sections.
 * Each caller chains onto the tail left by the previous one, so sections run
 * strictly one at a time in arrival order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Run `fn` once every earlier section has finished.
   * If the signal fires while queued, the caller leaves with AbortedError but
   * its slot still waits for its predecessor, so ordering is preserved.
   */
  async runExclusive<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);

    try {
      await waitFor(previous, signal);
    } catch (err) {
      release();
      throw err;
    }

    try {
      return await fn();
    } finally {
      release();
    }
  }
}
