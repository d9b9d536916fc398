/**
 * Global upstream throttle with retry and exponential backoff.
 *
 * One limiter is shared by every dispatch and every credential. The
 * last-call timestamp is read, waited on and advanced inside a mutex, so
 * overlapping callers queue up behind each other instead of all computing
 * their wait from the same stale timestamp.
 */

import { logger } from '../shared/logger.js';
import { AbortedError, MAX_TIMER_DELAY_MS, Mutex, sleep } from '../shared/async.js';
import {
  DispatchError,
  DispatchTimeoutError,
  RetryExhaustedError,
  UpstreamError,
} from '../shared/errors.js';
import { backoffDelayMs, isTransient } from './retry.js';
import type { AttemptFn, ExecuteOptions, RetryPolicy, RetryState } from './types.js';

export interface RateLimiterOptions {
  /** Minimum spacing between any two upstream calls. */
  minIntervalMs: number;
  retry: RetryPolicy;
  /** Monotonic clock in ms, injectable for tests. */
  now?: () => number;
  /** Random source for backoff jitter. */
  random?: () => number;
}

export class RateLimiter {
  private readonly minIntervalMs: number;
  private readonly policy: RetryPolicy;
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly mutex = new Mutex();
  private lastCallAt: number | null = null;

  constructor(options: RateLimiterOptions) {
    this.minIntervalMs = options.minIntervalMs;
    this.policy = options.retry;
    this.now = options.now ?? (() => performance.now());
    this.random = options.random ?? Math.random;
  }

  /** The active retry policy. */
  get retryPolicy(): RetryPolicy {
    return this.policy;
  }

  /**
   * Wait for this caller's slot. The new last-call timestamp is written
   * before the mutex is released, so the next caller measures from it.
   * @returns Milliseconds spent sleeping (excluding the queue wait).
   */
  async throttle(signal?: AbortSignal): Promise<number> {
    return this.mutex.runExclusive(async () => {
      const waitMs =
        this.lastCallAt === null
          ? 0
          : Math.max(0, this.lastCallAt + this.minIntervalMs - this.now());
      await sleep(waitMs, signal);
      this.lastCallAt = this.now();
      return waitMs;
    }, signal);
  }

  /**
   * Run an upstream call with throttling and retries.
   * Every attempt passes through `throttle()` first.
   *
   * @throws RetryExhaustedError after `maxAttempts` transient failures
   * @throws DispatchTimeoutError when the signal fires while waiting
   * @throws The operation's own DispatchError for non-transient failures
   */
  async execute<T>(operation: AttemptFn<T>, options: ExecuteOptions<T> = {}): Promise<T> {
    const { signal, beforeThrottle, onStateChange } = options;
    let state: RetryState<T> = { phase: 'attempting', attempt: 1 };

    for (;;) {
      onStateChange?.(state);

      switch (state.phase) {
        case 'attempting':
          state = await this.attempt(operation, state.attempt, signal, beforeThrottle);
          break;
        case 'waiting':
          state = await this.wait(state, signal);
          break;
        case 'succeeded':
          return state.value;
        case 'failed':
          throw state.error;
      }
    }
  }

  private async attempt<T>(
    operation: AttemptFn<T>,
    attempt: number,
    signal: AbortSignal | undefined,
    beforeThrottle: ((attempt: number) => void) | undefined,
  ): Promise<RetryState<T>> {
    try {
      beforeThrottle?.(attempt);
      await this.throttle(signal);
      const value = await operation(attempt);
      return { phase: 'succeeded', attempt, value };
    } catch (error: unknown) {
      if (error instanceof AbortedError || signal?.aborted) {
        return { phase: 'failed', attempt, error: timeoutFrom(signal) };
      }

      if (isTransient(error)) {
        return this.afterTransientFailure(attempt, error);
      }

      if (error instanceof DispatchError) {
        return { phase: 'failed', attempt, error };
      }

      // Anything untyped is a bug in the operation, not an upstream condition.
      throw error;
    }
  }

  private afterTransientFailure<T>(attempt: number, cause: UpstreamError): RetryState<T> {
    if (attempt >= this.policy.maxAttempts) {
      logger.warn(
        { operation: cause.operation, kind: cause.kind, attempts: attempt },
        `Upstream ${cause.operation} still failing after ${attempt} attempt(s), giving up`,
      );
      return { phase: 'failed', attempt, error: new RetryExhaustedError(attempt, cause) };
    }

    const delayMs = backoffDelayMs(this.policy, attempt, cause.retryAfterMs, this.random);
    // No dispatch deadline outlasts a backoff this long.
    if (delayMs > MAX_TIMER_DELAY_MS) {
      logger.warn(
        { operation: cause.operation, kind: cause.kind, attempts: attempt, delayMs },
        `Upstream ${cause.operation} asked for a ${delayMs}ms backoff, giving up`,
      );
      return { phase: 'failed', attempt, error: new RetryExhaustedError(attempt, cause) };
    }

    logger.info(
      {
        operation: cause.operation,
        kind: cause.kind,
        statusCode: cause.statusCode,
        attempt,
        maxAttempts: this.policy.maxAttempts,
        delayMs,
      },
      `Upstream ${cause.operation} failed (${cause.kind}), retrying in ${delayMs}ms (attempt ${attempt}/${this.policy.maxAttempts})`,
    );
    return { phase: 'waiting', attempt, until: this.now() + delayMs, cause };
  }

  private async wait<T>(
    state: Extract<RetryState<T>, { phase: 'waiting' }>,
    signal: AbortSignal | undefined,
  ): Promise<RetryState<T>> {
    try {
      await sleep(state.until - this.now(), signal);
    } catch (error: unknown) {
      if (error instanceof AbortedError) {
        return { phase: 'failed', attempt: state.attempt, error: timeoutFrom(signal) };
      }
      throw error;
    }
    return { phase: 'attempting', attempt: state.attempt + 1 };
  }
}

/** Translate an aborted signal into the dispatch timeout error. */
export function timeoutFrom(signal: AbortSignal | undefined): DispatchTimeoutError {
  const reason: unknown = signal?.reason;
  if (typeof reason === 'object' && reason !== null && 'name' in reason && reason.name === 'TimeoutError') {
    return new DispatchTimeoutError('Dispatch deadline elapsed');
  }
  return new DispatchTimeoutError('Dispatch aborted by caller');
}
