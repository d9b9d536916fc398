/**
 * Rate limiter and retry types.
 * The retry loop is modelled as an explicit state machine so deadlines and
 * observers can hook every transition.
 */

import type { DispatchError, UpstreamError } from '../shared/errors.js';

/** Retry parameters, already converted to milliseconds. */
export interface RetryPolicy {
  /** Total attempts including the first one. */
  maxAttempts: number;
  /** Delay before the first retry. */
  baseDelayMs: number;
  /** Factor applied to the delay for each further retry. */
  backoffMultiplier: number;
  /** Up to this fraction of the delay is added at random. 0 disables jitter. */
  jitter: number;
}

/** One state of the retry loop. */
export type RetryState<T> =
  | { phase: 'attempting'; attempt: number }
  | { phase: 'waiting'; attempt: number; until: number; cause: UpstreamError }
  | { phase: 'succeeded'; attempt: number; value: T }
  | { phase: 'failed'; attempt: number; error: DispatchError };

/** Options for a single `RateLimiter.execute()` call. */
export interface ExecuteOptions<T> {
  /** Aborts throttle waits, backoff waits, and is handed to the operation. */
  signal?: AbortSignal;
  /**
   * Runs before each attempt claims a throttle slot. Throwing a DispatchError
   * fails the attempt without spending the slot.
   */
  beforeThrottle?: (attempt: number) => void;
  /** Invoked on every state the retry loop enters. */
  onStateChange?: (state: RetryState<T>) => void;
}

/** An upstream call. Receives the 1-based attempt number. */
export type AttemptFn<T> = (attempt: number) => Promise<T>;
