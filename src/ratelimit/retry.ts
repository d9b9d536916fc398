/**
 * Retry policy helpers: transient-error classification and backoff delays.
 */

import { UpstreamError } from '../shared/errors.js';
import type { RateLimitConfig } from '../config/types.js';
import type { RetryPolicy } from './types.js';

/** Build a millisecond retry policy from the seconds-based config section. */
export function retryPolicyFromConfig(config: RateLimitConfig): RetryPolicy {
  return {
    maxAttempts: config.maxAttempts,
    baseDelayMs: config.baseDelaySeconds * 1000,
    backoffMultiplier: config.backoffMultiplier,
    jitter: config.jitter,
  };
}

/** Rate limits, 5xx responses and network failures; nothing else is retried. */
export function isTransient(error: unknown): error is UpstreamError {
  return error instanceof UpstreamError && error.transient;
}

/**
 * Delay before retry number `retry` (1 for the second attempt, 2 for the third, ...).
 * `baseDelayMs * backoffMultiplier^(retry-1)`, plus optional jitter, and never
 * shorter than a retry-after hint from the upstream.
 */
export function backoffDelayMs(
  policy: RetryPolicy,
  retry: number,
  retryAfterMs: number = 0,
  random: () => number = Math.random,
): number {
  const exponential = policy.baseDelayMs * Math.pow(policy.backoffMultiplier, retry - 1);
  const jittered = exponential + exponential * policy.jitter * random();
  return Math.max(Math.round(jittered), retryAfterMs);
}
