import { describe, it, expect } from 'vitest';
import { backoffDelayMs, isTransient, retryPolicyFromConfig } from '../retry.js';
import { QuotaExhaustedError, UpstreamError } from '../../shared/errors.js';
import type { RetryPolicy } from '../types.js';

const POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 1000,
  backoffMultiplier: 2,
  jitter: 0,
};

describe('backoffDelayMs', () => {
  it('grows exponentially from the base delay', () => {
    expect(backoffDelayMs(POLICY, 1)).toBe(1000);
    expect(backoffDelayMs(POLICY, 2)).toBe(2000);
    expect(backoffDelayMs(POLICY, 3)).toBe(4000);
  });

  it('adds up to the jitter fraction of the delay', () => {
    const policy = { ...POLICY, jitter: 0.5 };

    expect(backoffDelayMs(policy, 1, 0, () => 0)).toBe(1000);
    expect(backoffDelayMs(policy, 1, 0, () => 1)).toBe(1500);
    expect(backoffDelayMs(policy, 2, 0, () => 0.5)).toBe(2500);
  });

  it('honours a longer retry-after hint', () => {
    expect(backoffDelayMs(POLICY, 1, 5000)).toBe(5000);
    expect(backoffDelayMs(POLICY, 3, 500)).toBe(4000);
  });
});

describe('isTransient', () => {
  it('accepts rate limits, server errors and network failures', () => {
    expect(isTransient(new UpstreamError('rate_limited', 'op', '429'))).toBe(true);
    expect(isTransient(new UpstreamError('server_error', 'op', '503'))).toBe(true);
    expect(isTransient(new UpstreamError('network', 'op', 'ECONNRESET'))).toBe(true);
  });

  it('rejects permanent upstream failures and non-upstream errors', () => {
    expect(isTransient(new UpstreamError('client_error', 'op', '400'))).toBe(false);
    expect(isTransient(new UpstreamError('not_found', 'op', '404'))).toBe(false);
    expect(isTransient(new UpstreamError('malformed', 'op', 'bad json'))).toBe(false);
    expect(isTransient(new QuotaExhaustedError(1, 1000))).toBe(false);
    expect(isTransient(new Error('boom'))).toBe(false);
  });
});

describe('retryPolicyFromConfig', () => {
  it('converts seconds to milliseconds', () => {
    expect(
      retryPolicyFromConfig({
        minIntervalSeconds: 0.1,
        maxAttempts: 3,
        baseDelaySeconds: 1.5,
        backoffMultiplier: 3,
        jitter: 0.2,
      }),
    ).toEqual({ maxAttempts: 3, baseDelayMs: 1500, backoffMultiplier: 3, jitter: 0.2 });
  });
});
