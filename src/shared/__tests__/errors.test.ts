import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  DispatchError,
  DispatchTimeoutError,
  QuotaExhaustedError,
  RetryExhaustedError,
  UpstreamError,
  ValidationError,
} from '../errors.js';

describe('ConfigError', () => {
  it('creates an error with the correct name and message', () => {
    const err = new ConfigError('Bad config');
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(ConfigError);
    expect(err).not.toBeInstanceOf(DispatchError);
    expect(err.name).toBe('ConfigError');
    expect(err.message).toBe('Bad config');
  });
});

describe('QuotaExhaustedError', () => {
  it('carries the wait until the next window and maps to 429', () => {
    const err = new QuotaExhaustedError(3, 90_500);
    expect(err).toBeInstanceOf(DispatchError);
    expect(err.name).toBe('QuotaExhaustedError');
    expect(err.code).toBe('quota_exhausted');
    expect(err.retryAfterMs).toBe(90_500);
    expect(err.httpStatus).toBe(429);
    expect(err.message).toBe('All 3 credential(s) are over quota; next window opens in 91s');
  });
});

describe('UpstreamError', () => {
  it('derives its code and retryability from the kind', () => {
    const err = new UpstreamError('server_error', 'get_video', 'Upstream returned 503', {
      statusCode: 503,
      responseBody: 'busy',
    });
    expect(err.code).toBe('upstream_server_error');
    expect(err.transient).toBe(true);
    expect(err.retryable).toBe(true);
    expect(err.statusCode).toBe(503);
    expect(err.responseBody).toBe('busy');
    expect(err.httpStatus).toBe(502);
  });

  it('defaults the status code to null and body to empty', () => {
    const err = new UpstreamError('network', 'get_video', 'fetch failed');
    expect(err.statusCode).toBeNull();
    expect(err.responseBody).toBe('');
    expect(err.retryAfterMs).toBeUndefined();
  });

  it('maps not_found to 404 and other permanent kinds to 502', () => {
    expect(new UpstreamError('not_found', 'op', 'x').httpStatus).toBe(404);
    expect(new UpstreamError('client_error', 'op', 'x').httpStatus).toBe(502);
    expect(new UpstreamError('malformed', 'op', 'x').transient).toBe(false);
  });
});

describe('RetryExhaustedError', () => {
  it('wraps the last upstream error as its cause', () => {
    const last = new UpstreamError('rate_limited', 'get_video', 'Upstream returned 429');
    const err = new RetryExhaustedError(3, last);
    expect(err.code).toBe('retry_exhausted');
    expect(err.attempts).toBe(3);
    expect(err.lastError).toBe(last);
    expect(err.cause).toBe(last);
    expect(err.message).toBe('Upstream still failing after 3 attempt(s): Upstream returned 429');
    expect(err.httpStatus).toBe(502);
  });
});

describe('toErrorResponse', () => {
  it('marks retryable failures as unavailable', () => {
    expect(new DispatchTimeoutError().toErrorResponse()).toEqual({
      error: {
        message: 'Dispatch deadline elapsed',
        type: 'unavailable_error',
        code: 'timeout',
      },
    });
  });

  it('marks caller mistakes as request errors', () => {
    const err = new ValidationError('Unknown operation');
    expect(err.httpStatus).toBe(400);
    expect(err.toErrorResponse()).toEqual({
      error: { message: 'Unknown operation', type: 'request_error', code: 'validation_error' },
    });
  });
});
