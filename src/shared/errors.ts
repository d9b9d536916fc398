/**
 * Error classes for quota-relay.
 * Every failure a dispatch can produce is a DispatchError subclass with a
 * stable code, so callers and the HTTP layer can branch without string matching.
 */

import type { ErrorResponse } from './types.js';

/** Error thrown when config validation or loading fails. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Stable machine-readable codes for dispatch failures. */
export type DispatchErrorCode =
  | 'quota_exhausted'
  | 'retry_exhausted'
  | 'validation_error'
  | 'timeout'
  | `upstream_${UpstreamErrorKind}`;

/** HTTP statuses a dispatch failure maps to. */
export type DispatchHttpStatus = 400 | 404 | 429 | 502 | 504;

/** Base class of every error a dispatch can return. */
export abstract class DispatchError extends Error {
  abstract readonly code: DispatchErrorCode;
  /** Whether the caller may reasonably try the same request again later. */
  abstract readonly retryable: boolean;

  /** HTTP status the facade should answer with. */
  abstract get httpStatus(): DispatchHttpStatus;

  /** Build a JSON error body for this failure. */
  toErrorResponse(): ErrorResponse {
    return {
      error: {
        message: this.message,
        type: this.retryable ? 'unavailable_error' : 'request_error',
        code: this.code,
      },
    };
  }
}

/** Raised when no credential in the pool has daily or hourly headroom. */
export class QuotaExhaustedError extends DispatchError {
  readonly code = 'quota_exhausted';
  readonly retryable = true;
  /** Milliseconds until the earliest quota window rollover frees a credential. */
  public readonly retryAfterMs: number;

  constructor(credentialCount: number, retryAfterMs: number) {
    super(
      `All ${credentialCount} credential(s) are over quota; next window opens in ${Math.ceil(retryAfterMs / 1000)}s`,
    );
    this.name = 'QuotaExhaustedError';
    this.retryAfterMs = retryAfterMs;
  }

  get httpStatus(): DispatchHttpStatus {
    return 429;
  }
}

/** Failure categories reported by the upstream-call layer. */
export type UpstreamErrorKind =
  | 'rate_limited'
  | 'server_error'
  | 'client_error'
  | 'not_found'
  | 'network'
  | 'malformed';

const TRANSIENT_KINDS: ReadonlySet<UpstreamErrorKind> = new Set([
  'rate_limited',
  'server_error',
  'network',
]);

/** A single failed upstream call. */
export class UpstreamError extends DispatchError {
  public readonly code: DispatchErrorCode;
  public readonly kind: UpstreamErrorKind;
  public readonly operation: string;
  /** HTTP status from the upstream, or null when no response arrived. */
  public readonly statusCode: number | null;
  public readonly responseBody: string;
  /** Retry-after hint from a 429, in milliseconds. */
  public readonly retryAfterMs?: number;

  constructor(
    kind: UpstreamErrorKind,
    operation: string,
    message: string,
    options: {
      statusCode?: number | null;
      responseBody?: string;
      retryAfterMs?: number;
      cause?: unknown;
    } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'UpstreamError';
    this.kind = kind;
    this.code = `upstream_${kind}`;
    this.operation = operation;
    this.statusCode = options.statusCode ?? null;
    this.responseBody = options.responseBody ?? '';
    this.retryAfterMs = options.retryAfterMs;
  }

  /** Rate limits, 5xx and network failures are worth another attempt. */
  get transient(): boolean {
    return TRANSIENT_KINDS.has(this.kind);
  }

  get retryable(): boolean {
    return this.transient;
  }

  get httpStatus(): DispatchHttpStatus {
    return this.kind === 'not_found' ? 404 : 502;
  }
}

/** All retry attempts failed with transient upstream errors. */
export class RetryExhaustedError extends DispatchError {
  readonly code = 'retry_exhausted';
  readonly retryable = true;
  public readonly attempts: number;
  public readonly lastError: UpstreamError;

  constructor(attempts: number, lastError: UpstreamError) {
    super(`Upstream still failing after ${attempts} attempt(s): ${lastError.message}`, {
      cause: lastError,
    });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }

  get httpStatus(): DispatchHttpStatus {
    return 502;
  }
}

/** Request rejected before any credential or rate-limit slot was used. */
export class ValidationError extends DispatchError {
  readonly code = 'validation_error';
  readonly retryable = false;

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }

  get httpStatus(): DispatchHttpStatus {
    return 400;
  }
}

/** The per-call deadline elapsed (or the caller aborted) while waiting or retrying. */
export class DispatchTimeoutError extends DispatchError {
  readonly code = 'timeout';
  readonly retryable = true;

  constructor(message: string = 'Dispatch deadline elapsed') {
    super(message);
    this.name = 'DispatchTimeoutError';
  }

  get httpStatus(): DispatchHttpStatus {
    return 504;
  }
}
