/**
 * Dispatcher result types.
 * A dispatch never throws; success and failure both come back as a
 * DispatchResult carrying the same meta block.
 */

import type { DispatchError, ValidationError } from '../shared/errors.js';
import type { JsonValue, OperationParams } from '../shared/types.js';

/** Where a successful result came from. */
export type CacheStatus = 'hit' | 'miss' | 'shared';

export interface DispatchMeta {
  operation: string;
  /** Null when the request failed validation before a key was computed. */
  cacheKey: string | null;
  /** Null when the request failed before the cache was consulted. */
  cacheStatus: CacheStatus | null;
  /** Upstream attempts made. 0 for cache hits. */
  attempts: number;
  /** Credential used on the final attempt, or null if none was leased. */
  credentialId: string | null;
  latencyMs: number;
}

export type DispatchResult =
  | { ok: true; data: JsonValue; meta: DispatchMeta }
  | { ok: false; error: DispatchError; meta: DispatchMeta };

/** One entry of a batch. */
export interface BatchItem {
  operation: string;
  params?: OperationParams;
}

/** Whole-batch outcome: either every item's result, in input order, or a rejection of the batch. */
export type BatchOutcome =
  | { ok: true; results: DispatchResult[] }
  | { ok: false; error: ValidationError };

export interface DispatchOptions {
  /** Overrides the configured per-call deadline. */
  timeoutMs?: number;
  /** Caller cancellation, combined with the deadline. */
  signal?: AbortSignal;
}
