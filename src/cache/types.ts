/**
 * Response cache types.
 */

import type { JsonValue } from '../shared/types.js';

/** One cached upstream result. */
export interface CacheEntry {
  key: string;
  /** Deep-frozen copy of the stored value. */
  value: JsonValue;
  resourceClass: string;
  /** Unix ms */
  createdAt: number;
  /** Unix ms; the entry is never served at or after this instant. */
  expiresAt: number;
}

/** Raw cache counters. */
export interface CacheCounters {
  hits: number;
  misses: number;
  writes: number;
  /** Entries dropped because they expired, on read or by the sweeper. */
  evictions: number;
}

/** Counters plus derived figures, as reported by `stats()`. */
export interface CacheStats extends CacheCounters {
  entries: number;
  /** hits / (hits + misses), 0 before any lookup. */
  hitRate: number;
}

export interface ResponseCacheOptions {
  /** TTL in seconds per resource class. */
  ttlSeconds: Record<string, number>;
  /** TTL for resource classes missing from `ttlSeconds`. */
  defaultTtlSeconds: number;
  /** Clock in Unix ms, injectable for tests. */
  now?: () => number;
}
