/**
 * In-memory response cache with per-resource-class TTLs.
 *
 * Every method runs to completion synchronously, so a get and a put for the
 * same key can never interleave, and the counters always move together with
 * the entry set.
 */

import { logger } from '../shared/logger.js';
import type { JsonValue } from '../shared/types.js';
import type {
  CacheCounters,
  CacheEntry,
  CacheStats,
  ResponseCacheOptions,
} from './types.js';

function emptyCounters(): CacheCounters {
  return { hits: 0, misses: 0, writes: 0, evictions: 0 };
}

/** Recursively freeze a JSON value in place. */
function deepFreeze(value: JsonValue): JsonValue {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export class ResponseCache {
  private readonly ttlSeconds: Record<string, number>;
  private readonly defaultTtlSeconds: number;
  private readonly now: () => number;
  private entries = new Map<string, CacheEntry>();
  private counters: CacheCounters = emptyCounters();
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: ResponseCacheOptions) {
    this.ttlSeconds = options.ttlSeconds;
    this.defaultTtlSeconds = options.defaultTtlSeconds;
    this.now = options.now ?? Date.now;
  }

  /** TTL applied to a resource class, in seconds. */
  ttlFor(resourceClass: string): number {
    const ttl = Object.hasOwn(this.ttlSeconds, resourceClass)
      ? this.ttlSeconds[resourceClass]
      : undefined;
    return ttl ?? this.defaultTtlSeconds;
  }

  /**
   * Look up a live entry. An expired entry counts as a miss and is removed.
   * @returns The frozen cached value, or undefined on a miss.
   */
  get(key: string): JsonValue | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.counters.misses++;
      return undefined;
    }

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      this.counters.evictions++;
      this.counters.misses++;
      return undefined;
    }

    this.counters.hits++;
    return entry.value;
  }

  /** Store a copy of `value`, replacing any previous entry under `key`. */
  put(key: string, value: JsonValue, resourceClass: string): void {
    const createdAt = this.now();
    this.entries.set(key, {
      key,
      value: deepFreeze(structuredClone(value)),
      resourceClass,
      createdAt,
      expiresAt: createdAt + this.ttlFor(resourceClass) * 1000,
    });
    this.counters.writes++;
  }

  /** Drop every entry and reset the counters. */
  clear(): void {
    const dropped = this.entries.size;
    this.entries = new Map();
    this.counters = emptyCounters();
    logger.info({ dropped }, 'Response cache cleared');
  }

  stats(): CacheStats {
    const { hits, misses } = this.counters;
    const lookups = hits + misses;
    return {
      ...this.counters,
      entries: this.entries.size,
      hitRate: lookups === 0 ? 0 : hits / lookups,
    };
  }

  /**
   * Remove every expired entry.
   * @returns Number of entries removed
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
        removed++;
      }
    }
    this.counters.evictions += removed;
    if (removed > 0) {
      logger.debug({ removed, remaining: this.entries.size }, 'Swept expired cache entries');
    }
    return removed;
  }

  /** Sweep on an interval. The timer does not keep the process alive. */
  startSweeper(intervalMs: number): void {
    this.stopSweeper();
    this.sweepTimer = setInterval(() => this.sweep(), intervalMs);
    this.sweepTimer.unref();
  }

  /** Stop the sweeper, if running. Entries are kept. */
  shutdown(): void {
    this.stopSweeper();
  }

  private stopSweeper(): void {
    if (this.sweepTimer !== null) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}
