import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type Database from 'better-sqlite3';
import { initializeDatabase } from '../db.js';
import { migrateSchema, SCHEMA_VERSION } from '../schema.js';
import { DispatchLogger, entryFromResult } from '../dispatch-logger.js';
import { UsageAggregator } from '../aggregator.js';
import { QuotaExhaustedError, UpstreamError } from '../../shared/errors.js';
import type { DispatchLogEntry } from '../dispatch-logger.js';
import type { DispatchMeta } from '../../dispatch/types.js';

// --- Test helpers ---

function entry(overrides: Partial<DispatchLogEntry> = {}): DispatchLogEntry {
  return {
    timestamp: 1_000,
    operation: 'get_video',
    cacheKey: 'get_video:abc',
    cacheStatus: 'miss',
    credentialId: 'key-a',
    attempts: 1,
    latencyMs: 100,
    httpStatus: 200,
    outcome: 'success',
    ...overrides,
  };
}

const META: DispatchMeta = {
  operation: 'get_video',
  cacheKey: 'get_video:abc',
  cacheStatus: 'miss',
  attempts: 2,
  credentialId: 'key-b',
  latencyMs: 42,
};

// --- Tests ---

describe('dispatch log persistence', () => {
  let db: Database.Database;
  let dispatchLogger: DispatchLogger;
  let aggregator: UsageAggregator;

  beforeEach(() => {
    db = initializeDatabase(':memory:');
    migrateSchema(db);
    dispatchLogger = new DispatchLogger(db);
    aggregator = new UsageAggregator(db);
  });

  afterEach(() => {
    db.close();
  });

  it('migrates to the latest schema version and is idempotent', () => {
    expect(db.pragma('user_version', { simple: true })).toBe(SCHEMA_VERSION);
    expect(() => migrateSchema(db)).not.toThrow();
    expect(db.pragma('user_version', { simple: true })).toBe(SCHEMA_VERSION);
  });

  it('aggregates dispatches per operation', () => {
    dispatchLogger.log(entry({ timestamp: 1_000, latencyMs: 100 }));
    dispatchLogger.log(
      entry({
        timestamp: 2_000,
        cacheStatus: 'hit',
        credentialId: null,
        attempts: 0,
        latencyMs: 1,
      }),
    );
    dispatchLogger.log(
      entry({
        timestamp: 3_000,
        attempts: 3,
        latencyMs: 400,
        httpStatus: 502,
        outcome: 'failure',
        errorCode: 'retry_exhausted',
        errorMessage: 'still failing',
      }),
    );

    expect(aggregator.getOperationUsage('get_video')).toEqual({
      operation: 'get_video',
      totalRequests: 3,
      successfulRequests: 2,
      failedRequests: 1,
      cacheHits: 1,
      totalAttempts: 4,
      avgLatencyMs: 167,
      lastRequestTimestamp: 3_000,
    });
    expect(aggregator.getOperationUsage('never_called')).toBeNull();
  });

  it('counts only dispatches that used a credential toward it', () => {
    dispatchLogger.log(entry({ credentialId: 'key-a' }));
    dispatchLogger.log(entry({ credentialId: 'key-b', outcome: 'failure', httpStatus: 404 }));
    dispatchLogger.log(entry({ credentialId: null, cacheStatus: 'hit', attempts: 0 }));

    expect(aggregator.getAllCredentialUsage()).toEqual([
      {
        credentialId: 'key-a',
        totalRequests: 1,
        successfulRequests: 1,
        failedRequests: 0,
        totalAttempts: 1,
        lastRequestTimestamp: 1_000,
      },
      {
        credentialId: 'key-b',
        totalRequests: 1,
        successfulRequests: 0,
        failedRequests: 1,
        totalAttempts: 1,
        lastRequestTimestamp: 1_000,
      },
    ]);
  });

  it('lists recent dispatches newest first, up to the limit', () => {
    dispatchLogger.log(entry({ timestamp: 1_000, operation: 'a' }));
    dispatchLogger.log(entry({ timestamp: 3_000, operation: 'c' }));
    dispatchLogger.log(entry({ timestamp: 2_000, operation: 'b' }));

    const recent = aggregator.getRecentDispatches(2);

    expect(recent.map((row) => row.operation)).toEqual(['c', 'b']);
    expect(recent[0]).toMatchObject({
      timestamp: 3_000,
      cacheStatus: 'miss',
      credentialId: 'key-a',
      outcome: 'success',
      errorCode: null,
      errorMessage: null,
    });
  });

  it('orders operations by most recent use', () => {
    dispatchLogger.log(entry({ timestamp: 1_000, operation: 'older' }));
    dispatchLogger.log(entry({ timestamp: 5_000, operation: 'newer' }));

    expect(aggregator.getAllOperationUsage().map((u) => u.operation)).toEqual(['newer', 'older']);
  });
});

describe('dispatch log retention', () => {
  const DAY = 86_400_000;
  let db: Database.Database;
  let dispatchLogger: DispatchLogger;
  let aggregator: UsageAggregator;

  beforeEach(() => {
    db = initializeDatabase(':memory:');
    migrateSchema(db);
    dispatchLogger = new DispatchLogger(db);
    aggregator = new UsageAggregator(db);
  });

  afterEach(() => {
    dispatchLogger.stopPruner();
    vi.useRealTimers();
    db.close();
  });

  it('deletes rows older than the retention window and keeps the aggregates', () => {
    dispatchLogger.log(entry({ timestamp: 1 * DAY }));
    dispatchLogger.log(entry({ timestamp: 2 * DAY }));
    dispatchLogger.log(entry({ timestamp: 2.5 * DAY }));

    expect(dispatchLogger.prune(1, 3 * DAY)).toBe(1);

    expect(aggregator.getRecentDispatches().map((row) => row.timestamp)).toEqual([
      2.5 * DAY,
      2 * DAY,
    ]);
    expect(aggregator.getOperationUsage('get_video')?.totalRequests).toBe(3);
  });

  it('prunes at start and again on every interval', () => {
    vi.useFakeTimers();
    vi.setSystemTime(10 * DAY);
    dispatchLogger.log(entry({ timestamp: 1 * DAY }));

    dispatchLogger.startPruner(7, 1_000);
    expect(aggregator.getRecentDispatches()).toHaveLength(0);

    dispatchLogger.log(entry({ timestamp: 2 * DAY }));
    dispatchLogger.log(entry({ timestamp: 9 * DAY }));
    vi.advanceTimersByTime(1_000);

    expect(aggregator.getRecentDispatches().map((row) => row.timestamp)).toEqual([9 * DAY]);
  });
});

describe('entryFromResult', () => {
  it('maps a success to status 200', () => {
    expect(entryFromResult({ ok: true, data: { id: 'v1' }, meta: META }, 5_000)).toEqual({
      timestamp: 5_000,
      operation: 'get_video',
      cacheKey: 'get_video:abc',
      cacheStatus: 'miss',
      credentialId: 'key-b',
      attempts: 2,
      latencyMs: 42,
      httpStatus: 200,
      outcome: 'success',
    });
  });

  it('maps a failure to the error status and code', () => {
    const notFound = new UpstreamError('not_found', 'get_video', 'Upstream returned 404');

    expect(entryFromResult({ ok: false, error: notFound, meta: META }, 5_000)).toMatchObject({
      httpStatus: 404,
      outcome: 'failure',
      errorCode: 'upstream_not_found',
      errorMessage: 'Upstream returned 404',
    });

    const exhausted = new QuotaExhaustedError(2, 1_000);
    expect(entryFromResult({ ok: false, error: exhausted, meta: META }).httpStatus).toBe(429);
  });
});
