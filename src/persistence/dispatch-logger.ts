/**
 * Dispatch logger for fire-and-forget insertion of dispatch logs.
 * Uses a prepared statement; the aggregate tables are kept current by triggers.
 */

import type Database from 'better-sqlite3';
import { logger } from '../shared/logger.js';
import type { CacheStatus, DispatchResult } from '../dispatch/types.js';

/** One row of the dispatch log. */
export interface DispatchLogEntry {
  timestamp: number;
  operation: string;
  cacheKey: string | null;
  cacheStatus: CacheStatus | null;
  credentialId: string | null;
  attempts: number;
  latencyMs: number;
  httpStatus: number;
  outcome: 'success' | 'failure';
  errorCode?: string;
  errorMessage?: string;
}

type InsertParams = [
  number,
  string,
  string | null,
  string | null,
  string | null,
  number,
  number,
  number,
  string,
  string | null,
  string | null,
];

/** Build a log entry from a finished dispatch. */
export function entryFromResult(
  result: DispatchResult,
  timestamp: number = Date.now(),
): DispatchLogEntry {
  const { meta } = result;
  const base = {
    timestamp,
    operation: meta.operation,
    cacheKey: meta.cacheKey,
    cacheStatus: meta.cacheStatus,
    credentialId: meta.credentialId,
    attempts: meta.attempts,
    latencyMs: meta.latencyMs,
  };

  if (result.ok) {
    return { ...base, httpStatus: 200, outcome: 'success' };
  }
  return {
    ...base,
    httpStatus: result.error.httpStatus,
    outcome: 'failure',
    errorCode: result.error.code,
    errorMessage: result.error.message,
  };
}

const DAY_MS = 86_400_000;

/** How often the retention pruner runs. */
export const PRUNE_INTERVAL_MS = 3_600_000;

/**
 * DispatchLogger handles insertion of dispatch logs into SQLite,
 * and deletes rows older than the retention window.
 */
export class DispatchLogger {
  private insertStmt: Database.Statement<InsertParams>;
  private pruneStmt: Database.Statement<[number]>;
  private pruneTimer: ReturnType<typeof setInterval> | null = null;

  constructor(db: Database.Database) {
    this.pruneStmt = db.prepare<[number]>('DELETE FROM dispatch_logs WHERE timestamp < ?');
    this.insertStmt = db.prepare<InsertParams>(`
      INSERT INTO dispatch_logs (
        timestamp,
        operation,
        cache_key,
        cache_status,
        credential_id,
        attempts,
        latency_ms,
        http_status,
        outcome,
        error_code,
        error_message
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
  }

  /**
   * Log a dispatch entry to the database.
   * Fire-and-forget: does not return result, triggers update aggregation tables.
   */
  log(entry: DispatchLogEntry): void {
    this.insertStmt.run(
      entry.timestamp,
      entry.operation,
      entry.cacheKey,
      entry.cacheStatus,
      entry.credentialId,
      entry.attempts,
      Math.round(entry.latencyMs),
      entry.httpStatus,
      entry.outcome,
      entry.errorCode ?? null,
      entry.errorMessage ?? null,
    );
  }

  /** Log a finished dispatch. */
  logResult(result: DispatchResult): void {
    this.log(entryFromResult(result));
  }

  /**
   * Delete log rows older than `retentionDays`. Aggregate tables keep their totals.
   * @returns Number of rows deleted
   */
  prune(retentionDays: number, now: number = Date.now()): number {
    const cutoff = now - retentionDays * DAY_MS;
    const { changes } = this.pruneStmt.run(cutoff);
    if (changes > 0) {
      logger.info({ deleted: changes, retentionDays }, 'Pruned old dispatch logs');
    }
    return changes;
  }

  /** Prune now, then on an interval. The timer does not keep the process alive. */
  startPruner(retentionDays: number, intervalMs: number = PRUNE_INTERVAL_MS): void {
    this.stopPruner();
    this.prune(retentionDays);
    this.pruneTimer = setInterval(() => {
      try {
        this.prune(retentionDays);
      } catch (error) {
        logger.error({ error }, 'Failed to prune dispatch logs');
      }
    }, intervalMs);
    this.pruneTimer.unref();
  }

  /** Stop the pruner, if running. */
  stopPruner(): void {
    if (this.pruneTimer !== null) {
      clearInterval(this.pruneTimer);
      this.pruneTimer = null;
    }
  }
}
