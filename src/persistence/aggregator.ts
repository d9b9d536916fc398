/**
 * Usage aggregator for reading materialized dispatch statistics.
 * Provides O(1) reads from pre-computed aggregation tables.
 */

import type Database from 'better-sqlite3';

/** Per-operation usage (aggregated via trigger). */
export interface OperationUsage {
  operation: string;
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  cacheHits: number;
  totalAttempts: number;
  avgLatencyMs: number;
  lastRequestTimestamp: number | null;
}

/** Per-credential usage (aggregated via trigger). */
export interface CredentialUsage {
  credentialId: string;
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  totalAttempts: number;
  lastRequestTimestamp: number | null;
}

/** Raw dispatch log row (for recent dispatch display). */
export interface DispatchLogRow {
  id: number;
  timestamp: number;
  operation: string;
  cacheStatus: string | null;
  credentialId: string | null;
  attempts: number;
  latencyMs: number;
  httpStatus: number;
  outcome: string;
  errorCode: string | null;
  errorMessage: string | null;
}

const OPERATION_COLUMNS = `
  operation,
  total_requests as totalRequests,
  successful_requests as successfulRequests,
  failed_requests as failedRequests,
  cache_hits as cacheHits,
  total_attempts as totalAttempts,
  CAST(ROUND(CAST(total_latency_ms AS REAL) / total_requests) AS INTEGER) as avgLatencyMs,
  last_request_timestamp as lastRequestTimestamp
`;

const CREDENTIAL_COLUMNS = `
  credential_id as credentialId,
  total_requests as totalRequests,
  successful_requests as successfulRequests,
  failed_requests as failedRequests,
  total_attempts as totalAttempts,
  last_request_timestamp as lastRequestTimestamp
`;

/**
 * UsageAggregator provides read access to aggregated dispatch statistics.
 * All data is pre-computed via SQLite triggers, so reads are fast O(1) lookups.
 */
export class UsageAggregator {
  private getAllOperationUsageStmt: Database.Statement<[], OperationUsage>;
  private getOperationUsageStmt: Database.Statement<[string], OperationUsage>;
  private getAllCredentialUsageStmt: Database.Statement<[], CredentialUsage>;
  private getRecentDispatchesStmt: Database.Statement<[number], DispatchLogRow>;

  constructor(db: Database.Database) {
    this.getAllOperationUsageStmt = db.prepare<[], OperationUsage>(`
      SELECT ${OPERATION_COLUMNS}
      FROM usage_by_operation
      ORDER BY last_request_timestamp DESC, operation
    `);

    this.getOperationUsageStmt = db.prepare<[string], OperationUsage>(`
      SELECT ${OPERATION_COLUMNS}
      FROM usage_by_operation
      WHERE operation = ?
    `);

    this.getAllCredentialUsageStmt = db.prepare<[], CredentialUsage>(`
      SELECT ${CREDENTIAL_COLUMNS}
      FROM usage_by_credential
      ORDER BY credential_id
    `);

    this.getRecentDispatchesStmt = db.prepare<[number], DispatchLogRow>(`
      SELECT
        id,
        timestamp,
        operation,
        cache_status as cacheStatus,
        credential_id as credentialId,
        attempts,
        latency_ms as latencyMs,
        http_status as httpStatus,
        outcome,
        error_code as errorCode,
        error_message as errorMessage
      FROM dispatch_logs
      ORDER BY timestamp DESC, id DESC
      LIMIT ?
    `);
  }

  /** Usage statistics for all operations, most recently used first. */
  getAllOperationUsage(): OperationUsage[] {
    return this.getAllOperationUsageStmt.all();
  }

  /** Usage statistics for one operation, or null if it was never dispatched. */
  getOperationUsage(operation: string): OperationUsage | null {
    return this.getOperationUsageStmt.get(operation) ?? null;
  }

  /** Usage statistics for every credential that has served a dispatch. */
  getAllCredentialUsage(): CredentialUsage[] {
    return this.getAllCredentialUsageStmt.all();
  }

  /** Most recent dispatches, newest first. */
  getRecentDispatches(limit: number = 50): DispatchLogRow[] {
    return this.getRecentDispatchesStmt.all(limit);
  }
}
