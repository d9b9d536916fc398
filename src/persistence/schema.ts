/**
 * Database schema migration system using PRAGMA user_version.
 * Manages schema evolution with idempotent migrations.
 */

import type Database from 'better-sqlite3';
import { logger } from '../shared/logger.js';

/** Ordered migrations; index i takes the schema from version i to i + 1. */
const MIGRATIONS: Array<(db: Database.Database) => void> = [
  // Migration 1: dispatch log, per-operation and per-credential aggregates, and their triggers
  (db) => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS dispatch_logs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp INTEGER NOT NULL,
        operation TEXT NOT NULL,
        cache_key TEXT,
        cache_status TEXT,
        credential_id TEXT,
        attempts INTEGER NOT NULL,
        latency_ms INTEGER NOT NULL,
        http_status INTEGER NOT NULL,
        outcome TEXT NOT NULL CHECK (outcome IN ('success', 'failure')),
        error_code TEXT,
        error_message TEXT
      );

      CREATE TABLE IF NOT EXISTS usage_by_operation (
        operation TEXT PRIMARY KEY,
        total_requests INTEGER NOT NULL DEFAULT 0,
        successful_requests INTEGER NOT NULL DEFAULT 0,
        failed_requests INTEGER NOT NULL DEFAULT 0,
        cache_hits INTEGER NOT NULL DEFAULT 0,
        total_attempts INTEGER NOT NULL DEFAULT 0,
        total_latency_ms INTEGER NOT NULL DEFAULT 0,
        last_request_timestamp INTEGER
      );

      CREATE TABLE IF NOT EXISTS usage_by_credential (
        credential_id TEXT PRIMARY KEY,
        total_requests INTEGER NOT NULL DEFAULT 0,
        successful_requests INTEGER NOT NULL DEFAULT 0,
        failed_requests INTEGER NOT NULL DEFAULT 0,
        total_attempts INTEGER NOT NULL DEFAULT 0,
        last_request_timestamp INTEGER
      );

      CREATE INDEX IF NOT EXISTS idx_dispatch_timestamp ON dispatch_logs(timestamp DESC);
      CREATE INDEX IF NOT EXISTS idx_dispatch_operation ON dispatch_logs(operation);

      CREATE TRIGGER IF NOT EXISTS update_operation_usage
      AFTER INSERT ON dispatch_logs
      BEGIN
        INSERT INTO usage_by_operation (
          operation,
          total_requests,
          successful_requests,
          failed_requests,
          cache_hits,
          total_attempts,
          total_latency_ms,
          last_request_timestamp
        )
        VALUES (
          NEW.operation,
          1,
          NEW.outcome = 'success',
          NEW.outcome = 'failure',
          COALESCE(NEW.cache_status = 'hit', 0),
          NEW.attempts,
          NEW.latency_ms,
          NEW.timestamp
        )
        ON CONFLICT(operation) DO UPDATE SET
          total_requests = total_requests + 1,
          successful_requests = successful_requests + (NEW.outcome = 'success'),
          failed_requests = failed_requests + (NEW.outcome = 'failure'),
          cache_hits = cache_hits + COALESCE(NEW.cache_status = 'hit', 0),
          total_attempts = total_attempts + NEW.attempts,
          total_latency_ms = total_latency_ms + NEW.latency_ms,
          last_request_timestamp = MAX(last_request_timestamp, NEW.timestamp);
      END;

      -- Only dispatches that leased a credential count toward it
      CREATE TRIGGER IF NOT EXISTS update_credential_usage
      AFTER INSERT ON dispatch_logs
      WHEN NEW.credential_id IS NOT NULL
      BEGIN
        INSERT INTO usage_by_credential (
          credential_id,
          total_requests,
          successful_requests,
          failed_requests,
          total_attempts,
          last_request_timestamp
        )
        VALUES (
          NEW.credential_id,
          1,
          NEW.outcome = 'success',
          NEW.outcome = 'failure',
          NEW.attempts,
          NEW.timestamp
        )
        ON CONFLICT(credential_id) DO UPDATE SET
          total_requests = total_requests + 1,
          successful_requests = successful_requests + (NEW.outcome = 'success'),
          failed_requests = failed_requests + (NEW.outcome = 'failure'),
          total_attempts = total_attempts + NEW.attempts,
          last_request_timestamp = MAX(last_request_timestamp, NEW.timestamp);
      END;
    `);
  },
];

/** Schema version this build migrates to. */
export const SCHEMA_VERSION = MIGRATIONS.length;

/**
 * Run schema migrations to bring database to current version.
 * @param db - Database instance to migrate
 */
export function migrateSchema(db: Database.Database): void {
  const version = db.pragma('user_version', { simple: true });
  const currentVersion = typeof version === 'number' ? version : 0;
  logger.info({ currentVersion }, 'Database schema version check');

  MIGRATIONS.slice(currentVersion).forEach((migrate, offset) => {
    const targetVersion = currentVersion + offset + 1;
    logger.info({ from: targetVersion - 1, to: targetVersion }, 'Running database migration');
    db.transaction(() => {
      migrate(db);
      db.pragma(`user_version = ${targetVersion}`);
    })();
  });

  if (currentVersion < SCHEMA_VERSION) {
    logger.info({ version: SCHEMA_VERSION }, 'Database migrations complete');
  }
}
