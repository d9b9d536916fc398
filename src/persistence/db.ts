/**
 * Database initialization for the SQLite dispatch log.
 * Sets up connection with WAL mode and performance pragmas.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { logger } from '../shared/logger.js';

/** Path that opens a private in-memory database. */
export const IN_MEMORY = ':memory:';

/**
 * Initialize SQLite database with WAL mode and performance pragmas.
 * @param dbPath - Path to SQLite database file, or `:memory:`
 * @returns Database instance ready for use
 */
export function initializeDatabase(dbPath: string): Database.Database {
  if (dbPath === IN_MEMORY) {
    logger.debug('Opening in-memory SQLite database');
    return new Database(IN_MEMORY);
  }

  // Ensure parent directory exists
  mkdirSync(dirname(dbPath), { recursive: true });

  const db = new Database(dbPath);

  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('cache_size = -64000');
  db.pragma('temp_store = MEMORY');

  logger.info({ dbPath, journalMode: 'WAL' }, 'SQLite database initialized');

  return db;
}
