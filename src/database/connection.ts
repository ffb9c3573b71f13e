/**
 * Database Connection Module
 *
 * Provides a singleton SQLite connection using better-sqlite3.
 * The knowledge base lives at ~/.medqa/knowledge.db
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { getDbPath } from '../config/paths.js';
import { DatabaseError } from '../errors/index.js';

// Module-level singleton instance
let db: Database.Database | null = null;

/**
 * Open a connection with the pragmas every connection needs.
 * Pass ':memory:' for a throwaway database (tests).
 */
export function openDb(path: string): Database.Database {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  let connection: Database.Database;
  try {
    connection = new Database(path);
  } catch (error) {
    throw new DatabaseError(
      `Could not open knowledge base at ${path}`,
      error instanceof Error ? error : undefined
    );
  }

  connection.pragma('foreign_keys = ON');
  if (path !== ':memory:') {
    // WAL for concurrent reads while `medqa index` writes
    connection.pragma('journal_mode = WAL');
  }
  return connection;
}

/**
 * Get the singleton database instance, creating it on first call.
 *
 * @example
 * ```ts
 * const db = getDb();
 * const count = countPassages(db);
 * ```
 */
export function getDb(): Database.Database {
  if (db) {
    return db;
  }

  db = openDb(getDbPath());
  process.on('exit', () => closeDb());
  return db;
}

/**
 * Close the database connection.
 * Safe to call multiple times or when no connection exists.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
