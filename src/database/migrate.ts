/**
 * Database Migration Runner
 *
 * Applies SQL migrations in order, tracking which have been applied in
 * `_migrations`. Safe to run on every start.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { getDb } from './connection.js';
import { validateRows } from './validation.js';

export interface MigrationResult {
  /** Names of migrations that were successfully applied */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// SQL is embedded so the built CLI needs no files next to it
const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-initial.sql',
    sql: `
-- Passages: one chunk of reference text with its embedding
CREATE TABLE IF NOT EXISTS passages (
  id TEXT PRIMARY KEY,
  seq INTEGER NOT NULL,
  content TEXT NOT NULL,
  source TEXT NOT NULL,
  embedding BLOB NOT NULL,
  metadata TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE UNIQUE INDEX IF NOT EXISTS idx_passages_seq ON passages(seq);
CREATE INDEX IF NOT EXISTS idx_passages_source ON passages(source);
    `.trim(),
  },
  {
    name: '002-knowledge-base-meta.sql',
    sql: `
-- Which embedding model produced the stored vectors
CREATE TABLE IF NOT EXISTS kb_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);
    `.trim(),
  },
];

const MigrationNameRowSchema = z.object({ name: z.string() });

/**
 * Run all pending migrations.
 *
 * Failed migrations do not stop subsequent ones from being attempted.
 *
 * @example
 * ```ts
 * const result = runMigrations();
 * for (const { name, error } of result.failed) {
 *   logger.warn(`Migration ${name} failed: ${error}`);
 * }
 * ```
 */
export function runMigrations(db: Database.Database = getDb()): MigrationResult {
  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const done = new Set(
    validateRows(MigrationNameRowSchema, db.prepare('SELECT name FROM _migrations').all(), '_migrations').map(
      (row) => row.name
    )
  );

  for (const migration of MIGRATIONS) {
    if (done.has(migration.name)) {
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();
      applied.push(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return { applied, failed };
}

export function getMigrationCount(): number {
  return MIGRATIONS.length;
}
