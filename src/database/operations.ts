/**
 * Database Operations
 *
 * Typed access to the passage store. Handles Float32Array <-> BLOB
 * conversion, metadata JSON, and batch inserts inside a transaction.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { isJsonObject, safeJsonParse } from '../utils/json.js';
import { getDb } from './connection.js';
import { runMigrations } from './migrate.js';
import { blobToEmbedding, embeddingToBlob, generateId, type PassageInput, type PassageRecord } from './schema.js';
import { KbMetaRowSchema, PassageRowSchema, validateRow, validateRows, type PassageRow } from './validation.js';

/**
 * Which embedding model produced the stored vectors. Queries must be
 * embedded with the same model for scores to mean anything.
 */
export interface KnowledgeBaseInfo {
  embeddingModel: string | null;
  dimensions: number | null;
  passageCount: number;
}

const CountRowSchema = z.object({ count: z.number().int().nonnegative() });
const SourceRowSchema = z.object({ source: z.string(), count: z.number().int().nonnegative() });
const MaxSeqRowSchema = z.object({ max_seq: z.number().int().nullable() });

function toRecord(row: PassageRow): PassageRecord {
  return {
    id: row.id,
    seq: row.seq,
    content: row.content,
    source: row.source,
    embedding: blobToEmbedding(row.embedding),
    metadata: row.metadata === null ? {} : safeJsonParse(row.metadata, isJsonObject, {}),
  };
}

export class DatabaseOperations {
  constructor(private readonly db: Database.Database) {}

  get raw(): Database.Database {
    return this.db;
  }

  /**
   * Insert passages in one transaction. Returns the generated ids in input
   * order; `seq` continues from the current maximum.
   */
  insertPassages(passages: PassageInput[]): string[] {
    const insert = this.db.prepare(
      'INSERT INTO passages (id, seq, content, source, embedding, metadata) VALUES (?, ?, ?, ?, ?, ?)'
    );
    const maxSeq = this.db.prepare('SELECT MAX(seq) AS max_seq FROM passages');

    return this.db.transaction((items: PassageInput[]) => {
      const current = validateRow(MaxSeqRowSchema, maxSeq.get(), 'passages.max_seq').max_seq;
      let seq = current === null ? 0 : current + 1;
      const ids: string[] = [];
      for (const item of items) {
        const id = generateId();
        insert.run(
          id,
          seq++,
          item.content,
          item.source,
          embeddingToBlob(item.embedding),
          item.metadata ? JSON.stringify(item.metadata) : null
        );
        ids.push(id);
      }
      return ids;
    })(passages);
  }

  /**
   * Replace every passage of the sources present in `passages`, atomically.
   * Re-indexing a file therefore never leaves duplicates behind.
   */
  replaceSources(passages: PassageInput[]): string[] {
    return this.db.transaction((items: PassageInput[]) => {
      for (const source of new Set(items.map((p) => p.source))) {
        this.deleteBySource(source);
      }
      return this.insertPassages(items);
    })(passages);
  }

  /** All passages in insertion order. */
  loadPassages(): PassageRecord[] {
    const rows = this.db.prepare('SELECT * FROM passages ORDER BY seq ASC').all();
    return validateRows(PassageRowSchema, rows, 'passages').map(toRecord);
  }

  countPassages(): number {
    return validateRow(CountRowSchema, this.db.prepare('SELECT COUNT(*) AS count FROM passages').get(), 'passages.count')
      .count;
  }

  /** Sources with their passage counts, alphabetically. */
  listSources(): Array<{ source: string; count: number }> {
    const rows = this.db
      .prepare('SELECT source, COUNT(*) AS count FROM passages GROUP BY source ORDER BY source ASC')
      .all();
    return validateRows(SourceRowSchema, rows, 'passages.sources');
  }

  deleteBySource(source: string): number {
    return this.db.prepare('DELETE FROM passages WHERE source = ?').run(source).changes;
  }

  /** Remove every passage and the recorded embedding model. */
  clear(): void {
    this.db.transaction(() => {
      this.db.prepare('DELETE FROM passages').run();
      this.db.prepare('DELETE FROM kb_meta').run();
    })();
  }

  setEmbeddingInfo(model: string, dimensions: number): void {
    const upsert = this.db.prepare(
      'INSERT INTO kb_meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value'
    );
    this.db.transaction(() => {
      upsert.run('embedding_model', model);
      upsert.run('embedding_dimensions', String(dimensions));
    })();
  }

  getInfo(): KnowledgeBaseInfo {
    const rows = validateRows(KbMetaRowSchema, this.db.prepare('SELECT key, value FROM kb_meta').all(), 'kb_meta');
    const meta = new Map(rows.map((row) => [row.key, row.value]));
    const dims = meta.get('embedding_dimensions');

    return {
      embeddingModel: meta.get('embedding_model') ?? null,
      dimensions: dims === undefined ? null : Number.parseInt(dims, 10),
      passageCount: this.countPassages(),
    };
  }
}

let instance: DatabaseOperations | null = null;

/**
 * Operations over the default knowledge base, migrated on first use.
 */
export function getDatabase(): DatabaseOperations {
  if (!instance) {
    const db = getDb();
    runMigrations(db);
    instance = new DatabaseOperations(db);
  }
  return instance;
}

/** Drop the cached instance (tests, or after closeDb()). */
export function resetDatabase(): void {
  instance = null;
}
