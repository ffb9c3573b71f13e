/**
 * Database Module
 *
 * SQLite storage for knowledge-base passages and their embeddings.
 *
 * @example
 * ```ts
 * import { getDatabase } from './database/index.js';
 *
 * const db = getDatabase();
 * console.log(db.countPassages());
 * ```
 */

export { getDb, openDb, closeDb } from './connection.js';
export { runMigrations, getMigrationCount, type MigrationResult } from './migrate.js';
export type { PassageRecord, PassageInput } from './schema.js';
export { generateId, embeddingToBlob, blobToEmbedding } from './schema.js';
export {
  PassageRowSchema,
  KbMetaRowSchema,
  type PassageRow,
  type KbMetaRow,
  SchemaValidationError,
  validateRow,
  validateRows,
} from './validation.js';
export { getDatabase, resetDatabase, DatabaseOperations, type KnowledgeBaseInfo } from './operations.js';
