/**
 * Database Schema Types
 *
 * TypeScript shapes for the `passages` table plus BLOB helpers.
 */

import { randomUUID } from 'node:crypto';

/**
 * A stored passage as read back from SQLite.
 */
export interface PassageRecord {
  id: string;
  /** Insertion order; ties in similarity are broken by it */
  seq: number;
  content: string;
  /** Originating document, usually a relative file path */
  source: string;
  embedding: Float32Array;
  metadata: Record<string, unknown>;
}

/**
 * Input for inserting a passage. `id` and `seq` are assigned on insert.
 */
export interface PassageInput {
  content: string;
  source: string;
  embedding: Float32Array;
  metadata?: Record<string, unknown>;
}

export function generateId(): string {
  return randomUUID();
}

/**
 * Convert Float32Array to Buffer for BLOB storage. Respects the view's
 * offset so subarrays serialize correctly.
 */
export function embeddingToBlob(embedding: Float32Array): Buffer {
  return Buffer.from(embedding.buffer, embedding.byteOffset, embedding.byteLength);
}

/**
 * Convert a BLOB back to Float32Array. Copies first: better-sqlite3 may
 * hand back a Buffer whose offset is not 4-byte aligned.
 */
export function blobToEmbedding(blob: Buffer): Float32Array {
  const copy = new Uint8Array(blob.byteLength);
  copy.set(blob);
  return new Float32Array(copy.buffer, 0, Math.floor(blob.byteLength / 4));
}
