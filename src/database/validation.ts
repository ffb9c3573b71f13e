/**
 * Database Row Validation
 *
 * Zod schemas for validating database reads at runtime. better-sqlite3
 * returns `unknown` rows, so every read goes through one of these.
 *
 * ```ts
 * const row = db.prepare('SELECT * FROM passages WHERE id = ?').get(id);
 * return row ? validateRow(PassageRowSchema, row, `passages.id=${id}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';

// ============================================================================
// Passage Schema
// ============================================================================

/**
 * `embedding` is a Buffer (BLOB); conversion to Float32Array happens in
 * operations.ts.
 */
export const PassageRowSchema = z.object({
  id: z.string(),
  seq: z.number().int().nonnegative(),
  content: z.string(),
  source: z.string(),
  embedding: z.instanceof(Buffer),
  metadata: z.string().nullable(),
  created_at: z.string(),
});

export type PassageRow = z.infer<typeof PassageRowSchema>;

export const KbMetaRowSchema = z.object({
  key: z.string(),
  value: z.string(),
});

export type KbMetaRow = z.infer<typeof KbMetaRowSchema>;

// ============================================================================
// Schema Validation Error
// ============================================================================

/**
 * Thrown when a database row fails schema validation, usually after a
 * failed migration or a database written by another version.
 *
 * Exit code 5, same as DatabaseError.
 */
export class SchemaValidationError extends CLIError {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const issuesSummary = formattedIssues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${issuesSummary}` +
      (formattedIssues.length > 3 ? `\n  ... and ${formattedIssues.length - 3} more` : '') +
      `\n\nThis may indicate a database/code version mismatch.\n` +
      `Try: medqa index <dir> --rebuild  to recreate the knowledge base`;

    super(message, hint, 5);
    this.name = 'SchemaValidationError';
    this.issues = formattedIssues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validate a single database row.
 *
 * @param context - Shown in the error message (e.g. "passages.id=abc")
 * @throws SchemaValidationError if validation fails
 */
export function validateRow<T extends z.ZodSchema>(schema: T, row: unknown, context: string): z.output<T> {
  const result = schema.safeParse(row);

  if (result.success) {
    return result.data;
  }

  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate an array of rows. Throws on the first invalid row unless
 * `continueOnError` is set, in which case invalid rows are reported to
 * `onError` and skipped.
 */
export function validateRows<T extends z.ZodSchema>(
  schema: T,
  rows: unknown[],
  context: string,
  options?: {
    continueOnError?: boolean;
    onError?: (row: unknown, error: z.ZodError) => void;
  }
): z.output<T>[] {
  const valid: z.output<T>[] = [];

  for (let i = 0; i < rows.length; i++) {
    const row = rows[i];
    const result = schema.safeParse(row);

    if (result.success) {
      valid.push(result.data);
    } else if (options?.continueOnError) {
      options.onError?.(row, result.error);
    } else {
      throw new SchemaValidationError(`Database schema mismatch in ${context}[${i}]`, result.error.issues);
    }
  }

  return valid;
}
