/**
 * JSON Utilities
 *
 * Safe JSON parsing for payloads we don't control: tool-call arguments
 * produced by a language model and metadata columns read back from SQLite.
 */

/**
 * Narrowing check for plain JSON objects.
 */
export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON string, returning `fallback` when it is missing, malformed,
 * or fails the `guard`.
 *
 * @param onError - Called with the parse error and the raw text
 *
 * @example
 * ```typescript
 * const metadata = safeJsonParse(row.metadata, isJsonObject, {});
 *
 * const args = safeJsonParse(raw, isJsonObject, {}, (err) => {
 *   logger.warn(`Bad tool arguments: ${err.message}`);
 * });
 * ```
 */
export function safeJsonParse<T>(
  json: string | null | undefined,
  guard: (value: unknown) => value is T,
  fallback: T,
  onError?: (error: Error, rawValue: string) => void
): T {
  if (json === null || json === undefined) {
    return fallback;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    if (onError && error instanceof Error) {
      onError(error, json);
    }
    return fallback;
  }

  if (!guard(parsed)) {
    onError?.(new Error('JSON value has an unexpected shape'), json);
    return fallback;
  }
  return parsed;
}
