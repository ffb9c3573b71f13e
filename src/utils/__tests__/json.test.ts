/**
 * Tests for safe JSON parsing utility
 */

import { describe, it, expect, vi } from 'vitest';
import { safeJsonParse, isJsonObject } from '../json.js';

describe('isJsonObject', () => {
  it('accepts plain objects only', () => {
    expect(isJsonObject({ a: 1 })).toBe(true);
    expect(isJsonObject([1])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
    expect(isJsonObject('text')).toBe(false);
  });
});

describe('safeJsonParse', () => {
  it('parses a valid JSON object', () => {
    const result = safeJsonParse('{"query":"高血压","top_k":3}', isJsonObject, {});
    expect(result).toEqual({ query: '高血压', top_k: 3 });
  });

  it('returns fallback for null and undefined input', () => {
    expect(safeJsonParse(null, isJsonObject, { empty: true })).toEqual({ empty: true });
    expect(safeJsonParse(undefined, isJsonObject, { empty: true })).toEqual({ empty: true });
  });

  it('returns fallback and reports malformed JSON', () => {
    const onError = vi.fn();
    const result = safeJsonParse('{"query":', isJsonObject, {}, onError);

    expect(result).toEqual({});
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]?.[1]).toBe('{"query":');
  });

  it('returns fallback when the guard rejects the value', () => {
    const onError = vi.fn();
    const result = safeJsonParse('[1,2,3]', isJsonObject, { fallback: 1 }, onError);

    expect(result).toEqual({ fallback: 1 });
    expect(onError).toHaveBeenCalledTimes(1);
  });

  it('does not require an error callback', () => {
    expect(safeJsonParse('not json', isJsonObject, {})).toEqual({});
  });
});
