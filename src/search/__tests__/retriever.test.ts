import { describe, expect, it, vi } from 'vitest';

import { KnowledgeRetriever, UNKNOWN_SOURCE } from '../retriever.js';
import type { Passage, SimilarityIndex } from '../types.js';

function staticIndex(passages: Passage[]): SimilarityIndex {
  return {
    similaritySearch: vi.fn((_query: string, k: number) => Promise.resolve(passages.slice(0, k))),
  };
}

function failingIndex(message: string): SimilarityIndex {
  return { similaritySearch: () => Promise.reject(new Error(message)) };
}

const passages: Passage[] = [
  { content: '高血压诊断标准为收缩压≥140mmHg', source: 'hypertension.md', score: 0.91 },
  { content: '血压测量需多次进行', source: 'hypertension.md', score: 0.82 },
  { content: '糖尿病的诊断', source: '', score: 0.4 },
];

describe('KnowledgeRetriever', () => {
  it('passes k through and keeps the index order', async () => {
    const index = staticIndex(passages);
    const retriever = new KnowledgeRetriever(index, {}, { warn: vi.fn() });

    const result = await retriever.search('高血压诊断标准', 2);

    expect(index.similaritySearch).toHaveBeenCalledWith('高血压诊断标准', 2, {});
    expect(result.map((p) => p.score)).toEqual([0.91, 0.82]);
  });

  it('fills in a missing source', async () => {
    const retriever = new KnowledgeRetriever(staticIndex(passages), {}, { warn: vi.fn() });
    const result = await retriever.search('q', 3);
    expect(result[2]?.source).toBe(UNKNOWN_SOURCE);
  });

  it('returns frozen passages', async () => {
    const retriever = new KnowledgeRetriever(staticIndex(passages), {}, { warn: vi.fn() });
    const [first] = await retriever.search('q', 1);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('drops passages below minScore', async () => {
    const retriever = new KnowledgeRetriever(staticIndex(passages), { minScore: 0.8 }, { warn: vi.fn() });
    const result = await retriever.search('q', 3);
    expect(result).toHaveLength(2);
  });

  it('truncates an index that returns too many passages', async () => {
    const greedy: SimilarityIndex = { similaritySearch: () => Promise.resolve(passages) };
    const retriever = new KnowledgeRetriever(greedy, {}, { warn: vi.fn() });
    expect(await retriever.search('q', 1)).toHaveLength(1);
  });

  it('returns an empty list and logs when the index fails', async () => {
    const warn = vi.fn();
    const retriever = new KnowledgeRetriever(failingIndex('connection refused'), {}, { warn });

    await expect(retriever.search('q', 3)).resolves.toEqual([]);
    expect(warn).toHaveBeenCalledWith('Knowledge search failed: connection refused');
  });

  it('reports the failure in searchDetailed', async () => {
    const retriever = new KnowledgeRetriever(failingIndex('connection refused'), {}, { warn: vi.fn() });
    const outcome = await retriever.searchDetailed('q', 3);
    expect(outcome).toEqual({ passages: [], error: 'connection refused' });
  });

  it('has no error when nothing matched', async () => {
    const retriever = new KnowledgeRetriever(staticIndex([]), {}, { warn: vi.fn() });
    const outcome = await retriever.searchDetailed('q', 3);
    expect(outcome).toEqual({ passages: [] });
  });

  it('refuses a non-positive k without calling the index', async () => {
    const index = staticIndex(passages);
    const retriever = new KnowledgeRetriever(index, {}, { warn: vi.fn() });

    const outcome = await retriever.searchDetailed('q', 0);

    expect(outcome.passages).toEqual([]);
    expect(outcome.error).toBe('k must be a positive integer, got 0');
    expect(index.similaritySearch).not.toHaveBeenCalled();
  });
});
