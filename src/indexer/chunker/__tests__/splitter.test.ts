import { describe, it, expect } from 'vitest';
import { RecursiveTextSplitter } from '../splitter.js';

describe('RecursiveTextSplitter', () => {
  it('keeps short text as one chunk', () => {
    const splitter = new RecursiveTextSplitter();

    expect(splitter.split('  高血压是常见的慢性病。  ')).toEqual(['高血压是常见的慢性病。']);
  });

  it('splits on paragraph breaks first', () => {
    const splitter = new RecursiveTextSplitter({ chunkSize: 10, chunkOverlap: 0 });

    expect(splitter.split('第一段内容。\n\n第二段内容。')).toEqual(['第一段内容。', '第二段内容。']);
  });

  it('falls back to sentence punctuation within a long paragraph', () => {
    const splitter = new RecursiveTextSplitter({ chunkSize: 6, chunkOverlap: 0 });

    expect(splitter.split('多喝水。多休息。少熬夜。')).toEqual(['多喝水。', '多休息。', '少熬夜。']);
  });

  it('hard-splits text without separators, carrying the overlap', () => {
    const splitter = new RecursiveTextSplitter({ chunkSize: 4, chunkOverlap: 1 });

    expect(splitter.split('abcdefghij')).toEqual(['abcd', 'defg', 'ghij']);
  });

  it('never produces a chunk longer than chunkSize', () => {
    const splitter = new RecursiveTextSplitter({ chunkSize: 20, chunkOverlap: 5 });
    const text = '糖尿病患者应控制饮食，规律运动，按时服药，定期监测血糖。'.repeat(10);

    for (const chunk of splitter.split(text)) {
      expect(chunk.length).toBeLessThanOrEqual(20);
    }
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => new RecursiveTextSplitter({ chunkSize: 10, chunkOverlap: 10 })).toThrow(RangeError);
  });
});
