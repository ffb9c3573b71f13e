/**
 * Answer Quality Tests
 */

import { describe, it, expect } from 'vitest';
import { coverageScore, evaluateAnswer, hasSafetyDisclaimer, summarizeQuality } from '../quality.js';
import type { Passage } from '../../search/types.js';

const PASSAGES: Passage[] = [
  { content: 'gout is a form of arthritis', source: 'gout.md', score: 0.9 },
  { content: 'uric acid crystals', source: 'uric.md', score: 0.6 },
];

// ============================================================================
// coverageScore
// ============================================================================

describe('coverageScore', () => {
  it('counts question tokens found in the answer', () => {
    expect(coverageScore('what is gout', 'gout is arthritis', PASSAGES)).toBeCloseTo(2 / 3, 6);
  });

  it('ignores case and repeated whitespace', () => {
    expect(coverageScore('  GOUT   Treatment ', 'gout treatment options', PASSAGES)).toBe(1);
  });

  it('is 0 without passages', () => {
    expect(coverageScore('what is gout', 'gout is arthritis', [])).toBe(0);
  });

  it('is 0 for a blank question', () => {
    expect(coverageScore('   ', 'anything', PASSAGES)).toBe(0);
  });

  it('treats an unspaced Chinese question as one token', () => {
    expect(coverageScore('痛风是什么', '痛风是一种关节炎', PASSAGES)).toBe(0);
  });
});

// ============================================================================
// hasSafetyDisclaimer
// ============================================================================

describe('hasSafetyDisclaimer', () => {
  it('detects each disclaimer phrase', () => {
    expect(hasSafetyDisclaimer('如有不适请咨询医生')).toBe(true);
    expect(hasSafetyDisclaimer('请寻求专业医疗帮助')).toBe(true);
    expect(hasSafetyDisclaimer('以上内容仅供参考')).toBe(true);
  });

  it('is false otherwise', () => {
    expect(hasSafetyDisclaimer('多喝水')).toBe(false);
  });
});

// ============================================================================
// evaluateAnswer
// ============================================================================

describe('evaluateAnswer', () => {
  it('reports retrieval and answer properties', () => {
    expect(evaluateAnswer('what is gout', 'gout is arthritis，仅供参考', PASSAGES)).toEqual({
      hasResults: true,
      numSources: 2,
      avgScore: 0.75,
      answerLength: 22,
      hasSafetyDisclaimer: true,
      coverageScore: 2 / 3,
    });
  });

  it('counts code points, not UTF-16 units', () => {
    expect(evaluateAnswer('q', '🩺ok', []).answerLength).toBe(3);
  });

  it('reports zeros without passages', () => {
    const report = evaluateAnswer('q', '', []);
    expect(report).toEqual({
      hasResults: false,
      numSources: 0,
      avgScore: 0,
      answerLength: 0,
      hasSafetyDisclaimer: false,
      coverageScore: 0,
    });
  });
});

// ============================================================================
// summarizeQuality
// ============================================================================

describe('summarizeQuality', () => {
  it('averages a batch', () => {
    const summary = summarizeQuality([
      evaluateAnswer('what is gout', 'gout is arthritis，仅供参考', PASSAGES),
      evaluateAnswer('q', 'abcd', []),
    ]);

    expect(summary.count).toBe(2);
    expect(summary.meanAvgScore).toBeCloseTo(0.375, 6);
    expect(summary.meanCoverage).toBeCloseTo(1 / 3, 6);
    expect(summary.meanAnswerLength).toBe(13);
    expect(summary.disclaimerRate).toBe(0.5);
    expect(summary.retrievalRate).toBe(0.5);
  });

  it('returns zeros for an empty batch', () => {
    expect(summarizeQuality([])).toEqual({
      count: 0,
      meanAvgScore: 0,
      meanCoverage: 0,
      meanAnswerLength: 0,
      disclaimerRate: 0,
      retrievalRate: 0,
    });
  });
});
