/**
 * Answer Quality Evaluation
 *
 * Post-hoc scoring of one answer against its question and the passages
 * it was grounded on. Pure and deterministic; no model calls.
 */

import type { Passage } from '../search/types.js';

export const DISCLAIMER_PHRASES: readonly string[] = ['咨询医生', '专业医疗', '仅供参考'];

export interface QualityReport {
  hasResults: boolean;
  numSources: number;
  /** Mean cosine similarity of the passages; 0 without passages */
  avgScore: number;
  /** In Unicode code points */
  answerLength: number;
  hasSafetyDisclaimer: boolean;
  /** In [0, 1] */
  coverageScore: number;
}

function tokenSet(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/\s+/)
      .filter((token) => token !== '')
  );
}

/**
 * Share of the question's whitespace-separated tokens that also appear in
 * the answer. 0 when nothing was retrieved or the question has no tokens.
 *
 * @example
 * coverageScore('what is gout', 'gout is arthritis', passages) // => 0.667
 */
export function coverageScore(question: string, answer: string, passages: readonly Passage[]): number {
  if (passages.length === 0) {
    return 0;
  }
  const questionTokens = tokenSet(question);
  if (questionTokens.size === 0) {
    return 0;
  }
  const answerTokens = tokenSet(answer);
  let shared = 0;
  for (const token of questionTokens) {
    if (answerTokens.has(token)) shared++;
  }
  return Math.min(shared / questionTokens.size, 1);
}

export function hasSafetyDisclaimer(answer: string): boolean {
  const lowered = answer.toLowerCase();
  return DISCLAIMER_PHRASES.some((phrase) => lowered.includes(phrase));
}

export function evaluateAnswer(question: string, answer: string, passages: readonly Passage[]): QualityReport {
  const total = passages.reduce((sum, passage) => sum + passage.score, 0);
  return {
    hasResults: passages.length > 0,
    numSources: passages.length,
    avgScore: passages.length > 0 ? total / passages.length : 0,
    answerLength: [...answer].length,
    hasSafetyDisclaimer: hasSafetyDisclaimer(answer),
    coverageScore: coverageScore(question, answer, passages),
  };
}

export interface QualitySummary {
  count: number;
  meanAvgScore: number;
  meanCoverage: number;
  meanAnswerLength: number;
  /** Share of answers carrying a disclaimer, in [0, 1] */
  disclaimerRate: number;
  /** Share of answers that had retrieved passages, in [0, 1] */
  retrievalRate: number;
}

/**
 * Averages over a batch of reports. All zeros for an empty batch.
 */
export function summarizeQuality(reports: readonly QualityReport[]): QualitySummary {
  const count = reports.length;
  if (count === 0) {
    return { count: 0, meanAvgScore: 0, meanCoverage: 0, meanAnswerLength: 0, disclaimerRate: 0, retrievalRate: 0 };
  }
  const mean = (pick: (report: QualityReport) => number): number =>
    reports.reduce((sum, report) => sum + pick(report), 0) / count;

  return {
    count,
    meanAvgScore: mean((r) => r.avgScore),
    meanCoverage: mean((r) => r.coverageScore),
    meanAnswerLength: mean((r) => r.answerLength),
    disclaimerRate: mean((r) => (r.hasSafetyDisclaimer ? 1 : 0)),
    retrievalRate: mean((r) => (r.hasResults ? 1 : 0)),
  };
}
