/**
 * Context Assembler
 *
 * Renders ranked passages into one bounded prompt fragment:
 *
 * ```
 * ==================================================
 * 【来源: hypertension.md | 相似度: 0.912】
 * 高血压的诊断标准...
 *
 * ---
 *
 * 【来源: guideline.md | 相似度: 0.874】
 * ...
 * ```
 *
 * Lengths are counted in UTF-16 code units (`String.length`).
 */

import type { Passage } from '../search/types.js';
import type { AssembledContext } from './types.js';

export const NO_KNOWLEDGE_FOUND = '未找到相关医疗知识。';
export const TRUNCATION_MARKER = '...';
export const CONTEXT_BANNER = '='.repeat(50);
export const SEGMENT_SEPARATOR = '\n\n---\n\n';

/**
 * Last segment of a slash-delimited source, or the source itself.
 */
export function sourceName(source: string): string {
  return source.slice(source.lastIndexOf('/') + 1);
}

function truncate(content: string, limit: number): string {
  return content.length > limit ? content.slice(0, limit) + TRUNCATION_MARKER : content;
}

function header(passage: Passage): string {
  return `【来源: ${sourceName(passage.source)} | 相似度: ${passage.score.toFixed(3)}】`;
}

function renderSegments(passages: readonly Passage[], limit: number): string[] {
  return passages.map((passage) => `${header(passage)}\n${truncate(passage.content, limit)}`);
}

function join(segments: readonly string[]): string {
  return `${CONTEXT_BANNER}\n${segments.join(SEGMENT_SEPARATOR)}`;
}

/**
 * Number of leading segments whose header fits inside `maxContextLength`,
 * and the offset where the first segment that does not fit would start.
 */
function fittingSegments(segments: readonly string[], headers: readonly string[], maxContextLength: number) {
  let offset = CONTEXT_BANNER.length + 1;
  let kept = 0;
  for (const [i, segment] of segments.entries()) {
    if (offset + (headers[i]?.length ?? 0) > maxContextLength) {
      break;
    }
    kept++;
    offset += segment.length + SEGMENT_SEPARATOR.length;
  }
  return { kept, cutAt: offset - SEGMENT_SEPARATOR.length };
}

/**
 * @param passages - Ranked best first; only the first `k` are used
 * @param k - Positive integer; each passage gets `floor(maxContextLength / k)` characters
 * @param maxContextLength - Upper bound on `text.length`. When the headers
 *   themselves do not fit, trailing passages are dropped from the result.
 * @throws RangeError on a non-positive `k` or `maxContextLength`
 */
export function assembleContext(passages: readonly Passage[], k: number, maxContextLength: number): AssembledContext {
  if (!Number.isInteger(k) || k < 1) {
    throw new RangeError(`k must be a positive integer, got ${k}`);
  }
  if (!Number.isInteger(maxContextLength) || maxContextLength < 1) {
    throw new RangeError(`maxContextLength must be a positive integer, got ${maxContextLength}`);
  }

  const used = passages.slice(0, k);
  if (used.length === 0) {
    return { text: NO_KNOWLEDGE_FOUND, passages: [], segments: 0, found: false };
  }

  const perPassage = Math.floor(maxContextLength / k);
  let segments = renderSegments(used, perPassage);
  let text = join(segments);

  if (text.length > maxContextLength) {
    // Headers and separators pushed it over; shrink every passage evenly
    const contentLength = used.reduce((sum, p) => sum + truncate(p.content, perPassage).length, 0);
    const overhead = text.length - contentLength;
    const share = Math.floor((maxContextLength - overhead) / used.length) - TRUNCATION_MARKER.length;
    segments = renderSegments(used, Math.max(0, Math.min(perPassage, share)));
    text = join(segments);
  }

  if (text.length <= maxContextLength) {
    return { text, passages: [...used], segments: used.length, found: true };
  }

  // Headers alone overflow: keep only the segments whose header is whole
  const { kept, cutAt } = fittingSegments(segments, used.map(header), maxContextLength);
  if (kept === 0) {
    return { text: NO_KNOWLEDGE_FOUND.slice(0, maxContextLength), passages: [], segments: 0, found: false };
  }
  return {
    text: text.slice(0, Math.min(cutAt, maxContextLength)),
    passages: used.slice(0, kept),
    segments: kept,
    found: true,
  };
}
