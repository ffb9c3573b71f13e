/**
 * knowledge_search: the knowledge base, exposed to the model as a tool.
 */

import { z } from 'zod';
import type { KnowledgeRetriever } from '../../search/retriever.js';
import type { Passage } from '../../search/types.js';
import { sourceName } from '../context-assembler.js';
import { defineTool, type Tool } from './registry.js';

export const KNOWLEDGE_SEARCH_DEFAULT_TOP_K = 3;
export const NO_SEARCH_RESULTS = '未找到相关医疗信息';

const inputSchema = z.object({
  query: z.string().min(1),
  top_k: z.number().int().min(1).max(20).optional(),
});

/**
 * Numbered result blocks, one per passage.
 */
export function formatSearchResults(passages: readonly Passage[]): string {
  if (passages.length === 0) {
    return NO_SEARCH_RESULTS;
  }
  return passages
    .map((passage, i) => `结果${i + 1}: 来源: ${sourceName(passage.source)}\n${passage.content}`)
    .join('\n\n');
}

export function createKnowledgeSearchTool(retriever: Pick<KnowledgeRetriever, 'searchDetailed'>): Tool {
  return defineTool({
    name: 'knowledge_search',
    description: '搜索医疗知识库，获取相关医疗信息',
    parameters: {
      type: 'object',
      properties: {
        query: { type: 'string', description: '搜索查询词' },
        top_k: { type: 'integer', description: '返回结果数量', default: KNOWLEDGE_SEARCH_DEFAULT_TOP_K },
      },
      required: ['query'],
    },
    input: inputSchema,
    handler: async (input, context) => {
      const outcome = await retriever.searchDetailed(input.query, input.top_k ?? KNOWLEDGE_SEARCH_DEFAULT_TOP_K, {
        signal: context.signal,
      });
      if (outcome.error !== undefined) {
        return `搜索医疗知识时出错: ${outcome.error}`;
      }
      return formatSearchResults(outcome.passages);
    },
  });
}
