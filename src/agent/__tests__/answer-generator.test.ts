import { describe, it, expect, vi } from 'vitest';

import { AnswerGenerator } from '../answer-generator.js';
import { GENERATION_FAILED_MESSAGE, RAG_SYSTEM_PROMPT, llmUserMessage, ragUserMessage } from '../prompts.js';
import { ScriptedBackend, textReply } from '../../test-utils/index.js';
import { silentLogger } from '../../utils/logger.js';
import type { BackendReply } from '../../providers/types.js';

const CONTEXT = '【来源: gout.md | 相似度: 0.880】\n痛风与尿酸升高有关';

describe('AnswerGenerator', () => {
  it('sends the system prompt and the rag template', async () => {
    const backend = new ScriptedBackend([textReply('痛风与尿酸有关，请咨询医生。')]);
    const generator = new AnswerGenerator(backend, { temperature: 0.2, maxTokens: 800, logger: silentLogger });

    const result = await generator.generate('什么是痛风？', CONTEXT, { systemPrompt: RAG_SYSTEM_PROMPT, ragEnabled: true });

    expect(result).toEqual({ answer: '痛风与尿酸有关，请咨询医生。', degraded: false });
    expect(backend.requests[0]).toEqual({
      messages: [
        { role: 'system', content: RAG_SYSTEM_PROMPT },
        { role: 'user', content: ragUserMessage('什么是痛风？', CONTEXT) },
      ],
      temperature: 0.2,
      maxTokens: 800,
    });
  });

  it('uses the plain template when RAG is off or the context is empty', () => {
    const generator = new AnswerGenerator(new ScriptedBackend([textReply('ok')]), { logger: silentLogger });

    const off = generator.buildRequest('q', CONTEXT, { systemPrompt: 's', ragEnabled: false });
    const empty = generator.buildRequest('q', '', { systemPrompt: 's', ragEnabled: true });

    expect(off.messages[1]).toEqual({ role: 'user', content: llmUserMessage('q') });
    expect(empty.messages[1]).toEqual({ role: 'user', content: llmUserMessage('q') });
    expect(off.temperature).toBe(0.1);
    expect(off.maxTokens).toBe(1500);
  });

  it('degrades to an apology plus context on backend failure', async () => {
    const warn = vi.fn();
    const backend = new ScriptedBackend([new Error('connection reset')]);
    const generator = new AnswerGenerator(backend, { logger: { warn } });

    const result = await generator.generate('q', CONTEXT, { systemPrompt: 's', ragEnabled: true });

    expect(result).toEqual({
      answer: `${GENERATION_FAILED_MESSAGE}\n\n基于检索到的信息，相关内容如下：\n${CONTEXT}`,
      degraded: true,
      error: 'connection reset',
    });
    expect(warn).toHaveBeenCalledWith('Answer generation failed: connection reset');
  });

  it('treats an empty reply as a failure', async () => {
    const generator = new AnswerGenerator(new ScriptedBackend([textReply('  ')]), { logger: silentLogger });

    const result = await generator.generate('q', '', { systemPrompt: 's', ragEnabled: false });

    expect(result).toEqual({
      answer: GENERATION_FAILED_MESSAGE,
      degraded: true,
      error: 'Invalid backend response: empty answer',
    });
  });

  it('gives up when the deadline passes', async () => {
    const backend = new ScriptedBackend([() => new Promise<BackendReply>(() => {})]);
    const generator = new AnswerGenerator(backend, { requestTimeoutMs: 20, logger: silentLogger });

    const result = await generator.generate('q', '', { systemPrompt: 's', ragEnabled: false });

    expect(result.degraded).toBe(true);
    expect(result.error).toBe('Backend call timed out after 20ms');
  });
});
