/**
 * Scripted chat backend for tests.
 *
 * Each call consumes the next script step; the last step repeats once
 * the script runs out. Requests are recorded with a copy of their
 * messages, since callers keep appending to the array they pass.
 */

import type { BackendReply, ChatBackend, ChatRequest, ProviderType, ToolInvocation } from '../providers/types.js';

export type ScriptStep = BackendReply | Error | ((request: ChatRequest) => BackendReply | Promise<BackendReply>);

export class ScriptedBackend implements ChatBackend {
  readonly name: ProviderType = 'dashscope';
  readonly model = 'fake-model';
  readonly requests: ChatRequest[] = [];
  private step = 0;

  constructor(private readonly script: ScriptStep[]) {}

  get calls(): number {
    return this.requests.length;
  }

  async chat(request: ChatRequest): Promise<BackendReply> {
    this.requests.push({ ...request, messages: [...request.messages] });
    const next = this.script[Math.min(this.step, this.script.length - 1)];
    this.step++;

    if (next === undefined) {
      throw new Error('ScriptedBackend has an empty script');
    }
    if (next instanceof Error) {
      throw next;
    }
    if (typeof next === 'function') {
      return next(request);
    }
    return next;
  }
}

export function textReply(content: string): BackendReply {
  return { content, toolCalls: [], finishReason: 'stop' };
}

export function toolReply(calls: ToolInvocation[], content: string | null = null): BackendReply {
  return { content, toolCalls: calls, finishReason: 'tool_calls' };
}
