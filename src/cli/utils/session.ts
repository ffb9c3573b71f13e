/**
 * QA session wiring shared by `ask` and `chat`: config, chat backend,
 * knowledge base and the MedicalQAService on top.
 */

import { loadConfig } from '../../config/loader.js';
import type { Config } from '../../config/schema.js';
import { getDatabase, type KnowledgeBaseInfo } from '../../database/index.js';
import { createEmbeddingProvider } from '../../indexer/embedder/index.js';
import { createChatBackend } from '../../providers/llm.js';
import { KnowledgeRetriever } from '../../search/retriever.js';
import { SqliteVectorIndex } from '../../search/vector-index.js';
import { MedicalQAService, qaServiceOptionsFromConfig } from '../../agent/qa-service.js';
import type { ReasoningEvent } from '../../agent/types.js';
import type { CommandContext } from '../types.js';

export interface SessionOptions {
  /** Overrides qa.mode */
  mode?: string;
  /** Overrides qa.enable_rag */
  enableRag?: boolean;
  /** Reasoning progress in agent mode */
  onEvent?: (event: ReasoningEvent) => void;
}

export interface QASession {
  service: MedicalQAService;
  config: Config;
  provider: string;
  model: string;
  /** null when no knowledge base could be opened */
  knowledgeBase: KnowledgeBaseInfo | null;
}

/**
 * Open the knowledge base for retrieval. Returns null (after a warning)
 * when it is empty or cannot be used; answering then continues without RAG.
 */
function openRetriever(
  config: Config,
  ctx: CommandContext
): { retriever: KnowledgeRetriever; info: KnowledgeBaseInfo } | null {
  try {
    const database = getDatabase();
    const info = database.getInfo();
    if (info.passageCount === 0) {
      ctx.debug('Knowledge base is empty');
      return null;
    }

    const embeddingProvider = createEmbeddingProvider(config.embedding);
    const index = new SqliteVectorIndex(database, embeddingProvider, { timeoutMs: config.embedding.timeout_ms });
    const retriever = new KnowledgeRetriever(index, { minScore: config.search.min_score }, ctx);
    ctx.debug(`Knowledge base: ${info.passageCount} passages (${info.embeddingModel ?? 'unknown model'})`);
    return { retriever, info };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    ctx.warn(`Knowledge base could not be opened: ${message}`);
    return null;
  }
}

/**
 * @throws AllProvidersFailedError when no chat provider can be created
 * @throws InvalidModeError for an unknown mode
 */
export async function openQASession(ctx: CommandContext, options: SessionOptions = {}): Promise<QASession> {
  const config = loadConfig();

  const { backend, name, model, usedFallback } = await createChatBackend(config, {
    fallback: {
      onFallback: (from, to, reason) => ctx.debug(`LLM fallback: ${from} → ${to} (${reason})`),
    },
  });
  if (usedFallback) {
    ctx.warn(`Using fallback provider ${name}/${model}`);
  }
  ctx.debug(`Using LLM: ${name}/${model}`);

  const opened = openRetriever(config, ctx);
  const defaults = qaServiceOptionsFromConfig(config, ctx);

  const service = new MedicalQAService(
    { backend, retriever: opened?.retriever ?? null },
    {
      ...defaults,
      mode: options.mode ?? defaults.mode,
      enableRag: options.enableRag ?? defaults.enableRag,
      agent: { ...defaults.agent, onEvent: options.onEvent },
    }
  );

  return { service, config, provider: name, model, knowledgeBase: opened?.info ?? null };
}
