/**
 * medqa - Library Entry Point
 *
 * The CLI (`medqa`) covers everyday use:
 * ```bash
 * medqa index ./knowledge                      # Build the knowledge base
 * medqa ask "高血压的诊断标准是什么？"           # One question
 * medqa chat --mode agent                      # Interactive Q&A with tools
 * ```
 *
 * The same pipeline is available as a library for embedding in other
 * services.
 *
 * @example Answering with the local knowledge base
 * ```typescript
 * import {
 *   loadConfig,
 *   createChatBackend,
 *   createEmbeddingProvider,
 *   getDatabase,
 *   SqliteVectorIndex,
 *   KnowledgeRetriever,
 *   MedicalQAService,
 * } from 'medqa';
 *
 * const config = loadConfig();
 * const { backend } = await createChatBackend(config);
 * const index = new SqliteVectorIndex(getDatabase(), createEmbeddingProvider(config.embedding));
 * const service = MedicalQAService.fromConfig(config, { backend, retriever: new KnowledgeRetriever(index) });
 *
 * const envelope = await service.answer('阿司匹林的用法用量是多少？');
 * ```
 *
 * @packageDocumentation
 */

// Answering pipeline
export {
  MedicalQAService,
  parseMode,
  qaServiceOptionsFromConfig,
  assembleContext,
  AnswerGenerator,
  ReasoningLoop,
  ToolRegistry,
  defineTool,
  createMedicalToolRegistry,
  type QAServiceDependencies,
  type QAServiceOptions,
  type AnswerOptions,
  type Capabilities,
  type AnswerEnvelope,
  type AgentStatus,
  type AgentRunResult,
  type ReasoningEvent,
  type ToolCallRecord,
  type ToolExecution,
  type AssembledContext,
} from './agent/index.js';

// Retrieval
export {
  SqliteVectorIndex,
  KnowledgeRetriever,
  cosineSimilarity,
  EmbeddingMismatchError,
  type Passage,
  type SimilarityIndex,
  type SearchOutcome,
} from './search/index.js';

// Quality
export { evaluateAnswer, summarizeQuality, type QualityReport, type QualitySummary } from './eval/quality.js';

// Knowledge base
export { runIndexPipeline, createEmbeddingProvider, type IndexPipelineOptions } from './indexer/index.js';
export type { IndexPipelineResult } from './indexer/types.js';
export { getDatabase, closeDb, type KnowledgeBaseInfo } from './database/index.js';

// Backends
export {
  createChatBackend,
  AllProvidersFailedError,
  BackendError,
  type ChatBackend,
  type ChatMessage,
  type ProviderType,
} from './providers/index.js';

// Configuration and errors
export { loadConfig, DEFAULT_CONFIG, type Config, type QAMode } from './config/index.js';
export { CLIError, ConfigError, InvalidModeError, DuplicateToolError } from './errors/index.js';
export { type Logger, consoleLogger, silentLogger } from './utils/index.js';
