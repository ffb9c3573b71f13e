/**
 * Configuration Schema
 *
 * Defines the shape of ~/.medqa/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Answering modes. `rag` and `agent` may consult the knowledge base;
 * `llm` never does.
 */
export const QA_MODES = ['llm', 'rag', 'agent'] as const;
export const QAModeSchema = z.enum(QA_MODES);

/**
 * Chat/embedding backends. All of them speak the OpenAI chat-completions
 * wire format; they differ in base URL and credentials.
 */
export const LLMProviderTypeSchema = z.enum(['dashscope', 'openai', 'ollama', 'openai-compatible']);

export const EmbeddingConfigSchema = z.object({
  provider: LLMProviderTypeSchema.describe('Embedding provider'),
  model: z.string().describe('Embedding model name'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(100)
    .default(16)
    .describe('Number of texts to embed per request (1-100)'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .default(30000)
    .describe('Timeout in milliseconds for one embedding request'),
});

/**
 * Retrieval settings. Scores are cosine similarities (higher is closer),
 * so `min_score` is a lower bound in [-1, 1].
 */
export const SearchConfigSchema = z.object({
  top_k: z.number().int().min(1).max(50).describe('Passages retrieved per question'),
  min_score: z
    .number()
    .min(-1)
    .max(1)
    .optional()
    .describe('Drop passages whose similarity is below this value'),
});

export const RAGConfigSchema = z.object({
  max_context_length: z
    .number()
    .int()
    .min(100)
    .max(100000)
    .describe('Upper bound on the assembled context, in characters'),
});

/**
 * Single-shot answer generation (rag and llm modes)
 */
export const GenerationConfigSchema = z.object({
  temperature: z.number().min(0).max(2),
  max_tokens: z.number().int().min(1).max(32000),
  request_timeout_ms: z.number().int().min(1000).max(600000),
});

/**
 * Reasoning loop limits (agent mode)
 */
export const AgentConfigSchema = z.object({
  max_iterations: z.number().int().min(1).max(50),
  temperature: z.number().min(0).max(2),
  max_tokens: z.number().int().min(1).max(32000),
  request_timeout_ms: z.number().int().min(1000).max(600000),
  max_consecutive_failures: z.number().int().min(1).max(50),
  retry_backoff_ms: z.number().int().min(0).max(60000),
  parallel_tool_calls: z.boolean().describe('Run the tool calls of one step concurrently'),
});

export const QAConfigSchema = z.object({
  mode: QAModeSchema.describe('Default answering mode'),
  enable_rag: z.boolean().describe('Consult the knowledge base in rag and agent modes'),
});

/**
 * Optional fallback chain for chat backends
 */
export const LLMConfigSchema = z.object({
  fallback_providers: z
    .array(LLMProviderTypeSchema)
    .optional()
    .describe('Providers to try in order if the default one cannot be created'),
  fallback_models: z
    .record(LLMProviderTypeSchema, z.string())
    .optional()
    .describe('Model to use per fallback provider (e.g., { openai: "gpt-4o-mini" })'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  default_model: z.string().describe('Chat model used for answers'),
  default_provider: LLMProviderTypeSchema.describe('Chat provider to use'),
  embedding: EmbeddingConfigSchema,
  search: SearchConfigSchema,
  rag: RAGConfigSchema,
  generation: GenerationConfigSchema,
  agent: AgentConfigSchema,
  qa: QAConfigSchema,
  llm: LLMConfigSchema.optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
export type QAMode = z.infer<typeof QAModeSchema>;
export type LLMProviderType = z.infer<typeof LLMProviderTypeSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
