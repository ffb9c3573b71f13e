/**
 * Default Configuration Values
 *
 * The loader merges the user's config.toml ON TOP of these.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  default_model: 'qwen-plus',
  default_provider: 'dashscope',

  embedding: {
    provider: 'dashscope',
    model: 'text-embedding-v3',
    batch_size: 10,       // DashScope caps one embeddings request at 10 inputs
    timeout_ms: 30000,
  },

  search: {
    top_k: 3,
  },

  rag: {
    max_context_length: 4000,
  },

  generation: {
    temperature: 0.1,
    max_tokens: 1500,
    request_timeout_ms: 60000,
  },

  agent: {
    max_iterations: 5,
    temperature: 0.1,
    max_tokens: 1500,
    request_timeout_ms: 60000,
    max_consecutive_failures: 3,
    retry_backoff_ms: 500,
    parallel_tool_calls: false,
  },

  qa: {
    mode: 'rag',
    enable_rag: true,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.medqa/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# medqa configuration
# Location: ~/.medqa/config.toml

# Chat model
# Providers: dashscope, openai, ollama, openai-compatible
default_model = "${DEFAULT_CONFIG.default_model}"
default_provider = "${DEFAULT_CONFIG.default_provider}"

# Embeddings used to index and search the knowledge base
# Changing the model requires re-running: medqa index <dir> --rebuild
[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}

# Retrieval (scores are cosine similarities, higher is closer)
[search]
top_k = ${DEFAULT_CONFIG.search.top_k}
# min_score = 0.3

[rag]
max_context_length = ${DEFAULT_CONFIG.rag.max_context_length}

# Single-shot answers (rag / llm modes)
[generation]
temperature = ${DEFAULT_CONFIG.generation.temperature}
max_tokens = ${DEFAULT_CONFIG.generation.max_tokens}
request_timeout_ms = ${DEFAULT_CONFIG.generation.request_timeout_ms}

# Tool-calling agent
[agent]
max_iterations = ${DEFAULT_CONFIG.agent.max_iterations}
temperature = ${DEFAULT_CONFIG.agent.temperature}
max_tokens = ${DEFAULT_CONFIG.agent.max_tokens}
request_timeout_ms = ${DEFAULT_CONFIG.agent.request_timeout_ms}
max_consecutive_failures = ${DEFAULT_CONFIG.agent.max_consecutive_failures}
retry_backoff_ms = ${DEFAULT_CONFIG.agent.retry_backoff_ms}
parallel_tool_calls = ${DEFAULT_CONFIG.agent.parallel_tool_calls}

# Mode used when --mode is not given: llm, rag or agent
[qa]
mode = "${DEFAULT_CONFIG.qa.mode}"
enable_rag = ${DEFAULT_CONFIG.qa.enable_rag}

# Optional fallback chain
# [llm]
# fallback_providers = ["openai", "ollama"]
# [llm.fallback_models]
# openai = "gpt-4o-mini"
# ollama = "qwen2.5:7b"
`;
