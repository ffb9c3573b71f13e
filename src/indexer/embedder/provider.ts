/**
 * Embedding Provider Factory
 *
 * Embeddings go through the same OpenAI-compatible endpoints as chat:
 * DashScope (text-embedding-v3), OpenAI, Ollama and any compatible server.
 * A small LRU cache in front of the provider keeps repeated questions
 * from costing another request.
 */

import OpenAI from 'openai';
import { resolveClientSettings, type ClientSettings } from '../../providers/openai.js';
import type { ProviderType } from '../../providers/types.js';
import type { EmbeddingProvider } from './types.js';

/**
 * The slice of the OpenAI client used for embeddings.
 */
export interface OpenAIEmbeddingClient {
  embeddings: {
    create(
      body: OpenAI.EmbeddingCreateParams,
      options?: { signal?: AbortSignal }
    ): PromiseLike<OpenAI.CreateEmbeddingResponse>;
  };
}

export type EmbeddingClientFactory = (settings: ClientSettings) => OpenAIEmbeddingClient;

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  constructor(
    private readonly client: OpenAIEmbeddingClient,
    readonly model: string
  ) {}

  async embed(texts: string[], options: { signal?: AbortSignal } = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await this.client.embeddings.create(
      { model: this.model, input: texts, encoding_format: 'float' },
      { signal: options.signal }
    );

    if (response.data.length !== texts.length) {
      throw new Error(`Expected ${texts.length} embeddings, received ${response.data.length}`);
    }

    // Servers are allowed to return items out of order; `index` is authoritative
    return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }
}

/**
 * Caches vectors per text. Only misses are sent to the wrapped provider.
 */
export class CachedEmbeddingProvider implements EmbeddingProvider {
  private readonly cache = new Map<string, number[]>();

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly maxEntries = 256
  ) {}

  get model(): string {
    return this.provider.model;
  }

  get size(): number {
    return this.cache.size;
  }

  async embed(texts: string[], options: { signal?: AbortSignal } = {}): Promise<number[][]> {
    const misses = [...new Set(texts.filter((text) => !this.cache.has(text)))];

    if (misses.length > 0) {
      const vectors = await this.provider.embed(misses, options);
      misses.forEach((text, i) => {
        const vector = vectors[i];
        if (vector) this.remember(text, vector);
      });
    }

    return texts.map((text) => {
      const vector = this.cache.get(text);
      if (!vector) {
        throw new Error('Embedding provider returned fewer vectors than requested');
      }
      // Refresh recency
      this.cache.delete(text);
      this.cache.set(text, vector);
      return vector;
    });
  }

  private remember(text: string, vector: number[]): void {
    this.cache.set(text, vector);
    while (this.cache.size > this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
  }
}

export interface EmbeddingProviderOptions {
  /** Replaces `new OpenAI(...)`; tests inject fakes */
  clientFactory?: EmbeddingClientFactory;
  /** @default true */
  cache?: boolean;
}

const defaultEmbeddingClientFactory: EmbeddingClientFactory = (settings) =>
  new OpenAI({ apiKey: settings.apiKey, baseURL: settings.baseURL, maxRetries: 0 });

/**
 * Create the embedding provider named in the [embedding] config section.
 *
 * @throws Error with setup instructions when the provider has no credentials
 *
 * @example
 * ```typescript
 * const provider = createEmbeddingProvider(config.embedding);
 * const [vector] = await provider.embed(['高血压的诊断标准']);
 * ```
 */
export function createEmbeddingProvider(
  config: { provider: ProviderType; model: string },
  options: EmbeddingProviderOptions = {}
): EmbeddingProvider {
  const settings = resolveClientSettings(config.provider);
  const client = (options.clientFactory ?? defaultEmbeddingClientFactory)(settings);
  const provider = new OpenAIEmbeddingProvider(client, config.model);

  return options.cache === false ? provider : new CachedEmbeddingProvider(provider);
}
