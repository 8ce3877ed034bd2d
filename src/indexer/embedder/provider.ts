/**
 * Embedding Provider Factory
 *
 * Builds the embedding provider named in config.toml. OpenAI is the only
 * provider; OPENAI_BASE_URL points it at any compatible server.
 */

import OpenAI from 'openai';

import { getEnv } from '../../config/env.js';
import { APIKeyError } from '../../errors/index.js';
import type { EmbeddingConfig, EmbeddingProvider } from './types.js';

export interface OpenAIEmbeddingOptions {
  model: string;
  apiKey: string;
  baseURL?: string;
}

/**
 * EmbeddingProvider over the OpenAI embeddings endpoint.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private readonly client: OpenAI;

  constructor(options: OpenAIEmbeddingOptions) {
    this.model = options.model;
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    return embedding ?? [];
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const response = await this.client.embeddings.create({
      model: this.model,
      input: texts,
    });

    // The API documents `index`; sort rather than trust response order
    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }
}

/**
 * Create the provider for the [embedding] config section.
 *
 * @throws APIKeyError when OPENAI_API_KEY is not set
 */
export function createEmbeddingProvider(config: EmbeddingConfig): EmbeddingProvider {
  const apiKey = getEnv('OPENAI_API_KEY');
  if (!apiKey) {
    throw new APIKeyError('OpenAI', 'OPENAI_API_KEY');
  }

  return new OpenAIEmbeddingProvider({
    model: config.model,
    apiKey,
    baseURL: getEnv('OPENAI_BASE_URL'),
  });
}
