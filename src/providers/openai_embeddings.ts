/**
 * @fileoverview OpenAI-compatible embeddings client (`POST {baseUrl}/embeddings`).
 */

import { z } from 'zod';
import { ProviderError } from '../core/errors.js';
import { postJson, trimTrailingSlash, type FetchLike } from './http.js';
import { OPENAI_DEFAULT_BASE_URL } from './openai_chat.js';
import type { EmbeddingProvider } from './types.js';

/** Output sizes of the hosted models we know; others must be configured. */
export const KNOWN_EMBEDDING_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

const EmbeddingsResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number()),
    }),
  ),
});

export interface OpenAIEmbeddingProviderOptions {
  apiKey: string;
  model: string;
  dimensions?: number;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly id: string;
  readonly dimensions: number;
  private readonly endpoint: string;

  constructor(private readonly options: OpenAIEmbeddingProviderOptions) {
    const dimensions = options.dimensions ?? KNOWN_EMBEDDING_DIMENSIONS[options.model];
    if (!dimensions) {
      throw new ProviderError('openai', 'unavailable', false, `unknown dimensions for ${options.model}; set embedding.dimensions`);
    }
    this.id = `openai:${options.model}`;
    this.dimensions = dimensions;
    this.endpoint = `${trimTrailingSlash(options.baseUrl ?? OPENAI_DEFAULT_BASE_URL)}/embeddings`;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const response = await postJson(
      this.endpoint,
      {
        model: this.options.model,
        input: texts,
        dimensions: this.options.dimensions,
      },
      EmbeddingsResponseSchema,
      {
        provider: 'openai',
        headers: { authorization: `Bearer ${this.options.apiKey}` },
        timeoutMs: this.options.timeoutMs,
        fetchImpl: this.options.fetchImpl,
      },
    );

    if (response.data.length !== texts.length) {
      throw new ProviderError('openai', 'invalid_response', false, `expected ${texts.length} embeddings, got ${response.data.length}`);
    }

    const ordered = [...response.data].sort((a, b) => a.index - b.index);
    for (const item of ordered) {
      if (item.embedding.length !== this.dimensions) {
        throw new ProviderError(
          'openai',
          'invalid_response',
          false,
          `embedding has ${item.embedding.length} dimensions, expected ${this.dimensions}`,
        );
      }
    }
    return ordered.map((item) => item.embedding);
  }
}
