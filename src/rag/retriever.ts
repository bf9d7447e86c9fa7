/**
 * @fileoverview Context retriever
 *
 * Embeds the question, asks the index for its nearest chunks, and turns
 * each distance into a relevance score. Scores below the configured floor
 * are dropped here, before any other stage sees them.
 */

import type { RAGConfig } from '../config/rag_config.js';
import { RetrievalError } from '../core/errors.js';
import type { EmbeddingProvider } from '../providers/types.js';
import type { VectorHit, VectorIndex } from '../storage/types.js';
import { logDebug } from '../telemetry/logger.js';
import type { ContextChunk } from '../types.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { relevancePolicyFor, type RelevancePolicy } from './relevance.js';

export interface ContextRetrieverOptions {
  config: RAGConfig;
  embedder: EmbeddingProvider;
  index: VectorIndex;
  /** Overrides the policy implied by `config.distanceMetric` */
  relevance?: RelevancePolicy;
}

export class ContextRetriever {
  private readonly config: RAGConfig;
  private readonly embedder: EmbeddingProvider;
  private readonly index: VectorIndex;
  private readonly relevance: RelevancePolicy;

  constructor(options: ContextRetrieverOptions) {
    this.config = options.config;
    this.embedder = options.embedder;
    this.index = options.index;
    this.relevance = options.relevance ?? relevancePolicyFor(options.config.distanceMetric);
  }

  async retrieve(query: string): Promise<ContextChunk[]> {
    let embedding: number[];
    try {
      const [first] = await this.embedder.embed([query]);
      if (!first) {
        throw new Error(`${this.embedder.id} returned no embedding`);
      }
      embedding = first;
    } catch (error) {
      throw new RetrievalError(`embedding failed: ${getErrorMessage(error)}`, toError(error));
    }

    let hits: VectorHit[];
    try {
      hits = await this.index.query(embedding, this.config.topKRetrieval);
    } catch (error) {
      throw new RetrievalError(`vector index query failed: ${getErrorMessage(error)}`, toError(error));
    }

    const chunks: ContextChunk[] = [];
    for (const hit of hits) {
      const relevanceScore = this.relevance(hit.distance);
      if (relevanceScore < this.config.minRelevanceScore) continue;
      chunks.push({
        content: hit.text,
        sourceId: hit.id,
        metadata: hit.metadata,
        relevanceScore,
        retrievalMethod: 'semantic',
      });
    }

    logDebug('Retrieved context candidates', { hits: hits.length, kept: chunks.length });
    return chunks;
  }
}
