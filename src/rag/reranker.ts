/**
 * @fileoverview LLM re-ranker
 *
 * Asks the language model to rate the top candidates and averages its score
 * with the retrieval score. Re-ranking never fails a query: a failed or
 * unparseable rating leaves that chunk's score as it was.
 */

import type { RAGConfig } from '../config/rag_config.js';
import type { LanguageModel } from '../providers/types.js';
import { logWarning } from '../telemetry/logger.js';
import type { ContextChunk } from '../types.js';
import { mapWithConcurrency } from '../utils/async.js';
import { getErrorMessage } from '../utils/errors.js';
import { buildRelevancePrompt, RELEVANCE_EVALUATOR_SYSTEM_PROMPT } from './prompts.js';

/** Characters of chunk content shown to the judge */
export const RERANK_CONTENT_LIMIT = 500;

/**
 * Stable sort, highest relevance first. Equal scores keep input order.
 */
export function sortByRelevance(chunks: readonly ContextChunk[]): ContextChunk[] {
  return chunks
    .map((chunk, position) => ({ chunk, position }))
    .sort((a, b) => b.chunk.relevanceScore - a.chunk.relevanceScore || a.position - b.position)
    .map(({ chunk }) => chunk);
}

/**
 * Pull a [0, 1] score out of a judge reply. The reply must mention "score";
 * the first number in it is taken. Null when absent or out of range.
 */
export function parseRelevanceScore(reply: string): number | null {
  const lowered = reply.toLowerCase();
  if (!lowered.includes('score')) return null;
  const match = lowered.match(/[\d.]+/);
  if (!match) return null;
  const score = Number(match[0]);
  if (!Number.isFinite(score) || score < 0 || score > 1) return null;
  return score;
}

export interface ContextRerankerOptions {
  config: RAGConfig;
  /** Null disables re-ranking */
  model: LanguageModel | null;
}

export class ContextReranker {
  private readonly config: RAGConfig;
  private readonly model: LanguageModel | null;

  constructor(options: ContextRerankerOptions) {
    this.config = options.config;
    this.model = options.model;
  }

  async rerank(query: string, chunks: readonly ContextChunk[]): Promise<ContextChunk[]> {
    const sorted = sortByRelevance(chunks);
    if (chunks.length <= this.config.finalContextChunks || !this.model) {
      return sorted;
    }

    const model = this.model;
    const limit = Math.min(this.config.rerankCandidateLimit, sorted.length);
    const candidates = sorted.slice(0, limit);

    const rescored = await mapWithConcurrency(candidates, this.config.rerankConcurrency, async (chunk) => {
      const llmScore = await this.rate(model, query, chunk);
      if (llmScore === null) return chunk;
      return { ...chunk, relevanceScore: (chunk.relevanceScore + llmScore) / 2 };
    });

    return sortByRelevance([...rescored, ...sorted.slice(limit)]);
  }

  private async rate(model: LanguageModel, query: string, chunk: ContextChunk): Promise<number | null> {
    try {
      const reply = await model.complete({
        system: RELEVANCE_EVALUATOR_SYSTEM_PROMPT,
        messages: [{ role: 'user', content: buildRelevancePrompt(query, chunk.content.slice(0, RERANK_CONTENT_LIMIT)) }],
        model: this.config.rerankModel,
        maxTokens: this.config.rerankMaxTokens,
        temperature: this.config.rerankTemperature,
      });
      const score = parseRelevanceScore(reply);
      if (score === null) {
        logWarning('Re-rank reply had no usable score', { sourceId: chunk.sourceId });
      }
      return score;
    } catch (error) {
      logWarning('LLM re-ranking failed for chunk', { sourceId: chunk.sourceId, error: getErrorMessage(error) });
      return null;
    }
  }
}
