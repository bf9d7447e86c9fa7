/**
 * @fileoverview Answer generator
 *
 * Renders the packed chunks into a numbered context block, asks the
 * language model for an answer, and scores the answer with a heuristic
 * confidence. Without a model it returns a preview of the context instead.
 *
 * @packageDocumentation
 */

import type { RAGConfig } from '../config/rag_config.js';
import { GenerationError } from '../core/errors.js';
import type { LanguageModel } from '../providers/types.js';
import type { ContextChunk } from '../types.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { clamp01, mean } from '../utils/math.js';
import { buildQueryPrompt, SYSTEM_PROMPT } from './prompts.js';

// ============================================================================
// TYPES
// ============================================================================

export interface GeneratedAnswer {
  answer: string;
  /** In [0, 1] */
  confidence: number;
  /** False when the fallback preview was returned */
  usedModel: boolean;
}

// ============================================================================
// CONTEXT RENDERING
// ============================================================================

export const CONTEXT_SEPARATOR = '='.repeat(50);
export const FALLBACK_CONFIDENCE = 0.5;
const FALLBACK_PREVIEW_LENGTH = 500;

export function buildContextString(chunks: readonly ContextChunk[]): string {
  const parts = chunks.map((chunk, i) => {
    let header = `Source ${i + 1} (ID: ${chunk.sourceId})`;
    if (chunk.metadata.source) {
      header += ` - ${chunk.metadata.source}`;
    }
    return `${header}:\n${chunk.content}\n`;
  });
  return `\n${CONTEXT_SEPARATOR}${parts.join('\n')}`;
}

export function buildFallbackAnswer(context: string): string {
  return (
    `Based on the available context:\n\n${context.slice(0, FALLBACK_PREVIEW_LENGTH)}...\n\n` +
    'I cannot provide a complete answer as the AI service is not configured.'
  );
}

// ============================================================================
// CONFIDENCE
// ============================================================================

export const UNCERTAINTY_PHRASES = ["i don't know", 'unclear', 'insufficient information', 'not enough'] as const;

/**
 * Mean of up to four signals: average chunk relevance (only when there are
 * chunks), answer length, absence of hedging phrases, and citations.
 */
export function calculateConfidence(answer: string, chunks: readonly ContextChunk[]): number {
  const factors: number[] = [];

  if (chunks.length > 0) {
    factors.push(mean(chunks.map((chunk) => chunk.relevanceScore)));
  }

  factors.push(Math.min(1, answer.length / 200));

  const lowered = answer.toLowerCase();
  const hedges = UNCERTAINTY_PHRASES.filter((phrase) => lowered.includes(phrase)).length;
  factors.push(Math.max(0, 1 - 0.2 * hedges));

  factors.push(answer.includes('[Source:') || answer.includes('Source ') ? 1 : 0.7);

  return clamp01(mean(factors));
}

// ============================================================================
// GENERATOR
// ============================================================================

export interface AnswerGeneratorOptions {
  config: RAGConfig;
  model: LanguageModel | null;
}

export class AnswerGenerator {
  private readonly config: RAGConfig;
  private readonly model: LanguageModel | null;

  constructor(options: AnswerGeneratorOptions) {
    this.config = options.config;
    this.model = options.model;
  }

  async generate(query: string, chunks: readonly ContextChunk[]): Promise<GeneratedAnswer> {
    const context = buildContextString(chunks);

    if (!this.model) {
      return { answer: buildFallbackAnswer(context), confidence: FALLBACK_CONFIDENCE, usedModel: false };
    }

    let reply: string;
    try {
      reply = await this.model.complete({
        system: SYSTEM_PROMPT,
        messages: [{ role: 'user', content: buildQueryPrompt(context, query) }],
        model: this.config.model,
        maxTokens: this.config.maxTokens,
        temperature: this.config.temperature,
        topP: this.config.topP,
        frequencyPenalty: this.config.frequencyPenalty,
        presencePenalty: this.config.presencePenalty,
      });
    } catch (error) {
      throw new GenerationError(getErrorMessage(error), this.config.model, toError(error));
    }

    const answer = reply.trim();
    return { answer, confidence: calculateConfidence(answer, chunks), usedModel: true };
  }
}
