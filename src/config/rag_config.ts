/**
 * @fileoverview Retrieval and generation settings
 *
 * One RAGConfig is built at startup and frozen; every pipeline stage reads
 * from it and none writes to it.
 */

import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';

export const DISTANCE_METRICS = ['cosine', 'l2', 'inner_product'] as const;
export type DistanceMetric = (typeof DISTANCE_METRICS)[number];

export const RAGConfigSchema = z
  .object({
    /** Token budget for packed context (estimate: length / 4) */
    maxContextLength: z.number().int().positive().default(4000),
    topKRetrieval: z.number().int().positive().default(10),
    finalContextChunks: z.number().int().positive().default(5),
    minRelevanceScore: z.number().min(0).max(1).default(0.1),
    maxTokens: z.number().int().positive().default(1000),
    temperature: z.number().min(0).max(2).default(0.3),
    model: z.string().min(1).default('gpt-4'),
    topP: z.number().min(0).max(1).default(0.9),
    frequencyPenalty: z.number().min(-2).max(2).default(0.1),
    presencePenalty: z.number().min(-2).max(2).default(0.1),
    rerankModel: z.string().min(1).default('gpt-3.5-turbo'),
    /** Model that grades answers in `evaluateResponse` */
    judgeModel: z.string().min(1).default('gpt-4'),
    rerankMaxTokens: z.number().int().positive().default(100),
    rerankTemperature: z.number().min(0).max(2).default(0.1),
    /** Upper bound on chunks sent to the model for re-scoring */
    rerankCandidateLimit: z.number().int().positive().default(8),
    rerankConcurrency: z.number().int().positive().default(1),
    distanceMetric: z.enum(DISTANCE_METRICS).default('cosine'),
  })
  .strict();

export type RAGConfig = Readonly<z.infer<typeof RAGConfigSchema>>;
export type RAGConfigInput = z.input<typeof RAGConfigSchema>;

/**
 * Turn the first zod issue into a ConfigurationError naming the key.
 */
export function toConfigurationError(error: z.ZodError, prefix?: string): ConfigurationError {
  const issue = error.issues[0];
  const key = [prefix, ...(issue?.path ?? [])].filter((part) => part !== undefined && part !== '').join('.');
  return new ConfigurationError(key || prefix || 'config', issue?.message ?? 'invalid value');
}

export function createRAGConfig(overrides: RAGConfigInput = {}): RAGConfig {
  const parsed = RAGConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    throw toConfigurationError(parsed.error, 'rag');
  }
  return Object.freeze(parsed.data);
}

export const DEFAULT_RAG_CONFIG: RAGConfig = createRAGConfig();
