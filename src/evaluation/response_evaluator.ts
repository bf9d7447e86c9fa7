/**
 * @fileoverview LLM-as-judge response evaluation
 *
 * Scores an answer on relevance, accuracy, clarity and completeness (0-5
 * each) and derives a 95% interval around the mean, widened when the judge
 * reports low confidence. Evaluation never throws: any failure returns the
 * neutral fallback result.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { withRetry } from '../core/result.js';
import type { LanguageModel } from '../providers/types.js';
import { logError, logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { clamp, mean, populationStdDev } from '../utils/math.js';
import { extractJsonPayload, safeJsonParse } from '../utils/safe_json.js';

// ============================================================================
// TYPES
// ============================================================================

export const JudgeVerdictSchema = z.object({
  relevance_score: z.number().min(0).max(5),
  accuracy_score: z.number().min(0).max(5),
  clarity_score: z.number().min(0).max(5),
  completeness_score: z.number().min(0).max(5),
  reasoning: z.string(),
  confidence: z.number().min(0).max(1),
});

export type JudgeVerdict = z.infer<typeof JudgeVerdictSchema>;

export interface EvaluationInput {
  query: string;
  response: string;
  contextSources?: readonly string[];
}

export interface EvaluationResult {
  overallScore: number;
  relevanceScore: number;
  accuracyScore: number;
  clarityScore: number;
  completenessScore: number;
  /** 95% interval within [0, 5] */
  confidenceInterval: [number, number];
  feedback: string;
  reasoning: string;
  /** Judge's self-reported confidence; null on fallback */
  evaluatorConfidence: number | null;
  fallback: boolean;
  evaluatedAt: string;
}

export interface ResponseEvaluatorOptions {
  model: LanguageModel | null;
  /** Defaults to the model's own default */
  judgeModel?: string;
  maxAttempts?: number;
  /** Pause between attempts */
  retryDelayMs?: number;
}

// ============================================================================
// PROMPT
// ============================================================================

const JUDGE_SYSTEM_PROMPT = 'You are a precise evaluator. Respond only with valid JSON.';

function buildJudgePrompt(input: EvaluationInput): string {
  const sources = input.contextSources && input.contextSources.length > 0
    ? input.contextSources.join('\n')
    : 'No context provided';

  return `You are an expert evaluator for RAG (Retrieval-Augmented Generation) systems.

Evaluate the following response on a scale of 0-5 for each criterion:

Query: ${input.query}
Response: ${input.response}
Context Sources: ${sources}

Evaluation Criteria:
1. RELEVANCE (0-5): How well does the response address the specific query?
2. ACCURACY (0-5): Is the information factually correct based on the sources?
3. CLARITY (0-5): Is the response clear, coherent, and well-structured?
4. COMPLETENESS (0-5): Does the response adequately cover the query scope?

Respond with ONLY valid JSON in this exact format:
{
  "relevance_score": <float 0-5>,
  "accuracy_score": <float 0-5>,
  "clarity_score": <float 0-5>,
  "completeness_score": <float 0-5>,
  "reasoning": "<detailed explanation>",
  "confidence": <float 0-1>
}`;
}

// ============================================================================
// SCORING
// ============================================================================

export const JUDGE_TEMPERATURE = 0.1;
export const JUDGE_MAX_TOKENS = 500;
const Z_95 = 1.96;

/**
 * Interval around the mean score. The spread is the population standard
 * deviation of the scores, scaled by (1.1 - evaluator confidence).
 */
export function confidenceInterval(scores: readonly number[], evaluatorConfidence: number): [number, number] {
  const center = mean(scores);
  const spread = scores.length > 1 ? populationStdDev(scores) : 0.5;
  const margin = Z_95 * spread * (1 - evaluatorConfidence + 0.1);
  return [clamp(center - margin, 0, 5), clamp(center + margin, 0, 5)];
}

export function parseJudgeVerdict(reply: string): JudgeVerdict {
  const parsed = safeJsonParse(extractJsonPayload(reply));
  if (!parsed.ok) {
    throw new Error(`judge reply is not JSON: ${parsed.error.message}`);
  }
  const verdict = JudgeVerdictSchema.safeParse(parsed.value);
  if (!verdict.success) {
    const issue = verdict.error.issues[0];
    throw new Error(`judge reply failed validation at ${issue?.path.join('.') || 'root'}: ${issue?.message ?? 'invalid'}`);
  }
  return verdict.data;
}

export function fallbackEvaluation(reason: string): EvaluationResult {
  return {
    overallScore: 2.5,
    relevanceScore: 2.5,
    accuracyScore: 2.5,
    clarityScore: 2.5,
    completenessScore: 2.5,
    confidenceInterval: [2, 3],
    feedback: 'Evaluation failed - manual review required',
    reasoning: `Automatic evaluation failed: ${reason}`,
    evaluatorConfidence: null,
    fallback: true,
    evaluatedAt: new Date().toISOString(),
  };
}

export function toEvaluationResult(verdict: JudgeVerdict): EvaluationResult {
  const scores = [verdict.relevance_score, verdict.accuracy_score, verdict.clarity_score, verdict.completeness_score];
  const overallScore = mean(scores);
  return {
    overallScore,
    relevanceScore: verdict.relevance_score,
    accuracyScore: verdict.accuracy_score,
    clarityScore: verdict.clarity_score,
    completenessScore: verdict.completeness_score,
    confidenceInterval: confidenceInterval(scores, verdict.confidence),
    feedback: `Overall quality: ${overallScore.toFixed(2)}/5.0`,
    reasoning: verdict.reasoning,
    evaluatorConfidence: verdict.confidence,
    fallback: false,
    evaluatedAt: new Date().toISOString(),
  };
}

// ============================================================================
// EVALUATOR
// ============================================================================

export class ResponseEvaluator {
  private readonly model: LanguageModel | null;
  private readonly judgeModel?: string;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;

  constructor(options: ResponseEvaluatorOptions) {
    this.model = options.model;
    this.judgeModel = options.judgeModel;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  async evaluate(input: EvaluationInput): Promise<EvaluationResult> {
    const model = this.model;
    if (!model) {
      return fallbackEvaluation('no language model configured');
    }

    const prompt = buildJudgePrompt(input);
    const verdict = await withRetry(
      async () => {
        const reply = await model.complete({
          system: JUDGE_SYSTEM_PROMPT,
          messages: [{ role: 'user', content: prompt }],
          model: this.judgeModel,
          temperature: JUDGE_TEMPERATURE,
          maxTokens: JUDGE_MAX_TOKENS,
        });
        return parseJudgeVerdict(reply);
      },
      {
        maxAttempts: this.maxAttempts,
        delayMs: this.retryDelayMs,
        backoffMultiplier: 1,
        onRetry: (error, attempt) => {
          logWarning(`Evaluation attempt ${attempt} failed: ${error.message}`);
        },
      },
    );

    if (!verdict.ok) {
      const reason = `no valid evaluation after ${this.maxAttempts} attempts: ${getErrorMessage(verdict.error)}`;
      logError(`Evaluation failed: ${reason}`);
      return fallbackEvaluation(reason);
    }
    return toEvaluationResult(verdict.value);
  }
}
