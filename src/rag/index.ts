/**
 * @fileoverview Retrieval-augmented answering pipeline
 *
 * @packageDocumentation
 */

export {
  type RelevancePolicy,
  cosineRelevance,
  l2Relevance,
  innerProductRelevance,
  relevancePolicyFor,
} from './relevance.js';
export { SYSTEM_PROMPT, RELEVANCE_EVALUATOR_SYSTEM_PROMPT, buildQueryPrompt, buildRelevancePrompt } from './prompts.js';
export { ContextRetriever, type ContextRetrieverOptions } from './retriever.js';
export {
  filterContext,
  passesQualityFilter,
  applyUserFilters,
  ensureDiversity,
  wordOverlap,
  MIN_CONTENT_LENGTH,
  NOISE_PREFIXES,
  DIVERSITY_THRESHOLD,
} from './context_filter.js';
export {
  ContextReranker,
  type ContextRerankerOptions,
  sortByRelevance,
  parseRelevanceScore,
  RERANK_CONTENT_LIMIT,
} from './reranker.js';
export { packContext, estimateTokens, MIN_TRUNCATION_TOKENS, CHARS_PER_TOKEN } from './context_packer.js';
export {
  AnswerGenerator,
  type AnswerGeneratorOptions,
  type GeneratedAnswer,
  buildContextString,
  buildFallbackAnswer,
  calculateConfidence,
  CONTEXT_SEPARATOR,
  FALLBACK_CONFIDENCE,
  UNCERTAINTY_PHRASES,
} from './answer_generator.js';
export {
  QueryOrchestrator,
  type QueryOrchestratorOptions,
  type QueryOutcome,
  type RunQueryOptions,
  type StageTransition,
  type QueryStageObserver,
  INSUFFICIENT_INFORMATION_ANSWER,
  SOURCE_PREVIEW_LENGTH,
  previewContent,
  toSourceSummary,
} from './orchestrator.js';
