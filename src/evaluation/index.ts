/**
 * @fileoverview Evaluation Module
 *
 * Provides:
 * - LLM-as-judge scoring of individual answers
 * - Performance metrics over the query log
 * - A/B tests between two versions of the service
 *
 * @packageDocumentation
 */

export {
  ResponseEvaluator,
  type ResponseEvaluatorOptions,
  type EvaluationInput,
  type EvaluationResult,
  type JudgeVerdict,
  JudgeVerdictSchema,
  JUDGE_TEMPERATURE,
  JUDGE_MAX_TOKENS,
  confidenceInterval,
  parseJudgeVerdict,
  fallbackEvaluation,
  toEvaluationResult,
} from './response_evaluator.js';

export {
  type PerformanceMetrics,
  type PerformanceMetricOptions,
  DEFAULT_METRICS_WINDOW_DAYS,
  HIGH_CONFIDENCE_THRESHOLD,
  computePerformanceMetrics,
  windowStart,
} from './metrics.js';

export {
  ABTestingService,
  ABTestConfigSchema,
  type ABTestConfig,
  type ABTestConfigInput,
  type ABTestAnalysis,
  type ABTestReport,
  type InsufficientDataAnalysis,
  type VariantSampleSizes,
  MIN_SAMPLES_PER_VARIANT,
  MINIMUM_DETECTABLE_EFFECT,
  STATISTICAL_POWER,
  DEFAULT_CONTROL_VERSION,
  requiredSampleSize,
  assignmentBucket,
  compareVariants,
} from './ab_testing.js';
