/**
 * @fileoverview Service API exports
 *
 * @packageDocumentation
 */

export {
  DocumentIntelligenceService,
  type ServiceDependencies,
  type ServiceQueryOutcome,
  type ServiceStats,
  type HealthStatus,
  type HealthReport,
  METRICS_SAMPLE_LIMIT,
} from './service.js';

export {
  QueryRequestSchema,
  FilterParamsSchema,
  EvaluationRequestSchema,
  FeedbackRequestSchema,
  type QueryRequestInput,
  type EvaluationRequestInput,
  type EvaluationRequest,
  type FeedbackRequestInput,
  type FeedbackRequest,
  MAX_QUERY_LENGTH,
  MAX_RESULTS_LIMIT,
  DEFAULT_MAX_RESULTS,
  MAX_FEEDBACK_COMMENT_LENGTH,
  MAX_SUGGESTION_LENGTH,
  parseQueryRequest,
  parseEvaluationRequest,
  parseFeedbackRequest,
  toValidationError,
} from './schemas.js';
