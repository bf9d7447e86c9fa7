/**
 * @fileoverview Core infrastructure
 *
 * Result types and the error hierarchy shared by every module.
 */

export {
  type Result,
  type OkResult,
  type ErrResult,
  Ok,
  Err,
  safeAsync,
  unwrap,
  withRetry,
  type RetryOptions,
} from './result.js';

export {
  type ErrorJSON,
  DocIntelError,
  RetrievalError,
  GenerationError,
  QueryFailedError,
  type QueryStage,
  GENERIC_QUERY_FAILURE_MESSAGE,
  ValidationError,
  StorageError,
  type StorageOperation,
  ProviderError,
  type ProviderErrorReason,
  IngestionError,
  type IngestionReason,
  ConfigurationError,
  RateLimitError,
  NotFoundError,
  type LookupResource,
  isDocIntelError,
  isRetryableError,
} from './errors.js';
