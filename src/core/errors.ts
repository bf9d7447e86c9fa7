/**
 * @fileoverview Error hierarchy
 *
 * Every failure the service reports is a typed DocIntelError with a stable
 * code and a retryable flag. Query-path failures reach callers only as
 * QueryFailedError; the underlying cause is kept for logging.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class DocIntelError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// QUERY PIPELINE ERRORS
// ============================================================================

export class RetrievalError extends DocIntelError {
  readonly code = 'RETRIEVAL_ERROR';
  readonly retryable = false;

  constructor(
    message: string,
    readonly cause?: Error,
  ) {
    super(`Context retrieval failed: ${message}`);
    this.name = 'RetrievalError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        cause: this.cause?.message,
      },
    };
  }
}

export class GenerationError extends DocIntelError {
  readonly code = 'GENERATION_ERROR';
  readonly retryable = false;

  constructor(
    message: string,
    readonly model?: string,
    readonly cause?: Error,
  ) {
    super(`Answer generation failed: ${message}`);
    this.name = 'GenerationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        model: this.model,
        cause: this.cause?.message,
      },
    };
  }
}

export type QueryStage =
  | 'received'
  | 'retrieving'
  | 'filtering'
  | 'reranking'
  | 'packing'
  | 'generating'
  | 'done'
  | 'failed';

export const GENERIC_QUERY_FAILURE_MESSAGE = 'Query processing failed';

/**
 * What callers see when any stage of a query fails. The message is always
 * the generic one; `stage` says where it happened and `cause` stays internal.
 */
export class QueryFailedError extends DocIntelError {
  readonly code = 'QUERY_FAILED';

  constructor(
    readonly stage: QueryStage,
    readonly retryable: boolean,
    readonly cause?: Error,
  ) {
    super(GENERIC_QUERY_FAILURE_MESSAGE);
    this.name = 'QueryFailedError';
  }

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      details: {
        stage: this.stage,
      },
    };
  }
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends DocIntelError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// STORAGE ERRORS
// ============================================================================

export type StorageOperation = 'open' | 'read' | 'write' | 'delete' | 'query' | 'migrate';

export class StorageError extends DocIntelError {
  readonly code = 'STORAGE_ERROR';

  constructor(
    readonly operation: StorageOperation,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Storage ${operation} failed: ${message}`);
    this.name = 'StorageError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// PROVIDER ERRORS
// ============================================================================

export type ProviderErrorReason =
  | 'timeout'
  | 'rate_limit'
  | 'auth_failed'
  | 'network_error'
  | 'invalid_response'
  | 'unavailable';

export class ProviderError extends DocIntelError {
  readonly code = 'PROVIDER_ERROR';

  constructor(
    readonly provider: string,
    readonly reason: ProviderErrorReason,
    readonly retryable: boolean,
    message: string,
    readonly status?: number,
  ) {
    super(`Provider ${provider} ${reason}: ${message}`);
    this.name = 'ProviderError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        provider: this.provider,
        reason: this.reason,
        status: this.status,
      },
    };
  }
}

// ============================================================================
// INGESTION ERRORS
// ============================================================================

export type IngestionReason = 'unsupported_type' | 'empty_document' | 'read_failed' | 'embed_failed' | 'store_failed';

export class IngestionError extends DocIntelError {
  readonly code = 'INGESTION_ERROR';

  constructor(
    readonly reason: IngestionReason,
    readonly retryable: boolean,
    message: string,
    readonly fileName?: string,
  ) {
    super(`Ingestion failed (${reason}): ${message}`);
    this.name = 'IngestionError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        reason: this.reason,
        fileName: this.fileName,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends DocIntelError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configKey: this.configKey,
      },
    };
  }
}

// ============================================================================
// RATE LIMIT ERRORS
// ============================================================================

export class RateLimitError extends DocIntelError {
  readonly code = 'RATE_LIMITED';
  readonly retryable = true;

  constructor(
    readonly key: string,
    readonly retryAfterSeconds: number,
  ) {
    super(`Rate limit exceeded for ${key}; retry after ${retryAfterSeconds}s`);
    this.name = 'RateLimitError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        key: this.key,
        retryAfterSeconds: this.retryAfterSeconds,
      },
    };
  }
}

// ============================================================================
// LOOKUP ERRORS
// ============================================================================

export type LookupResource = 'document' | 'query_log' | 'ab_test';

const RESOURCE_LABELS: Record<LookupResource, string> = {
  document: 'document',
  query_log: 'query log',
  ab_test: 'A/B test',
};

export class NotFoundError extends DocIntelError {
  readonly code = 'NOT_FOUND';
  readonly retryable = false;

  constructor(
    readonly resource: LookupResource,
    readonly id: string,
  ) {
    super(`No ${RESOURCE_LABELS[resource]} with id ${id}`);
    this.name = 'NotFoundError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        resource: this.resource,
        id: this.id,
      },
    };
  }
}

// ============================================================================
// ERROR TYPE GUARDS
// ============================================================================

export function isDocIntelError(error: unknown): error is DocIntelError {
  return error instanceof DocIntelError;
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof DocIntelError) {
    return error.retryable;
  }

  // Network errors are generally retryable
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('econnreset') ||
      message.includes('etimedout') ||
      message.includes('enotfound') ||
      message.includes('socket hang up') ||
      message.includes('network')
    );
  }

  return false;
}
