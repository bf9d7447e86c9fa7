/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import {
  ConfigurationError,
  IngestionError,
  NotFoundError,
  ProviderError,
  QueryFailedError,
  RateLimitError,
  StorageError,
  ValidationError,
  isDocIntelError,
} from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'CONFIG_INVALID'
  | 'VALIDATION_FAILED'
  | 'QUERY_FAILED'
  | 'RATE_LIMITED'
  | 'INGEST_FAILED'
  | 'NOT_FOUND'
  | 'STORAGE_ERROR'
  | 'PROVIDER_UNAVAILABLE'
  | 'INTERNAL';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `docintel help <command>` for usage information.',
  CONFIG_INVALID: 'Run `docintel config` to see the resolved configuration and fix the named key.',
  VALIDATION_FAILED: 'Check the request fields against `docintel help query`.',
  QUERY_FAILED: 'Check `docintel health` and try the query again.',
  RATE_LIMITED: 'Wait for the rate-limit window to pass, then retry.',
  INGEST_FAILED: 'Supported formats are .txt, .md, .markdown, .csv, .json and .log.',
  NOT_FOUND: 'Run `docintel stats` to see what is indexed.',
  STORAGE_ERROR: 'Check that the data directory exists and is writable.',
  PROVIDER_UNAVAILABLE: 'Check the provider API key and base URL with `docintel config`.',
  INTERNAL: 'Re-run with DOCINTEL_LOG_LEVEL=debug for details.',
};

/** Exit status per code; usage errors exit with 2 like most CLIs. */
const EXIT_CODES: Record<CliErrorCode, number> = {
  INVALID_ARGUMENT: 2,
  CONFIG_INVALID: 3,
  VALIDATION_FAILED: 2,
  QUERY_FAILED: 1,
  RATE_LIMITED: 4,
  INGEST_FAILED: 1,
  NOT_FOUND: 1,
  STORAGE_ERROR: 5,
  PROVIDER_UNAVAILABLE: 6,
  INTERNAL: 1,
};

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

/**
 * Map any thrown value onto a CliError. Library errors keep their message;
 * a QueryFailedError keeps only the generic one plus the failing stage.
 */
export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  if (error instanceof ValidationError) {
    return createError('VALIDATION_FAILED', error.message, { field: error.field });
  }
  if (error instanceof ConfigurationError) {
    return createError('CONFIG_INVALID', error.message, { key: error.configKey });
  }
  if (error instanceof QueryFailedError) {
    return createError('QUERY_FAILED', error.message, { stage: error.stage });
  }
  if (error instanceof RateLimitError) {
    return createError('RATE_LIMITED', error.message, { retryAfterSeconds: error.retryAfterSeconds });
  }
  if (error instanceof IngestionError) {
    return createError('INGEST_FAILED', error.message, { reason: error.reason });
  }
  if (error instanceof NotFoundError) {
    return createError('NOT_FOUND', error.message, { resource: error.resource, id: error.id });
  }
  if (error instanceof StorageError) {
    return createError('STORAGE_ERROR', error.message, { operation: error.operation });
  }
  if (error instanceof ProviderError) {
    return createError('PROVIDER_UNAVAILABLE', error.message, { provider: error.provider });
  }
  if (isDocIntelError(error)) {
    return createError('INTERNAL', error.message, { code: error.code });
  }
  return createError('INTERNAL', getErrorMessage(error));
}

export function formatError(error: unknown): string {
  const cliError = toCliError(error);
  const lines = [`Error [${cliError.code}]: ${cliError.message}`];
  if (cliError.suggestion) {
    lines.push('', `Suggestion: ${cliError.suggestion}`);
  }
  return lines.join('\n');
}

export function formatErrorJson(error: unknown): string {
  const cliError = toCliError(error);
  return JSON.stringify(
    {
      error: {
        code: cliError.code,
        message: cliError.message,
        suggestion: cliError.suggestion,
        details: cliError.details,
      },
    },
    null,
    2,
  );
}

export function getExitCode(error: unknown): number {
  return EXIT_CODES[toCliError(error).code];
}
