/**
 * @fileoverview Request schemas
 *
 * zod schemas for what callers send the service. Parsing yields the typed
 * request or the first issue as a ValidationError.
 */

import { z } from 'zod';
import { Err, Ok, type Result } from '../core/result.js';
import { ValidationError } from '../core/errors.js';
import { FEEDBACK_TYPES } from '../storage/feedback.js';
import type { FilterParams, QueryRequest } from '../types.js';

export const MAX_QUERY_LENGTH = 1000;
export const MAX_RESULTS_LIMIT = 20;
export const DEFAULT_MAX_RESULTS = 5;
export const MAX_FEEDBACK_COMMENT_LENGTH = 1000;
export const MAX_SUGGESTION_LENGTH = 500;

export const FilterParamsSchema = z
  .record(z.unknown())
  .transform((raw, ctx): FilterParams => {
    const params: FilterParams = {};
    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(raw)) {
      if (key === 'file_type') {
        if (typeof value !== 'string') {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['file_type'], message: 'Expected string' });
          continue;
        }
        params.file_type = value;
      } else if (key === 'min_score') {
        const score = typeof value === 'string' ? Number(value) : value;
        if (typeof score !== 'number' || !Number.isFinite(score)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['min_score'], message: 'Expected number' });
          continue;
        }
        params.min_score = score;
      } else {
        extra[key] = value;
      }
    }
    if (Object.keys(extra).length > 0) params.extra = extra;
    return params;
  });

export const QueryRequestSchema = z.object({
  query: z.string().min(1).max(MAX_QUERY_LENGTH),
  maxResults: z.number().int().min(1).max(MAX_RESULTS_LIMIT).default(DEFAULT_MAX_RESULTS),
  includeMetadata: z.boolean().default(true),
  /** JSON clients may send null for "no filters" */
  filterParams: FilterParamsSchema.nullish().transform((params) => params ?? undefined),
});

export type QueryRequestInput = z.input<typeof QueryRequestSchema>;

export const EvaluationRequestSchema = z.object({
  query: z.string().min(1).max(MAX_QUERY_LENGTH),
  response: z.string().min(1),
  contextSources: z.array(z.string()).default([]),
});

export type EvaluationRequestInput = z.input<typeof EvaluationRequestSchema>;
export type EvaluationRequest = z.output<typeof EvaluationRequestSchema>;

export const FeedbackRequestSchema = z.object({
  queryLogId: z.string().min(1),
  rating: z.number().int().min(1).max(5),
  comment: z.string().max(MAX_FEEDBACK_COMMENT_LENGTH).optional(),
  feedbackType: z.enum(FEEDBACK_TYPES).default('general'),
  wasHelpful: z.boolean().optional(),
  suggestedImprovement: z.string().max(MAX_SUGGESTION_LENGTH).optional(),
});

export type FeedbackRequestInput = z.input<typeof FeedbackRequestSchema>;
export type FeedbackRequest = z.output<typeof FeedbackRequestSchema>;

function describeReceived(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (typeof value === 'string') {
    return value.length > 40 ? `string(${value.length})` : JSON.stringify(value);
  }
  if (typeof value === 'number' || typeof value === 'boolean' || value === null) return String(value);
  return Array.isArray(value) ? 'array' : typeof value;
}

function valueAtPath(input: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = input;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

/**
 * First zod issue as a ValidationError. `field` is the dotted path.
 */
export function toValidationError(error: z.ZodError, input: unknown): ValidationError {
  const issue = error.issues[0];
  if (!issue) return new ValidationError('request', 'valid request', describeReceived(input));
  const field = issue.path.length > 0 ? issue.path.join('.') : 'request';
  return new ValidationError(field, issue.message, describeReceived(valueAtPath(input, issue.path)));
}

export function parseQueryRequest(input: unknown): Result<QueryRequest, ValidationError> {
  const parsed = QueryRequestSchema.safeParse(input);
  if (!parsed.success) return Err(toValidationError(parsed.error, input));
  return Ok(parsed.data);
}

export function parseEvaluationRequest(input: unknown): Result<EvaluationRequest, ValidationError> {
  const parsed = EvaluationRequestSchema.safeParse(input);
  if (!parsed.success) return Err(toValidationError(parsed.error, input));
  return Ok(parsed.data);
}

export function parseFeedbackRequest(input: unknown): Result<FeedbackRequest, ValidationError> {
  const parsed = FeedbackRequestSchema.safeParse(input);
  if (!parsed.success) return Err(toValidationError(parsed.error, input));
  return Ok(parsed.data);
}
