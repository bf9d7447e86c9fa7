/**
 * @fileoverview Safe JSON Parsing
 *
 * Parsing helpers for stored metadata and model replies. Values come back
 * as `unknown`; callers validate them with a schema.
 *
 * @packageDocumentation
 */

import { Err, Ok, type Result } from '../core/result.js';
import { toError } from './errors.js';

/**
 * Parse JSON, returning the error instead of throwing.
 */
export function safeJsonParse(text: string): Result<unknown, Error> {
  try {
    return Ok(JSON.parse(text));
  } catch (e) {
    return Err(toError(e));
  }
}

/**
 * Parse JSON, or undefined when the text is not JSON.
 */
export function safeJsonParseSimple(text: string): unknown {
  const result = safeJsonParse(text);
  return result.ok ? result.value : undefined;
}

/**
 * Pull the JSON payload out of a model reply. Handles replies wrapped in a
 * ```json fence and replies with prose around a single object.
 */
export function extractJsonPayload(text: string): string {
  const trimmed = text.trim();

  const fenced = trimmed.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/);
  if (fenced) {
    return fenced[1].trim();
  }

  if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
    return trimmed;
  }

  const objectMatch = trimmed.match(/\{[\s\S]*\}/);
  return objectMatch ? objectMatch[0] : trimmed;
}
