/**
 * @fileoverview Query Command
 *
 * Usage: docintel query "<question>" [--max-results N] [--file-type T]
 *        [--min-score S] [--client-id ID] [--no-metadata] [--json]
 */

import type { RAGResponse } from '../../types.js';
import { createError, toCliError } from '../errors.js';
import {
  GLOBAL_OPTIONS,
  parseCommandArgs,
  parseIntegerFlag,
  parseNumberFlag,
  printJson,
  withService,
  type CommandOptions,
} from '../context.js';
import { formatDuration, formatScore } from '../progress.js';

export const CLI_CLIENT_ID = 'cli';

export async function queryCommand(options: CommandOptions): Promise<void> {
  const { values, positionals } = parseCommandArgs('query', {
    args: options.args,
    options: {
      ...GLOBAL_OPTIONS,
      'max-results': { type: 'string' },
      'file-type': { type: 'string' },
      'min-score': { type: 'string' },
      'client-id': { type: 'string' },
      'no-metadata': { type: 'boolean', default: false },
    },
    allowPositionals: true,
  });

  const question = positionals.join(' ').trim();
  if (!question) {
    throw createError('INVALID_ARGUMENT', 'A question is required. Usage: docintel query "<question>"');
  }

  const request = buildQueryRequest(question, {
    maxResults: parseIntegerFlag('max-results', values['max-results']),
    fileType: values['file-type'],
    minScore: parseNumberFlag('min-score', values['min-score']),
    includeMetadata: !values['no-metadata'],
  });

  await withService(options.context, async (service) => {
    const outcome = await service.query(request, values['client-id'] ?? CLI_CLIENT_ID);
    if (!outcome.ok) {
      throw toCliError(outcome.error);
    }
    if (options.context.json) {
      printJson(outcome.value);
      return;
    }
    printResponse(outcome.value);
  });
}

export interface QueryFlags {
  maxResults?: number;
  fileType?: string;
  minScore?: number;
  includeMetadata: boolean;
}

/**
 * Request object as the service expects it; left to the service schema to
 * validate ranges.
 */
export function buildQueryRequest(question: string, flags: QueryFlags): Record<string, unknown> {
  const request: Record<string, unknown> = { query: question, includeMetadata: flags.includeMetadata };
  if (flags.maxResults !== undefined) request.maxResults = flags.maxResults;

  const filterParams: Record<string, unknown> = {};
  if (flags.fileType !== undefined) filterParams.file_type = flags.fileType;
  if (flags.minScore !== undefined) filterParams.min_score = flags.minScore;
  if (Object.keys(filterParams).length > 0) request.filterParams = filterParams;

  return request;
}

function printResponse(response: RAGResponse): void {
  console.log(response.answer);
  console.log('');
  console.log(
    `Confidence: ${formatScore(response.confidenceScore)} | Time: ${formatDuration(response.processingTime * 1000)}`,
  );
  if (response.sources.length === 0) return;

  console.log('\nSources:');
  response.sources.forEach((source, index) => {
    const origin = source.metadata.source ? ` (${source.metadata.source})` : '';
    console.log(`  [${index + 1}] ${source.id}${origin} score=${formatScore(source.relevanceScore)}`);
    console.log(`      ${source.contentPreview}`);
  });
}
