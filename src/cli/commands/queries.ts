/**
 * @fileoverview Queries Command
 *
 * Usage: docintel queries [--limit N] [--status completed|failed]
 *        [--client-id ID] [--json]
 */

import type { QueryStatus } from '../../storage/query_log.js';
import { createError } from '../errors.js';
import {
  GLOBAL_OPTIONS,
  parseCommandArgs,
  parseIntegerFlag,
  printJson,
  withService,
  type CommandOptions,
} from '../context.js';
import { formatScore, printTable } from '../progress.js';

const QUERY_PREVIEW_LENGTH = 50;

export async function queriesCommand(options: CommandOptions): Promise<void> {
  const { values } = parseCommandArgs('queries', {
    args: options.args,
    options: {
      ...GLOBAL_OPTIONS,
      limit: { type: 'string' },
      status: { type: 'string' },
      'client-id': { type: 'string' },
    },
  });

  const limit = parseIntegerFlag('limit', values.limit);
  if (limit !== undefined && limit < 1) {
    throw createError('INVALID_ARGUMENT', '--limit must be at least 1');
  }
  const status = parseStatus(values.status);

  await withService(options.context, async (service) => {
    const entries = service.listQueries({ limit, status, clientId: values['client-id'] });
    if (options.context.json) {
      printJson(entries);
      return;
    }
    if (entries.length === 0) {
      console.log('No queries recorded.');
      return;
    }
    printTable(
      ['When', 'Client', 'Status', 'Confidence', 'Query'],
      entries.map((entry) => [
        entry.createdAt,
        entry.clientId,
        entry.status,
        formatScore(entry.confidenceScore),
        truncate(entry.queryText, QUERY_PREVIEW_LENGTH),
      ]),
    );
  });
}

export function parseStatus(raw: string | undefined): QueryStatus | undefined {
  if (raw === undefined) return undefined;
  if (raw === 'completed' || raw === 'failed') return raw;
  throw createError('INVALID_ARGUMENT', `--status must be "completed" or "failed", got "${raw}"`);
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}
