/**
 * @fileoverview Feedback Command
 *
 * Usage: docintel feedback <queryLogId> --rating 1-5
 *        [--type general|accuracy|relevance|speed] [--comment "<text>"]
 *        [--helpful | --not-helpful] [--suggestion "<text>"] [--client-id ID] [--json]
 */

import { createError, toCliError } from '../errors.js';
import {
  GLOBAL_OPTIONS,
  parseCommandArgs,
  parseIntegerFlag,
  printJson,
  withService,
  type CommandOptions,
} from '../context.js';
import { CLI_CLIENT_ID } from './query.js';

export async function feedbackCommand(options: CommandOptions): Promise<void> {
  const { values, positionals } = parseCommandArgs('feedback', {
    args: options.args,
    options: {
      ...GLOBAL_OPTIONS,
      rating: { type: 'string' },
      type: { type: 'string' },
      comment: { type: 'string' },
      helpful: { type: 'boolean' },
      'not-helpful': { type: 'boolean' },
      suggestion: { type: 'string' },
      'client-id': { type: 'string' },
    },
    allowPositionals: true,
  });

  const queryLogId = positionals[0];
  if (!queryLogId || positionals.length > 1) {
    throw createError('INVALID_ARGUMENT', 'Exactly one query id is required. Usage: docintel feedback <queryLogId> --rating N');
  }
  if (values.helpful === true && values['not-helpful'] === true) {
    throw createError('INVALID_ARGUMENT', '--helpful and --not-helpful cannot be combined');
  }

  const input = {
    queryLogId,
    rating: parseIntegerFlag('rating', values.rating),
    feedbackType: values.type,
    comment: values.comment,
    wasHelpful: values.helpful === true ? true : values['not-helpful'] === true ? false : undefined,
    suggestedImprovement: values.suggestion,
  };

  await withService(options.context, async (service) => {
    const outcome = service.submitFeedback(input, values['client-id'] ?? CLI_CLIENT_ID);
    if (!outcome.ok) {
      throw toCliError(outcome.error);
    }
    if (options.context.json) {
      printJson(outcome.value);
      return;
    }
    console.log(`Recorded ${outcome.value.feedbackType} feedback (${outcome.value.rating}/5) for query ${queryLogId}`);
  });
}
