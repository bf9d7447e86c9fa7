/**
 * @fileoverview Evaluate Command
 *
 * Usage: docintel evaluate --query "<q>" --response "<answer>"
 *        [--source "<text>"]... [--json]
 */

import { createError, toCliError } from '../errors.js';
import { GLOBAL_OPTIONS, parseCommandArgs, printJson, withService, type CommandOptions } from '../context.js';
import { printKeyValue } from '../progress.js';

export async function evaluateCommand(options: CommandOptions): Promise<void> {
  const { values } = parseCommandArgs('evaluate', {
    args: options.args,
    options: {
      ...GLOBAL_OPTIONS,
      query: { type: 'string', short: 'q' },
      response: { type: 'string', short: 'r' },
      source: { type: 'string', multiple: true },
    },
  });

  if (values.query === undefined || values.response === undefined) {
    throw createError(
      'INVALID_ARGUMENT',
      'Both --query and --response are required. Usage: docintel evaluate --query "<q>" --response "<answer>"',
    );
  }

  const input = { query: values.query, response: values.response, contextSources: values.source ?? [] };

  await withService(options.context, async (service) => {
    const outcome = await service.evaluateResponse(input);
    if (!outcome.ok) {
      throw toCliError(outcome.error);
    }
    const result = outcome.value;
    if (options.context.json) {
      printJson(result);
      return;
    }

    console.log(result.feedback);
    printKeyValue([
      { key: 'Relevance', value: result.relevanceScore.toFixed(2) },
      { key: 'Accuracy', value: result.accuracyScore.toFixed(2) },
      { key: 'Clarity', value: result.clarityScore.toFixed(2) },
      { key: 'Completeness', value: result.completenessScore.toFixed(2) },
      {
        key: '95% interval',
        value: `[${result.confidenceInterval[0].toFixed(2)}, ${result.confidenceInterval[1].toFixed(2)}]`,
      },
      { key: 'Fallback', value: result.fallback },
    ]);
    console.log(`\n${result.reasoning}`);
  });
}
