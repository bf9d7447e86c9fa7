/**
 * @fileoverview Health Command
 *
 * Usage: docintel health [--json]
 *
 * Exits with 1 when the index cannot be read.
 */

import { GLOBAL_OPTIONS, parseCommandArgs, printJson, withService, type CommandOptions } from '../context.js';
import { printKeyValue } from '../progress.js';

export async function healthCommand(options: CommandOptions): Promise<void> {
  parseCommandArgs('health', { args: options.args, options: GLOBAL_OPTIONS });

  await withService(options.context, async (service) => {
    const report = await service.getHealth();
    if (report.status === 'unhealthy') {
      process.exitCode = 1;
    }
    if (options.context.json) {
      printJson(report);
      return;
    }

    const { index, languageModel } = report.checks;
    console.log(`Status: ${report.status.toUpperCase()}`);
    printKeyValue([
      { key: 'Index', value: index.ok ? `ok (${index.chunks ?? 0} chunks)` : `error: ${index.error ?? 'unknown'}` },
      {
        key: 'Language model',
        value: languageModel.configured ? `${languageModel.provider}:${languageModel.model}` : 'not configured (fallback answers)',
      },
      { key: 'Checked at', value: report.timestamp },
    ]);
  });
}
