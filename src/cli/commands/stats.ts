/**
 * @fileoverview Stats Command
 *
 * Usage: docintel stats [--json]
 */

import { GLOBAL_OPTIONS, parseCommandArgs, printJson, withService, type CommandOptions } from '../context.js';
import { formatDuration, formatScore, printKeyValue } from '../progress.js';

export async function statsCommand(options: CommandOptions): Promise<void> {
  parseCommandArgs('stats', { args: options.args, options: GLOBAL_OPTIONS });

  await withService(options.context, async (service) => {
    const stats = await service.getStats();
    if (options.context.json) {
      printJson(stats);
      return;
    }

    console.log('Index');
    printKeyValue([
      { key: 'Chunks', value: stats.totalChunks },
      { key: 'Storage', value: stats.storage },
      { key: 'Embedder', value: `${stats.embedder} (${stats.embeddingDimensions}d)` },
      { key: 'Language model', value: stats.languageModel },
    ]);
    console.log('\nQueries');
    printKeyValue([
      { key: 'Total', value: stats.queries.total },
      { key: 'Completed', value: stats.queries.completed },
      { key: 'Failed', value: stats.queries.failed },
      { key: 'Avg time', value: formatDuration(stats.queries.averageProcessingTime * 1000) },
      { key: 'Avg confidence', value: formatScore(stats.queries.averageConfidence) },
    ]);
  });
}
