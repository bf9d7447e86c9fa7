/**
 * @fileoverview Metrics Command
 *
 * Usage: docintel metrics [--days N] [--json]
 */

import { DEFAULT_METRICS_WINDOW_DAYS } from '../../evaluation/metrics.js';
import { createError } from '../errors.js';
import {
  GLOBAL_OPTIONS,
  parseCommandArgs,
  parseIntegerFlag,
  printJson,
  withService,
  type CommandOptions,
} from '../context.js';
import { formatDuration, formatScore, printKeyValue } from '../progress.js';

export async function metricsCommand(options: CommandOptions): Promise<void> {
  const { values } = parseCommandArgs('metrics', {
    args: options.args,
    options: { ...GLOBAL_OPTIONS, days: { type: 'string' } },
  });

  const days = parseIntegerFlag('days', values.days) ?? DEFAULT_METRICS_WINDOW_DAYS;
  if (days < 1) {
    throw createError('INVALID_ARGUMENT', '--days must be at least 1');
  }

  await withService(options.context, async (service) => {
    const metrics = service.getPerformanceMetrics(days);
    if (options.context.json) {
      printJson(metrics);
      return;
    }
    console.log(`Performance over the last ${metrics.windowDays} day(s)`);
    printKeyValue([
      { key: 'Queries', value: metrics.totalQueries },
      { key: 'Success rate', value: `${(metrics.successRate * 100).toFixed(1)}%` },
      { key: 'Avg response time', value: formatDuration(metrics.averageResponseTime * 1000) },
      { key: 'Avg confidence', value: formatScore(metrics.averageQualityScore) },
      { key: 'High-confidence share', value: `${(metrics.retrievalAccuracy * 100).toFixed(1)}%` },
      {
        key: 'User satisfaction',
        value: metrics.userSatisfaction === null ? 'no feedback' : `${metrics.userSatisfaction.toFixed(2)} / 5`,
      },
    ]);
  });
}
