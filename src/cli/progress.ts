/**
 * @fileoverview Progress and formatting helpers for CLI output
 */

import cliProgress from 'cli-progress';

export interface ProgressBarHandle {
  update(current: number, payload?: Record<string, unknown>): void;
  stop(): void;
}

export interface ProgressBarOptions {
  total: number;
  format?: string;
}

/** Progress bar on stderr, so stdout stays parseable. */
export function createProgressBar(options: ProgressBarOptions): ProgressBarHandle {
  const format = options.format || '{bar} {percentage}% | {value}/{total} | {file}';

  const bar = new cliProgress.SingleBar(
    {
      format,
      barCompleteChar: '=',
      barIncompleteChar: '-',
      hideCursor: true,
      clearOnComplete: false,
      stopOnComplete: true,
      stream: process.stderr,
    },
    cliProgress.Presets.shades_classic,
  );

  bar.start(options.total, 0, { file: '' });

  return {
    update(current: number, payload?: Record<string, unknown>): void {
      bar.update(current, payload);
    },

    stop(): void {
      bar.stop();
    },
  };
}

export interface LazyProgressBar {
  update(current: number, total: number, payload?: Record<string, unknown>): void;
  stop(): void;
}

/** Starts the bar on the first update, once the total is known. */
export function createLazyProgressBar(): LazyProgressBar {
  let bar: ProgressBarHandle | undefined;
  return {
    update(current: number, total: number, payload?: Record<string, unknown>): void {
      bar ??= createProgressBar({ total });
      bar.update(current, payload);
    },

    stop(): void {
      bar?.stop();
    },
  };
}

/**
 * Format milliseconds into a human-readable duration
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

export function formatScore(value: number | null): string {
  return value === null ? 'N/A' : value.toFixed(3);
}

/**
 * Display a simple table in the terminal
 */
export function printTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((h, i) => {
    const maxRowWidth = Math.max(0, ...rows.map((row) => (row[i] || '').length));
    return Math.max(h.length, maxRowWidth);
  });

  const headerLine = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  console.log(headerLine);
  console.log(separator);

  for (const row of rows) {
    const line = row.map((cell, i) => (cell || '').padEnd(widths[i] ?? 0)).join(' | ');
    console.log(line);
  }
}

/**
 * Print a key-value list
 */
export function printKeyValue(items: Array<{ key: string; value: string | number | boolean | null }>): void {
  const maxKeyLength = Math.max(0, ...items.map((item) => item.key.length));

  for (const item of items) {
    const value = item.value === null ? 'N/A' : String(item.value);
    console.log(`  ${item.key.padEnd(maxKeyLength)}: ${value}`);
  }
}
