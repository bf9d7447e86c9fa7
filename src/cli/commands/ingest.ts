/**
 * @fileoverview Ingest Command
 *
 * Usage: docintel ingest <path...> [--json]
 *
 * Each path may be a file, a directory (searched recursively for supported
 * files) or a glob pattern.
 */

import type { IngestedDocument } from '../../ingest/document_ingestor.js';
import { createError } from '../errors.js';
import { GLOBAL_OPTIONS, parseCommandArgs, printJson, withService, type CommandOptions } from '../context.js';
import { createLazyProgressBar, formatDuration, printTable } from '../progress.js';

export async function ingestCommand(options: CommandOptions): Promise<void> {
  const { positionals } = parseCommandArgs('ingest', {
    args: options.args,
    options: GLOBAL_OPTIONS,
    allowPositionals: true,
  });

  if (positionals.length === 0) {
    throw createError('INVALID_ARGUMENT', 'At least one path is required. Usage: docintel ingest <path...>');
  }

  const showProgress = !options.context.json && process.stderr.isTTY === true;
  const startedAt = Date.now();

  await withService(options.context, async (service) => {
    const bar = showProgress ? createLazyProgressBar() : undefined;
    const result = await service.ingestPaths(positionals, {
      onProgress: (completed, total, file) => bar?.update(completed, total, { file }),
    });
    bar?.stop();

    if (result.documents.length === 0 && result.skipped.length === 0) {
      throw createError('INVALID_ARGUMENT', `No files matched: ${positionals.join(', ')}`);
    }
    if (result.documents.length === 0) {
      process.exitCode = 1;
    }

    if (options.context.json) {
      printJson(result);
      return;
    }

    const totalChunks = result.documents.reduce((sum, doc) => sum + doc.totalChunks, 0);
    console.log(
      `Ingested ${result.documents.length} document(s), ${totalChunks} chunk(s) in ${formatDuration(Date.now() - startedAt)}`,
    );
    if (result.documents.length > 0) {
      console.log('');
      printTable(['Document ID', 'Source', 'Type', 'Chunks'], result.documents.map(toRow));
    }
    if (result.skipped.length > 0) {
      console.log('\nSkipped:');
      for (const skipped of result.skipped) {
        console.log(`  ${skipped.path}: ${skipped.reason}`);
      }
    }
  });
}

function toRow(doc: IngestedDocument): string[] {
  return [doc.documentId, doc.source, doc.fileType, String(doc.totalChunks)];
}
