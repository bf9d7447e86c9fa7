/**
 * @fileoverview Documents Command
 *
 * Usage: docintel documents [documentId] [--limit N] [--offset N]
 *        [--status processing|completed|failed] [--file-type T] [--json]
 */

import { PROCESSING_STATUSES, type DocumentRecord, type ProcessingStatus } from '../../storage/document_registry.js';
import { createError, toCliError } from '../errors.js';
import {
  GLOBAL_OPTIONS,
  parseCommandArgs,
  parseIntegerFlag,
  printJson,
  withService,
  type CommandOptions,
} from '../context.js';
import { printKeyValue, printTable } from '../progress.js';

export async function documentsCommand(options: CommandOptions): Promise<void> {
  const { values, positionals } = parseCommandArgs('documents', {
    args: options.args,
    options: {
      ...GLOBAL_OPTIONS,
      limit: { type: 'string' },
      offset: { type: 'string' },
      status: { type: 'string' },
      'file-type': { type: 'string' },
    },
    allowPositionals: true,
  });

  if (positionals.length > 1) {
    throw createError('INVALID_ARGUMENT', 'At most one document id is allowed. Usage: docintel documents [documentId]');
  }
  const limit = parseIntegerFlag('limit', values.limit);
  if (limit !== undefined && limit < 1) {
    throw createError('INVALID_ARGUMENT', '--limit must be at least 1');
  }
  const offset = parseIntegerFlag('offset', values.offset);
  if (offset !== undefined && offset < 0) {
    throw createError('INVALID_ARGUMENT', '--offset must not be negative');
  }
  const status = parseProcessingStatus(values.status);
  const documentId = positionals[0];

  await withService(options.context, async (service) => {
    if (documentId !== undefined) {
      const found = service.getDocument(documentId);
      if (!found.ok) {
        throw toCliError(found.error);
      }
      if (options.context.json) {
        printJson(found.value);
        return;
      }
      printDocument(found.value);
      return;
    }

    const documents = service.listDocuments({ limit, offset, status, fileType: values['file-type'] });
    if (options.context.json) {
      printJson(documents);
      return;
    }
    if (documents.length === 0) {
      console.log('No documents registered.');
      return;
    }
    printTable(
      ['ID', 'File', 'Type', 'Chunks', 'Status', 'Created'],
      documents.map((document) => [
        document.id,
        document.filename,
        document.fileType,
        String(document.totalChunks),
        document.processingStatus,
        document.createdAt,
      ]),
    );
  });
}

export function parseProcessingStatus(raw: string | undefined): ProcessingStatus | undefined {
  if (raw === undefined) return undefined;
  const status = PROCESSING_STATUSES.find((candidate) => candidate === raw);
  if (status) return status;
  throw createError('INVALID_ARGUMENT', `--status must be one of ${PROCESSING_STATUSES.join(', ')}, got "${raw}"`);
}

function printDocument(document: DocumentRecord): void {
  printKeyValue([
    { key: 'ID', value: document.id },
    { key: 'File', value: document.filename },
    { key: 'Type', value: document.fileType },
    { key: 'Size (bytes)', value: document.fileSize },
    { key: 'Status', value: document.processingStatus },
    { key: 'Chunks', value: document.totalChunks },
    { key: 'Chunking', value: `${document.chunkSize} / ${document.chunkOverlap} overlap` },
    { key: 'Created', value: document.createdAt },
    { key: 'Processed', value: document.processedAt ?? null },
    { key: 'Error', value: document.errorMessage ?? null },
  ]);
}
