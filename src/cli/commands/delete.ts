/**
 * @fileoverview Delete Command
 *
 * Usage: docintel delete <documentId> [--json]
 */

import { createError } from '../errors.js';
import { GLOBAL_OPTIONS, parseCommandArgs, printJson, withService, type CommandOptions } from '../context.js';

export async function deleteCommand(options: CommandOptions): Promise<void> {
  const { positionals } = parseCommandArgs('delete', {
    args: options.args,
    options: GLOBAL_OPTIONS,
    allowPositionals: true,
  });

  const documentId = positionals[0];
  if (!documentId || positionals.length > 1) {
    throw createError('INVALID_ARGUMENT', 'Exactly one document id is required. Usage: docintel delete <documentId>');
  }

  await withService(options.context, async (service) => {
    const registered = service.getDocument(documentId).ok;
    const removed = await service.deleteDocument(documentId);
    if (removed === 0 && !registered) {
      throw createError('NOT_FOUND', `No chunks found for document ${documentId}`, { documentId });
    }
    if (options.context.json) {
      printJson({ documentId, chunksRemoved: removed });
      return;
    }
    console.log(`Deleted document ${documentId} (${removed} chunk(s))`);
  });
}
