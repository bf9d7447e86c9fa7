#!/usr/bin/env node
/**
 * @fileoverview docintel CLI
 *
 * Commands:
 *   docintel ingest <path...>      - Chunk, embed and index documents
 *   docintel query "<question>"    - Answer a question from the index
 *   docintel delete <documentId>   - Remove a document's chunks
 *   docintel documents [id]        - Registered documents and their status
 *   docintel stats                 - Index and query-log statistics
 *   docintel health                - Index and language model status
 *   docintel queries               - Recent query-log entries
 *   docintel feedback <queryId>    - Rate a logged query
 *   docintel metrics               - Performance metrics over a window
 *   docintel evaluate              - LLM-judge score for an answer
 *   docintel abtest <action>       - Create, assign, record and analyze A/B tests
 *   docintel config                - Resolved configuration
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import { abtestCommand } from './commands/abtest.js';
import { configCommand } from './commands/config.js';
import { deleteCommand } from './commands/delete.js';
import { documentsCommand } from './commands/documents.js';
import { evaluateCommand } from './commands/evaluate.js';
import { feedbackCommand } from './commands/feedback.js';
import { healthCommand } from './commands/health.js';
import { ingestCommand } from './commands/ingest.js';
import { metricsCommand } from './commands/metrics.js';
import { queriesCommand } from './commands/queries.js';
import { queryCommand } from './commands/query.js';
import { statsCommand } from './commands/stats.js';
import type { CliContext, CommandOptions } from './context.js';
import { createError, formatError, formatErrorJson, getExitCode } from './errors.js';
import { showHelp } from './help.js';

type Command =
  | 'ingest'
  | 'query'
  | 'delete'
  | 'documents'
  | 'stats'
  | 'health'
  | 'queries'
  | 'feedback'
  | 'metrics'
  | 'evaluate'
  | 'abtest'
  | 'config'
  | 'help';

const COMMANDS: Record<Command, { description: string; usage: string }> = {
  'ingest': {
    description: 'Chunk, embed and index documents',
    usage: 'docintel ingest <path...> [--json]',
  },
  'query': {
    description: 'Answer a question from the indexed documents',
    usage: 'docintel query "<question>" [--max-results N] [--file-type T] [--min-score S] [--json]',
  },
  'delete': {
    description: 'Remove every chunk of a document',
    usage: 'docintel delete <documentId> [--json]',
  },
  'documents': {
    description: 'List registered documents or show one',
    usage: 'docintel documents [documentId] [--limit N] [--offset N] [--status S] [--file-type T] [--json]',
  },
  'stats': {
    description: 'Show index and query-log statistics',
    usage: 'docintel stats [--json]',
  },
  'health': {
    description: 'Check the index and language model',
    usage: 'docintel health [--json]',
  },
  'queries': {
    description: 'List recent queries from the query log',
    usage: 'docintel queries [--limit N] [--status completed|failed] [--client-id ID] [--json]',
  },
  'feedback': {
    description: 'Rate the answer to a logged query',
    usage: 'docintel feedback <queryLogId> --rating 1-5 [--type T] [--comment "<text>"] [--helpful|--not-helpful] [--json]',
  },
  'metrics': {
    description: 'Show performance metrics over a time window',
    usage: 'docintel metrics [--days N] [--json]',
  },
  'evaluate': {
    description: 'Score an answer with the LLM judge',
    usage: 'docintel evaluate --query "<q>" --response "<answer>" [--source "<text>"]... [--json]',
  },
  'abtest': {
    description: 'Create, assign, record and analyze A/B tests',
    usage: 'docintel abtest <create|assign|record|analyze|list> [args] [--json]',
  },
  'config': {
    description: 'Print the resolved configuration',
    usage: 'docintel config [--json]',
  },
  'help': {
    description: 'Show help information',
    usage: 'docintel help [command]',
  },
};

const HANDLERS: Record<Exclude<Command, 'help'>, (options: CommandOptions) => Promise<void>> = {
  ingest: ingestCommand,
  query: queryCommand,
  delete: deleteCommand,
  documents: documentsCommand,
  stats: statsCommand,
  health: healthCommand,
  queries: queriesCommand,
  feedback: feedbackCommand,
  metrics: metricsCommand,
  evaluate: evaluateCommand,
  abtest: abtestCommand,
  config: configCommand,
};

function isCommand(value: string): value is Command {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  // Global options only; each command re-parses its own args strictly.
  const { values, positionals, tokens } = parseArgs({
    args: argv,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
      config: { type: 'string', short: 'c' },
      'data-dir': { type: 'string' },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: false,
    tokens: true,
  });

  if (values.version === true) {
    const { DOCINTEL_VERSION } = await import('../index.js');
    console.log(`docintel ${DOCINTEL_VERSION}`);
    return;
  }

  const command = positionals[0];
  const context: CliContext = {
    configPath: typeof values.config === 'string' ? values.config : undefined,
    dataDir: typeof values['data-dir'] === 'string' ? values['data-dir'] : undefined,
    json: values.json === true,
  };

  if (values.help === true || !command || command === 'help') {
    showHelp(command === 'help' ? positionals[1] : command);
    return;
  }

  try {
    if (!isCommand(command) || command === 'help') {
      throw createError('INVALID_ARGUMENT', `Unknown command: ${command}`, {
        available: Object.keys(COMMANDS),
      });
    }
    const commandIndex = tokens.find((token) => token.kind === 'positional')?.index ?? 0;
    const args = [...argv.slice(0, commandIndex), ...argv.slice(commandIndex + 1)];
    await HANDLERS[command]({ context, args });
  } catch (error) {
    if (context.json) {
      console.log(formatErrorJson(error));
    } else {
      console.error(formatError(error));
    }
    process.exitCode = getExitCode(error);
  }
}

main().catch((error) => {
  console.error(formatError(error));
  process.exitCode = getExitCode(error);
});
