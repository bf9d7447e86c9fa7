/**
 * @fileoverview Detailed help text for docintel CLI commands
 */

const HELP_TEXT = {
  main: `
docintel - Document ingestion and retrieval-augmented question answering

USAGE:
    docintel <command> [options]

COMMANDS:
    ingest <path...>    Chunk, embed and index documents
    query "<question>"  Answer a question from the indexed documents
    delete <id>         Remove every chunk of a document
    documents [id]      List registered documents or show one
    stats               Show index and query-log statistics
    health              Check the index and language model
    queries             List recent queries from the query log
    feedback <queryId>  Rate the answer to a logged query
    metrics             Show performance metrics over a time window
    evaluate            Score an answer with the LLM judge
    abtest <action>     Create, assign, record and analyze A/B tests
    config              Print the resolved configuration
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    -c, --config <path> Read configuration from this YAML file
    --data-dir <dir>    Directory holding the database (":memory:" for none)
    --json              Print results and errors as JSON

ERRORS:
    Failures print "Error [CODE]: message" and a suggestion to stderr.
    With --json the error is printed to stdout as:
    {
      "error": { "code": "QUERY_FAILED", "message": "...", "suggestion": "...", "details": { ... } }
    }

    Exit codes:
    - 1: query, ingestion or lookup failed
    - 2: invalid arguments or request fields
    - 3: invalid configuration
    - 4: rate limited
    - 5: storage error
    - 6: provider error

EXAMPLES:
    docintel ingest ./handbook
    docintel query "What is the refund window?" --max-results 3
    docintel stats --json

For more information on a specific command, run:
    docintel help <command>
`,

  ingest: `
docintel ingest - Chunk, embed and index documents

USAGE:
    docintel ingest <path...> [--json]

DESCRIPTION:
    Each path may be a file, a directory or a glob pattern. Directories are
    searched recursively for .txt, .md, .markdown, .csv, .json and .log
    files. Files that cannot be read or have an unsupported type are listed
    as skipped; the rest are still ingested.

    Chunk size and overlap come from the "chunking" configuration section
    (default 1000 characters with 200 of overlap).

EXAMPLES:
    docintel ingest notes.md
    docintel ingest ./docs "logs/**/*.log"
`,

  query: `
docintel query - Answer a question from the indexed documents

USAGE:
    docintel query "<question>" [options]

OPTIONS:
    --max-results <n>   Sources to return and answer from, 1-20 (default: 5)
    --file-type <type>  Only use chunks whose file type matches exactly
    --min-score <s>     Only use chunks with relevance at or above s
    --client-id <id>    Rate-limit and log the query under this id (default: cli)
    --no-metadata       Leave full context chunks out of the JSON result
    --json              Output the full response as JSON

DESCRIPTION:
    Retrieves the closest chunks, filters noise and near-duplicates,
    re-ranks with the language model when more candidates than needed
    survive, packs them into the context budget and generates an answer.
    Without a language model the answer lists the top sources instead.

EXAMPLES:
    docintel query "How do I reset my password?"
    docintel query "Q3 revenue" --file-type csv --min-score 0.4 --json
`,

  delete: `
docintel delete - Remove every chunk of a document

USAGE:
    docintel delete <documentId> [--json]

DESCRIPTION:
    The document id is printed by "docintel ingest". Removes the chunks and
    the registry entry. Exits with an error when neither exists.
`,

  documents: `
docintel documents - List registered documents or show one

USAGE:
    docintel documents [documentId] [options]

OPTIONS:
    --limit <n>         Number of documents, newest first (default: 100)
    --offset <n>        Skip this many documents first
    --status <s>        Only processing, completed or failed documents
    --file-type <type>  Only documents of this file type

DESCRIPTION:
    Every ingestion is registered as processing and then marked completed
    or failed. Failed documents keep their error message.
`,

  stats: `
docintel stats - Show index and query-log statistics

USAGE:
    docintel stats [--json]
`,

  health: `
docintel health - Check the index and language model

USAGE:
    docintel health [--json]

DESCRIPTION:
    healthy    the index is readable and a language model is configured
    degraded   the index is readable but answers use the fallback
    unhealthy  the index cannot be read (exit code 1)
`,

  queries: `
docintel queries - List recent queries from the query log

USAGE:
    docintel queries [--limit N] [--status completed|failed] [--client-id ID] [--json]

OPTIONS:
    --limit <n>         Number of entries, newest first (default: 50)
    --status <s>        Only completed or only failed queries
    --client-id <id>    Only queries from this client
`,

  feedback: `
docintel feedback - Rate the answer to a logged query

USAGE:
    docintel feedback <queryLogId> --rating 1-5 [options]

OPTIONS:
    --rating <n>        Rating from 1 to 5 (required)
    --type <t>          general, accuracy, relevance or speed (default: general)
    --comment <text>    Up to 1000 characters
    --helpful           The answer was helpful
    --not-helpful       The answer was not helpful
    --suggestion <text> Suggested improvement, up to 500 characters
    --client-id <id>    Client that asked the query (default: cli)

DESCRIPTION:
    Query ids are listed by "docintel queries --json". A query holds one
    feedback entry; rating it again replaces the earlier one. The mean
    rating appears as user satisfaction in "docintel metrics".
`,

  metrics: `
docintel metrics - Show performance metrics over a time window

USAGE:
    docintel metrics [--days N] [--json]

OPTIONS:
    --days <n>          Window length in days (default: 7)
`,

  evaluate: `
docintel evaluate - Score an answer with the LLM judge

USAGE:
    docintel evaluate --query "<q>" --response "<answer>" [--source "<text>"]... [--json]

DESCRIPTION:
    Rates relevance, accuracy, clarity and completeness from 0 to 5 and
    reports a 95% interval around the overall score. Without a language
    model, or when the judge keeps returning invalid output, a neutral
    fallback score of 2.5 is reported.
`,

  abtest: `
docintel abtest - Create, assign, record and analyze A/B tests

USAGE:
    docintel abtest create <name> [--split S] [--min-samples N] [--alpha A]
                                  [--control V] [--treatment V]
    docintel abtest assign <name> <userId>
    docintel abtest record <name> <variant> <userId> <outcome>
    docintel abtest analyze <name>
    docintel abtest list

OPTIONS:
    --split <s>         Share of users sent to the treatment, 0.1-0.9 (default: 0.5)
    --min-samples <n>   Samples per variant, at least 30 (default: 100)
    --alpha <a>         Significance level, 0.01-0.1 (default: 0.05)
    --control <v>       Control version name (default: A)
    --treatment <v>     Treatment version name (default: B)

DESCRIPTION:
    Creating a test under an existing name restarts it. The minimum sample
    size is raised to what detecting a 0.2 standard-deviation effect with
    80% power requires. Users are assigned by a hash of the test name and
    user id, so repeated assignments agree. Analysis needs 30 outcomes per
    variant and recommends deploying only a significantly better treatment.
`,

  config: `
docintel config - Print the resolved configuration

USAGE:
    docintel config [--json]

DESCRIPTION:
    Shows defaults merged with docintel.yaml (or --config) and DOCINTEL_*
    environment variables. API keys are redacted.
`,
} satisfies Record<string, string>;

export type HelpTopic = keyof typeof HELP_TEXT;

export function isHelpTopic(command: string): command is HelpTopic {
  return Object.prototype.hasOwnProperty.call(HELP_TEXT, command);
}

export function showHelp(command?: string): void {
  if (command && isHelpTopic(command)) {
    console.log(HELP_TEXT[command]);
  } else if (command) {
    console.log(`Unknown command: ${command}`);
    console.log(HELP_TEXT.main);
  } else {
    console.log(HELP_TEXT.main);
  }
}

export function getCommandHelp(command: string): string {
  return isHelpTopic(command) ? HELP_TEXT[command] : HELP_TEXT.main;
}
