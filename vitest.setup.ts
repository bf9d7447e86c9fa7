/**
 * Provider credentials are removed so no test reaches a live endpoint.
 * Logging stays silent unless DOCINTEL_LOG_LEVEL is set explicitly.
 */

delete process.env.OPENAI_API_KEY;
delete process.env.ANTHROPIC_API_KEY;
if (!process.env.DOCINTEL_LOG_LEVEL) {
  process.env.DOCINTEL_LOG_LEVEL = 'silent';
}
