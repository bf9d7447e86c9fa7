/**
 * @fileoverview Document intelligence: ingestion, vector search and
 * retrieval-augmented answering.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { DocumentIntelligenceService, loadServiceConfig } from 'docintel';
 *
 * const service = DocumentIntelligenceService.create(loadServiceConfig());
 * await service.ingestFile('./handbook.md');
 *
 * const outcome = await service.query({ query: 'What is the refund window?', maxResults: 3 });
 * if (outcome.ok) {
 *   console.log(outcome.value.answer, outcome.value.confidenceScore);
 * }
 * service.close();
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// SERVICE
// ============================================================================

export * from './api/index.js';

// ============================================================================
// PIPELINE
// ============================================================================

export * from './rag/index.js';
export * from './evaluation/index.js';
export {
  DocumentIngestor,
  type DocumentIngestorOptions,
  type IngestTextOptions,
  type IngestedDocument,
  type IngestPathsOptions,
  type IngestPathsResult,
  type SkippedPath,
} from './ingest/document_ingestor.js';
export {
  cleanText,
  createChunks,
  extractText,
  fileTypeOf,
  isSupportedFile,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_CHUNK_OVERLAP,
  SUPPORTED_EXTENSIONS,
  type ChunkOptions,
  type SupportedExtension,
} from './ingest/text_processing.js';

// ============================================================================
// INFRASTRUCTURE
// ============================================================================

export * from './config/index.js';
export * from './core/index.js';
export * from './providers/index.js';
export * from './storage/index.js';
export { RateLimiter, type RateLimiterConfig, type RateLimitResult } from './security/rate_limiter.js';
export { logInfo, logWarning, logError, logDebug, parseLogLevel, resolveLogLevel, type LogLevel } from './telemetry/logger.js';
export type * from './types.js';

// ============================================================================
// VERSION
// ============================================================================

export const DOCINTEL_VERSION = '0.1.0';
