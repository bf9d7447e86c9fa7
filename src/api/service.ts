/**
 * @fileoverview Document intelligence service
 *
 * Process-wide entry point. `create()` builds every shared collaborator
 * once (storage, embedder, language model, orchestrator, ingestor,
 * evaluator, A/B testing, rate limiter); each call then borrows them.
 *
 * @packageDocumentation
 */

import type { ServiceConfig } from '../config/service_config.js';
import { NotFoundError, RateLimitError, type QueryFailedError, type ValidationError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import {
  ABTestConfigSchema,
  ABTestingService,
  ResponseEvaluator,
  computePerformanceMetrics,
  windowStart,
  DEFAULT_METRICS_WINDOW_DAYS,
  type ABTestAnalysis,
  type EvaluationResult,
  type PerformanceMetrics,
} from '../evaluation/index.js';
import {
  DocumentIngestor,
  type IngestedDocument,
  type IngestPathsOptions,
  type IngestPathsResult,
  type IngestTextOptions,
} from '../ingest/document_ingestor.js';
import { createEmbeddingProvider, createLanguageModel, type FetchLike } from '../providers/index.js';
import type { EmbeddingProvider, LanguageModel } from '../providers/types.js';
import { QueryOrchestrator, type QueryStageObserver } from '../rag/orchestrator.js';
import { RateLimiter } from '../security/rate_limiter.js';
import {
  createStorage,
  type ABTestDefinition,
  type ABTestOutcome,
  type DocumentCounts,
  type DocumentRecord,
  type FeedbackEntry,
  type FeedbackSummary,
  type ListDocumentsOptions,
  type ListFeedbackOptions,
  type ListQueriesOptions,
  type QueryLogEntry,
  type QueryLogStats,
  type StorageHandles,
} from '../storage/index.js';
import { logInfo } from '../telemetry/logger.js';
import type { RAGResponse } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';
import { parseEvaluationRequest, parseFeedbackRequest, toValidationError } from './schemas.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ServiceDependencies {
  /** Replaces the configured embedder */
  embedder?: EmbeddingProvider;
  /** Replaces the configured language model; null forces fallback mode */
  model?: LanguageModel | null;
  /** Replaces the configured storage */
  storage?: StorageHandles;
  fetchImpl?: FetchLike;
}

export type ServiceQueryOutcome = Result<RAGResponse, QueryFailedError | ValidationError | RateLimitError>;

export interface ServiceStats {
  totalChunks: number;
  storage: string;
  embedder: string;
  embeddingDimensions: number;
  languageModel: string | null;
  documents: DocumentCounts;
  queries: QueryLogStats;
  feedback: FeedbackSummary;
}

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthReport {
  status: HealthStatus;
  checks: {
    index: { ok: boolean; chunks?: number; error?: string };
    languageModel: { configured: boolean; provider?: string; model?: string };
  };
  timestamp: string;
}

export const METRICS_SAMPLE_LIMIT = 10_000;

// ============================================================================
// SERVICE
// ============================================================================

export class DocumentIntelligenceService {
  private closed = false;

  private constructor(
    readonly config: ServiceConfig,
    private readonly storage: StorageHandles,
    private readonly embedder: EmbeddingProvider,
    private readonly model: LanguageModel | null,
    private readonly orchestrator: QueryOrchestrator,
    private readonly ingestor: DocumentIngestor,
    private readonly evaluator: ResponseEvaluator,
    private readonly abTesting: ABTestingService,
    private readonly rateLimiter: RateLimiter,
  ) {}

  static create(config: ServiceConfig, deps: ServiceDependencies = {}): DocumentIntelligenceService {
    const embedder = deps.embedder ?? createEmbeddingProvider(config.embedding, deps.fetchImpl);
    const model = deps.model !== undefined ? deps.model : createLanguageModel(config.llm, config.rag.model, deps.fetchImpl);
    const storage = deps.storage ?? createStorage(config);

    const orchestrator = new QueryOrchestrator({
      config: config.rag,
      embedder,
      index: storage.index,
      model,
      queryLog: storage.queryLog,
    });
    const ingestor = new DocumentIngestor({
      embedder,
      index: storage.index,
      documents: storage.documents,
      chunkSize: config.chunking.size,
      chunkOverlap: config.chunking.overlap,
    });
    const evaluator = new ResponseEvaluator({ model, judgeModel: config.rag.judgeModel });
    const rateLimiter = new RateLimiter({
      maxRequests: config.rateLimit.maxRequests,
      windowMs: config.rateLimit.windowMs,
    });

    logInfo('Document intelligence service ready', {
      storage: storage.location,
      embedder: embedder.id,
      languageModel: model ? `${model.provider}:${model.defaultModel}` : 'none',
    });

    return new DocumentIntelligenceService(
      config,
      storage,
      embedder,
      model,
      orchestrator,
      ingestor,
      evaluator,
      new ABTestingService(storage.abTests),
      rateLimiter,
    );
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  async query(
    request: unknown,
    clientId = 'anonymous',
    onStage?: QueryStageObserver,
  ): Promise<ServiceQueryOutcome> {
    const limit = this.rateLimiter.check(clientId);
    if (!limit.allowed) {
      return Err(new RateLimitError(clientId, limit.retryAfter ?? 1));
    }
    return this.orchestrator.run(request, { clientId, onStage });
  }

  listQueries(options: ListQueriesOptions = {}): QueryLogEntry[] {
    return this.storage.queryLog.list(options);
  }

  getPerformanceMetrics(windowDays = DEFAULT_METRICS_WINDOW_DAYS): PerformanceMetrics {
    const since = windowStart(windowDays);
    const entries = this.storage.queryLog.list({ since, limit: METRICS_SAMPLE_LIMIT });
    const { averageRating } = this.storage.feedback.summary(since);
    return computePerformanceMetrics(entries, { windowDays, averageRating });
  }

  async evaluateResponse(input: unknown): Promise<Result<EvaluationResult, ValidationError>> {
    const parsed = parseEvaluationRequest(input);
    if (!parsed.ok) return parsed;
    return Ok(await this.evaluator.evaluate(parsed.value));
  }

  // --------------------------------------------------------------------------
  // Feedback
  // --------------------------------------------------------------------------

  /**
   * Rate a logged query. A query logged under another client is reported
   * as not found. Submitting again replaces the earlier feedback.
   */
  submitFeedback(input: unknown, clientId = 'anonymous'): Result<FeedbackEntry, ValidationError | NotFoundError> {
    const parsed = parseFeedbackRequest(input);
    if (!parsed.ok) return parsed;

    const logged = this.storage.queryLog.get(parsed.value.queryLogId);
    if (!logged || logged.clientId !== clientId) {
      return Err(new NotFoundError('query_log', parsed.value.queryLogId));
    }
    const entry = this.storage.feedback.record({ ...parsed.value, clientId });
    logInfo('Feedback recorded', { queryLogId: entry.queryLogId, rating: entry.rating });
    return Ok(entry);
  }

  listFeedback(options: ListFeedbackOptions = {}): FeedbackEntry[] {
    return this.storage.feedback.list(options);
  }

  // --------------------------------------------------------------------------
  // A/B testing
  // --------------------------------------------------------------------------

  createAbTest(input: unknown): Result<ABTestDefinition, ValidationError> {
    const parsed = ABTestConfigSchema.safeParse(input);
    if (!parsed.success) return Err(toValidationError(parsed.error, input));
    return Ok(this.abTesting.createTest(parsed.data));
  }

  listAbTests(): ABTestDefinition[] {
    return this.abTesting.listTests();
  }

  assignAbVariant(testName: string, userId: string): string {
    return this.abTesting.assignVariant(testName, userId);
  }

  recordAbResult(
    testName: string,
    variant: string,
    userId: string,
    outcome: number,
  ): Result<ABTestOutcome, NotFoundError | ValidationError> {
    return this.abTesting.recordResult(testName, variant, userId, outcome);
  }

  analyzeAbTest(testName: string): Result<ABTestAnalysis, NotFoundError> {
    return this.abTesting.analyzeTest(testName);
  }

  // --------------------------------------------------------------------------
  // Documents
  // --------------------------------------------------------------------------

  listDocuments(options: ListDocumentsOptions = {}): DocumentRecord[] {
    return this.storage.documents.list(options);
  }

  getDocument(documentId: string): Result<DocumentRecord, NotFoundError> {
    const record = this.storage.documents.get(documentId);
    return record ? Ok(record) : Err(new NotFoundError('document', documentId));
  }

  ingestText(text: string, options: IngestTextOptions): Promise<IngestedDocument> {
    return this.ingestor.ingestText(text, options);
  }

  ingestFile(filePath: string, options: Partial<IngestTextOptions> = {}): Promise<IngestedDocument> {
    return this.ingestor.ingestFile(filePath, options);
  }

  ingestPaths(inputs: readonly string[], options?: IngestPathsOptions): Promise<IngestPathsResult> {
    return this.ingestor.ingestPaths(inputs, options);
  }

  deleteDocument(documentId: string): Promise<number> {
    return this.ingestor.deleteDocument(documentId);
  }

  // --------------------------------------------------------------------------
  // Status
  // --------------------------------------------------------------------------

  async getStats(): Promise<ServiceStats> {
    return {
      totalChunks: await this.storage.index.count(),
      storage: this.storage.location,
      embedder: this.embedder.id,
      embeddingDimensions: this.embedder.dimensions,
      languageModel: this.model ? `${this.model.provider}:${this.model.defaultModel}` : null,
      documents: this.storage.documents.counts(),
      queries: this.storage.queryLog.stats(),
      feedback: this.storage.feedback.summary(),
    };
  }

  /**
   * Unhealthy when the index cannot be read; degraded when it can but no
   * language model is configured.
   */
  async getHealth(): Promise<HealthReport> {
    const index: HealthReport['checks']['index'] = { ok: true };
    try {
      index.chunks = await this.storage.index.count();
    } catch (error) {
      index.ok = false;
      index.error = getErrorMessage(error);
    }

    const languageModel: HealthReport['checks']['languageModel'] = this.model
      ? { configured: true, provider: this.model.provider, model: this.model.defaultModel }
      : { configured: false };

    const status: HealthStatus = !index.ok ? 'unhealthy' : this.model ? 'healthy' : 'degraded';
    return { status, checks: { index, languageModel }, timestamp: new Date().toISOString() };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.rateLimiter.dispose();
    this.storage.close();
  }
}
