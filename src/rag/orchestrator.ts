/**
 * @fileoverview Query orchestrator
 *
 * Runs one query through retrieve → filter → re-rank → pack → generate.
 * Each run moves through the stages in order and ends in `done` or
 * `failed`; nothing is retried. Callers get a Result: a ValidationError
 * for a bad request (pipeline not started), a QueryFailedError carrying
 * only the generic message for any stage failure, or the response.
 *
 * @packageDocumentation
 */

import type { RAGConfig } from '../config/rag_config.js';
import { parseQueryRequest } from '../api/schemas.js';
import { isRetryableError, QueryFailedError, type QueryStage, type ValidationError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import type { LanguageModel, EmbeddingProvider } from '../providers/types.js';
import type { QueryLogStore } from '../storage/query_log.js';
import type { VectorIndex } from '../storage/types.js';
import { logError, logInfo, logWarning } from '../telemetry/logger.js';
import type { ContextChunk, QueryRequest, RAGResponse, SourceSummary } from '../types.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { AnswerGenerator } from './answer_generator.js';
import { filterContext } from './context_filter.js';
import { packContext } from './context_packer.js';
import { ContextReranker } from './reranker.js';
import { ContextRetriever } from './retriever.js';
import type { RelevancePolicy } from './relevance.js';

// ============================================================================
// TYPES
// ============================================================================

export const INSUFFICIENT_INFORMATION_ANSWER =
  "I don't have enough information in the knowledge base to answer this question.";

export const SOURCE_PREVIEW_LENGTH = 200;

export interface StageTransition {
  from: QueryStage;
  to: QueryStage;
  /** Milliseconds since the query was received */
  elapsedMs: number;
  /** Chunks produced by the stage being left, when it produces chunks */
  outputCount?: number;
}

export type QueryStageObserver = (transition: StageTransition) => void;

export interface RunQueryOptions {
  /** Recorded in the query log; defaults to "anonymous" */
  clientId?: string;
  onStage?: QueryStageObserver;
}

export type QueryOutcome = Result<RAGResponse, QueryFailedError | ValidationError>;

export interface QueryOrchestratorOptions {
  config: RAGConfig;
  embedder: EmbeddingProvider;
  index: VectorIndex;
  model: LanguageModel | null;
  queryLog?: QueryLogStore;
  relevance?: RelevancePolicy;
}

// ============================================================================
// STAGE TRACKING
// ============================================================================

function createStageTracker(startedAt: number, onStage?: QueryStageObserver) {
  let current: QueryStage = 'received';

  const notify = (transition: StageTransition): void => {
    if (!onStage) return;
    try {
      onStage({ ...transition });
    } catch (error) {
      logWarning('Query stage observer failed', { stage: transition.to, error: getErrorMessage(error) });
    }
  };

  const advance = (to: QueryStage, outputCount?: number): void => {
    if (current === 'done' || current === 'failed') return;
    const transition: StageTransition = { from: current, to, elapsedMs: Date.now() - startedAt };
    if (outputCount !== undefined) transition.outputCount = outputCount;
    current = to;
    notify(transition);
  };

  return {
    advance,
    current: (): QueryStage => current,
  };
}

// ============================================================================
// RESPONSE HELPERS
// ============================================================================

export function previewContent(content: string): string {
  return content.length > SOURCE_PREVIEW_LENGTH ? `${content.slice(0, SOURCE_PREVIEW_LENGTH)}...` : content;
}

export function toSourceSummary(chunk: ContextChunk): SourceSummary {
  return {
    id: chunk.sourceId,
    contentPreview: previewContent(chunk.content),
    metadata: chunk.metadata,
    relevanceScore: chunk.relevanceScore,
  };
}

// ============================================================================
// ORCHESTRATOR
// ============================================================================

export class QueryOrchestrator {
  readonly config: RAGConfig;
  private readonly retriever: ContextRetriever;
  private readonly reranker: ContextReranker;
  private readonly generator: AnswerGenerator;
  private readonly queryLog?: QueryLogStore;

  constructor(options: QueryOrchestratorOptions) {
    this.config = options.config;
    this.retriever = new ContextRetriever({
      config: options.config,
      embedder: options.embedder,
      index: options.index,
      relevance: options.relevance,
    });
    this.reranker = new ContextReranker({ config: options.config, model: options.model });
    this.generator = new AnswerGenerator({ config: options.config, model: options.model });
    this.queryLog = options.queryLog;
  }

  /**
   * Validate and answer one query.
   */
  async run(input: unknown, options: RunQueryOptions = {}): Promise<QueryOutcome> {
    const parsed = parseQueryRequest(input);
    if (!parsed.ok) {
      return Err(parsed.error);
    }

    const request = parsed.value;
    const clientId = options.clientId ?? 'anonymous';
    const startedAt = Date.now();
    const tracker = createStageTracker(startedAt, options.onStage);
    const elapsedSeconds = (): number => (Date.now() - startedAt) / 1000;

    try {
      const response = await this.execute(request, tracker.advance, elapsedSeconds);
      tracker.advance('done');
      this.record(clientId, request, {
        status: 'completed',
        responseText: response.answer,
        confidenceScore: response.confidenceScore,
        processingTime: response.processingTime,
        sourcesCount: response.sources.length,
      });
      logInfo('Query processed', {
        processingTime: response.processingTime,
        confidence: response.confidenceScore,
        sources: response.sources.length,
      });
      return Ok(response);
    } catch (error) {
      const stage = tracker.current();
      const cause = toError(error);
      tracker.advance('failed');
      logError(`Query failed during ${stage}: ${cause.message}`, { clientId });
      this.record(clientId, request, {
        status: 'failed',
        responseText: null,
        confidenceScore: null,
        processingTime: elapsedSeconds(),
        sourcesCount: 0,
        errorMessage: cause.message,
      });
      return Err(new QueryFailedError(stage, isRetryableError(cause), cause));
    }
  }

  private async execute(
    request: QueryRequest,
    advance: (to: QueryStage, outputCount?: number) => void,
    elapsedSeconds: () => number,
  ): Promise<RAGResponse> {
    advance('retrieving');
    const retrieved = await this.retriever.retrieve(request.query);

    advance('filtering', retrieved.length);
    const filtered = filterContext(retrieved, request.filterParams);
    if (filtered.length === 0) {
      return this.insufficientInformation(request, elapsedSeconds());
    }

    advance('reranking', filtered.length);
    const reranked = await this.reranker.rerank(request.query, filtered);

    advance('packing', reranked.length);
    const packed = packContext(reranked, this.config);
    if (packed.length === 0) {
      return this.insufficientInformation(request, elapsedSeconds());
    }

    advance('generating', packed.length);
    const selected = packed.slice(0, request.maxResults);
    const generated = await this.generator.generate(request.query, selected);

    return {
      query: request.query,
      answer: generated.answer,
      sources: selected.map(toSourceSummary),
      contextUsed: request.includeMetadata ? selected : [],
      confidenceScore: generated.confidence,
      processingTime: elapsedSeconds(),
      timestamp: new Date().toISOString(),
    };
  }

  private insufficientInformation(request: QueryRequest, processingTime: number): RAGResponse {
    return {
      query: request.query,
      answer: INSUFFICIENT_INFORMATION_ANSWER,
      sources: [],
      contextUsed: [],
      confidenceScore: 0,
      processingTime,
      timestamp: new Date().toISOString(),
    };
  }

  private record(
    clientId: string,
    request: QueryRequest,
    outcome: {
      status: 'completed' | 'failed';
      responseText: string | null;
      confidenceScore: number | null;
      processingTime: number;
      sourcesCount: number;
      errorMessage?: string;
    },
  ): void {
    if (!this.queryLog) return;
    try {
      this.queryLog.record({
        clientId,
        queryText: request.query,
        maxResults: request.maxResults,
        filterParams: request.filterParams,
        ...outcome,
      });
    } catch (error) {
      logWarning('Failed to write query log entry', { error: getErrorMessage(error) });
    }
  }
}
