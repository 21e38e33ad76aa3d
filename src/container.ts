/**
 * Dependency wiring.
 * Constructs all services with their dependencies.
 * In production, repositories are the Supabase implementations and providers
 * talk to real APIs; tests pass in-memory repositories and mock providers.
 */

import type { IChunkRepository } from './repositories/IChunkRepository.js';
import type { IDocumentRepository } from './repositories/IDocumentRepository.js';
import type { IInheritanceRepository } from './repositories/IInheritanceRepository.js';
import type { IControlRepository } from './repositories/IControlRepository.js';
import type { IEvidenceRepository } from './repositories/IEvidenceRepository.js';
import type { IAssessmentRepository } from './repositories/IAssessmentRepository.js';
import type { IFindingRepository } from './repositories/IFindingRepository.js';
import type { IEmbeddingProvider } from './providers/IEmbeddingProvider.js';
import type { IReasoningProvider } from './providers/IReasoningProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { IRateLimitStore } from './stores/IRateLimitStore.js';
import type { Middleware } from './middleware/pipeline.js';
import type { PipelineConfig } from './config.js';
import { loadConfig } from './config.js';
import { Chunker } from './services/Chunker.js';
import { EmbeddingService } from './services/EmbeddingService.js';
import { VectorIndex } from './services/VectorIndex.js';
import { RetrievalEngine } from './services/RetrievalEngine.js';
import { InheritanceResolver } from './services/InheritanceResolver.js';
import { ControlAnalyzer } from './services/ControlAnalyzer.js';
import { ConfidenceScorer } from './services/ConfidenceScorer.js';
import { ConfidenceGate } from './services/ConfidenceGate.js';
import { IngestionService } from './services/IngestionService.js';
import { AnalysisService } from './services/AnalysisService.js';
import { createRateLimitMiddleware, RATE_LIMITS } from './middleware/rate-limit.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { createErrorHandler } from './middleware/error-handler.js';
import { DimensionMismatchError } from './errors.js';

export interface ContainerDeps {
  chunkRepo: IChunkRepository;
  documentRepo: IDocumentRepository;
  inheritanceRepo: IInheritanceRepository;
  controlRepo: IControlRepository;
  evidenceRepo: IEvidenceRepository;
  assessmentRepo: IAssessmentRepository;
  findingRepo: IFindingRepository;
  embeddingProvider: IEmbeddingProvider;
  reasoningProvider: IReasoningProvider;
  logProvider: ILogProvider;
  rateLimitStore: IRateLimitStore;
}

export interface Container {
  config: PipelineConfig;
  embeddingService: EmbeddingService;
  vectorIndex: VectorIndex;
  retrievalEngine: RetrievalEngine;
  inheritanceResolver: InheritanceResolver;
  gate: ConfidenceGate;
  ingestionService: IngestionService;
  analysisService: AnalysisService;
  logProvider: ILogProvider;
  logging: Middleware;
  errorHandler: Middleware;
  rateLimit: {
    ingest: Middleware;
    retrieve: Middleware;
    analyzeControl: Middleware;
    analyzeAssessment: Middleware;
    findings: Middleware;
    providers: Middleware;
    reasoningBudget: Middleware;
  };
}

export function createContainer(
  deps: ContainerDeps,
  config: PipelineConfig = loadConfig({})
): Container {
  const log = deps.logProvider;
  const retry = {
    maxAttempts: config.external.retryMaxAttempts,
    baseDelayMs: config.external.retryBaseDelayMs,
  };

  const chunker = new Chunker({
    unit: config.chunking.unit,
    window: config.chunking.window,
    overlap: config.chunking.overlap,
  });
  const embeddingService = new EmbeddingService(deps.embeddingProvider, log, {
    maxBatchSize: config.embedding.batchSize,
    timeoutMs: config.external.timeoutMs,
    retry,
  });
  // Vectors of the wrong width would only fail later, one write at a time
  if (embeddingService.dimensions !== config.vectorIndex.dimensions) {
    throw new DimensionMismatchError(config.vectorIndex.dimensions, embeddingService.dimensions);
  }
  const vectorIndex = new VectorIndex(deps.chunkRepo, config.vectorIndex.dimensions);
  const retrievalEngine = new RetrievalEngine(embeddingService, vectorIndex, log, {
    topK: config.retrieval.topK,
    similarityThreshold: config.retrieval.similarityThreshold,
    lambda: config.retrieval.lambda,
  });
  const inheritanceResolver = new InheritanceResolver(
    deps.inheritanceRepo,
    deps.controlRepo,
    log
  );
  const analyzer = new ControlAnalyzer(
    deps.reasoningProvider,
    retrievalEngine,
    inheritanceResolver,
    log,
    {
      inheritedConfidence: config.gate.inheritedConfidence,
      timeoutMs: config.external.timeoutMs,
      retry,
      scorer: new ConfidenceScorer(config.gate.weights),
    }
  );
  const gate = new ConfidenceGate(log, config.gate.confidenceThreshold);

  const ingestionService = new IngestionService(
    deps.documentRepo,
    chunker,
    embeddingService,
    vectorIndex,
    log,
    { concurrency: config.concurrency.ingest }
  );
  const analysisService = new AnalysisService(
    {
      controlRepo: deps.controlRepo,
      evidenceRepo: deps.evidenceRepo,
      assessmentRepo: deps.assessmentRepo,
      documentRepo: deps.documentRepo,
      findingRepo: deps.findingRepo,
      analyzer,
      gate,
      log,
    },
    {
      reentrancy: config.concurrency.reentrancy,
      concurrency: config.concurrency.analysis,
    }
  );

  const rateLimit = {
    ingest: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.ingest),
    retrieve: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.retrieve),
    analyzeControl: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.analyzeControl),
    analyzeAssessment: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.analyzeAssessment),
    findings: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.findings),
    providers: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.providers),
    reasoningBudget: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.reasoningBudget),
  };

  return {
    config,
    embeddingService,
    vectorIndex,
    retrievalEngine,
    inheritanceResolver,
    gate,
    ingestionService,
    analysisService,
    logProvider: log,
    logging: createLoggingMiddleware(log),
    errorHandler: createErrorHandler(log),
    rateLimit,
  };
}
