/**
 * API types — shapes for request/response payloads.
 * Decoupled from domain models so the API can evolve independently.
 */

import type { ConfidenceFactors, ConfidenceLevel, FindingStatus, ReviewState } from './models.js';
import type { ItemOutcome } from './common.js';

// Request bodies are described by the zod schemas next to each handler.

// ── Responses ──

export interface FindingResponse {
  id: string;
  version: number;
  previousVersionId: string | null;
  assessmentId: string;
  controlId: string;
  status: FindingStatus;
  confidence: number;
  confidenceBreakdown: {
    score: number;
    level: ConfidenceLevel;
    factors: ConfidenceFactors;
    weighted: ConfidenceFactors;
    recommendations: string[];
  } | null;
  narrative: string;
  evidenceContributions: Array<{
    evidenceId: string;
    weight: number;
    contribution: string;
  }>;
  gaps: string[];
  recommendations: string[];
  retrievedChunkIds: string[];
  modelUsed: string;
  aiGenerated: boolean;
  reviewState: ReviewState;
  final: boolean;
  review: {
    reviewerId: string;
    decision: 'approve' | 'override';
    overrideStatus: FindingStatus | null;
    notes: string | null;
    reviewedAt: string;
  } | null;
  createdAt: string;
}

export interface FindingHistoryResponse {
  findings: FindingResponse[];
}

export interface IngestResponse {
  results: ItemOutcome<{ chunkCount: number }>[];
  succeeded: number;
  failed: number;
  skipped: number;
}

export interface RetrievedChunkResponse {
  chunkId: string;
  documentId: string;
  documentTitle: string | null;
  chunkIndex: number;
  text: string;
  controlIds: string[];
  similarity: number;
  rank: number;
}

export interface RetrieveResponse {
  results: RetrievedChunkResponse[];
}

export interface BatchAnalysisResponse {
  results: ItemOutcome<FindingResponse>[];
  completed: number;
  failed: number;
  cancelled: number;
}

export interface ProviderCoverageResponse {
  provider: string;
  totalControls: number;
  mappedControls: number;
  coveragePercentage: number;
  inherited: number;
  shared: number;
  customer: number;
}

// ── Errors ──

export interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}
