/**
 * Domain → API response mapping.
 */

import type { Finding, RetrievalResult } from '../types/models.js';
import { FALLBACK_MODEL, INHERITANCE_MODEL_PREFIX } from '../types/models.js';
import type { FindingResponse, RetrievedChunkResponse } from '../types/api.js';

export function toFindingResponse(finding: Finding, final: boolean): FindingResponse {
  return {
    id: finding.id,
    version: finding.version,
    previousVersionId: finding.previousVersionId,
    assessmentId: finding.assessmentId,
    controlId: finding.controlId,
    status: finding.status,
    confidence: finding.confidence,
    confidenceBreakdown: finding.confidenceBreakdown,
    narrative: finding.narrative,
    evidenceContributions: finding.evidenceContributions,
    gaps: finding.gaps,
    recommendations: finding.recommendations,
    retrievedChunkIds: finding.retrievedChunkIds,
    modelUsed: finding.modelUsed,
    // Only model output is labelled AI-generated; inherited and heuristic findings are not
    aiGenerated:
      finding.modelUsed !== FALLBACK_MODEL &&
      !finding.modelUsed.startsWith(INHERITANCE_MODEL_PREFIX),
    reviewState: finding.reviewState,
    final,
    review: finding.review && {
      reviewerId: finding.review.reviewerId,
      decision: finding.review.decision,
      overrideStatus: finding.review.overrideStatus,
      notes: finding.review.notes,
      reviewedAt: finding.review.reviewedAt.toISOString(),
    },
    createdAt: finding.createdAt.toISOString(),
  };
}

export function toRetrievedChunkResponse(result: RetrievalResult): RetrievedChunkResponse {
  return {
    chunkId: result.chunk.id,
    documentId: result.chunk.documentId,
    documentTitle: result.chunk.documentTitle,
    chunkIndex: result.chunk.index,
    text: result.chunk.text,
    controlIds: result.chunk.controlIds,
    similarity: result.similarity,
    rank: result.rank,
  };
}

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
