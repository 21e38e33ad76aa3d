/**
 * Analysis endpoints.
 * POST /api/v1/assessments/:assessmentId/controls/:controlId/analyze — Analyse one control
 * POST /api/v1/assessments/:assessmentId/analyze — Analyse many controls (cancelled when the client disconnects)
 */

import { z } from 'zod';
import { pipeline, validateBody } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BatchAnalysisResponse } from '../types/api.js';
import { json, toFindingResponse } from './serializers.js';

const analyzeControlSchema = z.object({
  includeRetrieval: z.boolean().optional(),
});

const analyzeAssessmentSchema = z.object({
  controlIds: z.array(z.string().min(1).max(50)).min(1).max(500).optional(),
  includeRetrieval: z.boolean().optional(),
});

export function createAnalysisHandlers(container: Container) {
  const { analysisService, gate } = container;

  const analyzeControl: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.rateLimit.analyzeControl,
    container.rateLimit.reasoningBudget
  )(
    validateBody(analyzeControlSchema, async (req, ctx, body) => {
      const finding = await analysisService.analyzeControl(
        ctx.params.assessmentId,
        ctx.params.controlId,
        { includeRetrieval: body.includeRetrieval, signal: req.signal }
      );
      return json(toFindingResponse(finding, gate.isFinal(finding)), 201);
    })
  );

  const analyzeAssessment: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.rateLimit.analyzeAssessment,
    container.rateLimit.reasoningBudget
  )(
    validateBody(analyzeAssessmentSchema, async (req, ctx, body) => {
      const batch = await analysisService.analyzeAssessment(ctx.params.assessmentId, {
        controlIds: body.controlIds,
        includeRetrieval: body.includeRetrieval,
        signal: req.signal,
      });

      const response: BatchAnalysisResponse = {
        results: batch.results.map((r) =>
          r.status === 'succeeded'
            ? { ...r, result: toFindingResponse(r.result, gate.isFinal(r.result)) }
            : r
        ),
        completed: batch.completed,
        failed: batch.failed,
        cancelled: batch.cancelled,
      };
      return json(response);
    })
  );

  return { analyzeControl, analyzeAssessment };
}
