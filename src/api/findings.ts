/**
 * Finding endpoints.
 * GET  /api/v1/assessments/:assessmentId/controls/:controlId/findings — Version history, newest first
 * POST /api/v1/findings/:findingId/review — Approve or override a finding awaiting review
 */

import { z } from 'zod';
import { pipeline, validateBody } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { FindingHistoryResponse } from '../types/api.js';
import { json, toFindingResponse } from './serializers.js';

const statusSchema = z.enum(['Met', 'Not Met', 'Partially Met', 'Not Applicable']);

const reviewSchema = z.discriminatedUnion('decision', [
  z.object({
    decision: z.literal('approve'),
    reviewerId: z.string().min(1).max(200),
    notes: z.string().max(5000).optional(),
  }),
  z.object({
    decision: z.literal('override'),
    reviewerId: z.string().min(1).max(200),
    status: statusSchema,
    notes: z.string().min(1).max(5000),
  }),
]);

export function createFindingHandlers(container: Container) {
  const { analysisService, gate } = container;

  const history: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.rateLimit.findings
  )(async (_req, ctx) => {
    const findings = await analysisService.getHistory(
      ctx.params.assessmentId,
      ctx.params.controlId
    );
    const response: FindingHistoryResponse = {
      findings: findings.map((f) => toFindingResponse(f, gate.isFinal(f))),
    };
    return json(response);
  });

  const review: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.rateLimit.findings
  )(
    validateBody(reviewSchema, async (_req, ctx, body) => {
      const finding = await analysisService.review(ctx.params.findingId, body);
      return json(toFindingResponse(finding, gate.isFinal(finding)));
    })
  );

  return { history, review };
}
