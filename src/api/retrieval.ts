/**
 * Retrieval endpoint.
 * POST /api/v1/retrieve — Ranked excerpts for a text query
 */

import { z } from 'zod';
import { pipeline, validateBody } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { RetrieveResponse } from '../types/api.js';
import { json, toRetrievedChunkResponse } from './serializers.js';

const retrieveSchema = z.object({
  query: z.string().min(1).max(4000),
  controlId: z.string().max(50).optional(),
  documentIds: z.array(z.string().min(1)).max(500).optional(),
  method: z.enum(['examine', 'interview', 'test']).optional(),
  topK: z.number().int().min(1).max(50).optional(),
  similarityThreshold: z.number().min(0).max(1).optional(),
});

export function createRetrievalHandlers(container: Container) {
  const retrieve: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.rateLimit.retrieve
  )(
    validateBody(retrieveSchema, async (req, _ctx, body) => {
      const results = await container.retrievalEngine.retrieve(body, {
        signal: req.signal,
      });
      const response: RetrieveResponse = {
        results: results.map(toRetrievedChunkResponse),
      };
      return json(response);
    })
  );

  return { retrieve };
}
