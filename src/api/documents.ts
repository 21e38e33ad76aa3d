/**
 * Document endpoints.
 * POST /api/v1/documents/ingest — Chunk and embed uploaded documents
 */

import { z } from 'zod';
import { pipeline, validateBody } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { IngestResponse } from '../types/api.js';
import { json } from './serializers.js';

const ingestSchema = z.object({
  documentIds: z.array(z.string().min(1).max(200)).min(1).max(100),
});

export function createDocumentHandlers(container: Container) {
  const ingest: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.rateLimit.ingest
  )(
    validateBody(ingestSchema, async (req, _ctx, body) => {
      const summary = await container.ingestionService.ingest(body.documentIds, {
        signal: req.signal,
      });
      const response: IngestResponse = summary;
      return json(response);
    })
  );

  return { ingest };
}
