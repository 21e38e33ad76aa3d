/**
 * Provider endpoints.
 * GET /api/v1/providers/:provider/coverage — How much of the control catalog a provider covers
 */

import { pipeline } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { ProviderCoverageResponse } from '../types/api.js';
import { json } from './serializers.js';

export function createProviderHandlers(container: Container) {
  const coverage: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.rateLimit.providers
  )(async (_req, ctx) => {
    const response: ProviderCoverageResponse =
      await container.inheritanceResolver.summarize(ctx.params.provider);
    return json(response);
  });

  return { coverage };
}
