/**
 * Netlify Function entry point.
 * Single function handles all /api/v1/* routes via the router.
 */

import type { Context } from '@netlify/functions';
import { createRouter } from '../../src/api/router.js';
import { getProductionContainer } from '../../src/container.production.js';

let router: ReturnType<typeof createRouter> | null = null;

export default async (req: Request, _context: Context) => {
  // Container is created once per cold start (shared across warm invocations)
  const container = getProductionContainer();
  router ??= createRouter(container);
  const response = await router.handle(req);

  // Timers do not survive a frozen function instance
  await container.logProvider.flush();
  return response;
};

export const config = {
  path: '/api/v1/*',
};
