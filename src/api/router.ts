/**
 * API router.
 * Maps HTTP method + path pattern to handlers. Named groups in a pattern
 * become `ctx.params`.
 * Framework-agnostic — works with any Request/Response based runtime.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { createDocumentHandlers } from './documents.js';
import { createRetrievalHandlers } from './retrieval.js';
import { createAnalysisHandlers } from './analysis.js';
import { createFindingHandlers } from './findings.js';
import { createProviderHandlers } from './providers.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

const SEGMENT = '[^/]+';

export function createRouter(container: Container) {
  const documents = createDocumentHandlers(container);
  const retrieval = createRetrievalHandlers(container);
  const analysis = createAnalysisHandlers(container);
  const findings = createFindingHandlers(container);
  const providers = createProviderHandlers(container);

  const control = `^/api/v1/assessments/(?<assessmentId>${SEGMENT})/controls/(?<controlId>${SEGMENT})`;

  const routes: Route[] = [
    // Ingestion
    { method: 'POST', pattern: /^\/api\/v1\/documents\/ingest\/?$/, handler: documents.ingest },

    // Retrieval
    { method: 'POST', pattern: /^\/api\/v1\/retrieve\/?$/, handler: retrieval.retrieve },

    // Analysis
    { method: 'POST', pattern: new RegExp(`${control}/analyze/?$`), handler: analysis.analyzeControl },
    {
      method: 'POST',
      pattern: new RegExp(`^/api/v1/assessments/(?<assessmentId>${SEGMENT})/analyze/?$`),
      handler: analysis.analyzeAssessment,
    },

    // Findings
    { method: 'GET', pattern: new RegExp(`${control}/findings/?$`), handler: findings.history },
    {
      method: 'POST',
      pattern: new RegExp(`^/api/v1/findings/(?<findingId>${SEGMENT})/review/?$`),
      handler: findings.review,
    },

    // Providers
    {
      method: 'GET',
      pattern: new RegExp(`^/api/v1/providers/(?<provider>${SEGMENT})/coverage/?$`),
      handler: providers.coverage,
    },
  ];

  const handle = async (req: Request, ctx: Partial<HandlerContext> = {}): Promise<Response> => {
    const url = new URL(req.url);
    const method = req.method;

    // CORS preflight
    if (method === 'OPTIONS') {
      return new Response(null, {
        status: 204,
        headers: corsHeaders(),
      });
    }

    for (const route of routes) {
      const match = route.method === method ? route.pattern.exec(url.pathname) : null;
      if (match) {
        const decoded = decodeParams(match.groups);
        if (!decoded) {
          return new Response(
            JSON.stringify({
              error: {
                code: 'INVALID_REQUEST',
                message: `Malformed path segment in ${url.pathname}`,
              },
            }),
            {
              status: 400,
              headers: { 'Content-Type': 'application/json', ...corsHeaders() },
            }
          );
        }
        const params = { ...ctx.params, ...decoded };
        const response = await route.handler(req, { ...ctx, params });
        return addCorsHeaders(response);
      }
    }

    // Check if path matches but method doesn't
    const pathMatches = routes.some((r) => r.pattern.test(url.pathname));
    if (pathMatches) {
      const allowed = routes
        .filter((r) => r.pattern.test(url.pathname))
        .map((r) => r.method)
        .join(', ');

      return new Response(
        JSON.stringify({
          error: {
            code: 'METHOD_NOT_ALLOWED',
            message: `Method ${method} not allowed`,
          },
        }),
        {
          status: 405,
          headers: {
            'Content-Type': 'application/json',
            Allow: allowed,
            ...corsHeaders(),
          },
        }
      );
    }

    return new Response(
      JSON.stringify({
        error: {
          code: 'NOT_FOUND',
          message: `No route matches ${method} ${url.pathname}`,
        },
      }),
      {
        status: 404,
        headers: { 'Content-Type': 'application/json', ...corsHeaders() },
      }
    );
  };

  return { handle, routes };
}

/** Decoded path params, or null when a segment is not valid percent-encoding. */
function decodeParams(
  groups: Record<string, string> | undefined
): Record<string, string> | null {
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(groups ?? {})) {
    try {
      params[key] = decodeURIComponent(value);
    } catch (err) {
      if (err instanceof URIError) return null;
      throw err;
    }
  }
  return params;
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type',
    'Access-Control-Max-Age': '86400',
  };
}

function addCorsHeaders(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(corsHeaders())) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
