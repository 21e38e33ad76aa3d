/**
 * Rate limiting middleware.
 * Composable with the pipeline — each endpoint can have its own config.
 * Uses an IRateLimitStore for persistence (in-memory for dev, Supabase for prod).
 */

import type { IRateLimitStore } from '../stores/IRateLimitStore.js';
import type { HandlerContext, Middleware, Handler } from './pipeline.js';
import { RateLimitError } from '../errors.js';

export interface RateLimitConfig {
  /** Extract the rate limit key from the request/context. */
  key: (req: Request, ctx: HandlerContext) => string;
  /** Maximum requests allowed within the window. */
  limit: number;
  /** Window duration in seconds. */
  windowSeconds: number;
}

export function createRateLimitMiddleware(
  store: IRateLimitStore,
  config: RateLimitConfig
): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const key = config.key(req, ctx);
      const { count, resetAt } = await store.increment(key, config.windowSeconds);

      if (count > config.limit) {
        const now = Math.floor(Date.now() / 1000);
        const retryAfter = Math.max(1, resetAt - now);
        throw new RateLimitError(retryAfter);
      }

      const response = await next(req, ctx);

      // Attach rate limit headers to successful responses
      const headers = new Headers(response.headers);
      headers.set('X-RateLimit-Limit', String(config.limit));
      headers.set('X-RateLimit-Remaining', String(Math.max(0, config.limit - count)));
      headers.set('X-RateLimit-Reset', String(resetAt));

      return new Response(response.body, {
        status: response.status,
        statusText: response.statusText,
        headers,
      });
    };
  };
}

// ── Key extraction helpers ──

/** IP-based key, from the first X-Forwarded-For hop. */
export function ipKey(action: string) {
  return (req: Request): string => {
    const forwarded = req.headers.get('X-Forwarded-For');
    const ip = forwarded?.split(',')[0]?.trim() || 'unknown';
    return `ip:${ip}:${action}`;
  };
}

/** Per-assessment key: shares one budget across every caller of an assessment. */
export function assessmentKey(action: string) {
  return (_req: Request, ctx: HandlerContext): string =>
    `assessment:${ctx.params.assessmentId ?? 'unknown'}:${action}`;
}

/** Global key: shared budget across all callers. */
export function globalKey(action: string) {
  return (): string => `global:${action}`;
}

// ── Pre-built rate limit configs ──

const ONE_HOUR = 3600;
const ONE_DAY = 86400;

export const RATE_LIMITS = {
  /** POST /documents/ingest */
  ingest: { key: ipKey('ingest'), limit: 30, windowSeconds: ONE_HOUR },
  /** POST /retrieve */
  retrieve: { key: ipKey('retrieve'), limit: 120, windowSeconds: ONE_HOUR },
  /** POST /assessments/:id/controls/:id/analyze */
  analyzeControl: { key: ipKey('analyze-control'), limit: 60, windowSeconds: ONE_HOUR },
  /** POST /assessments/:id/analyze — one batch at a time is plenty */
  analyzeAssessment: { key: assessmentKey('analyze'), limit: 5, windowSeconds: ONE_HOUR },
  /** GET findings, POST review */
  findings: { key: ipKey('findings'), limit: 300, windowSeconds: ONE_HOUR },
  /** GET /providers/:provider/coverage */
  providers: { key: ipKey('providers'), limit: 300, windowSeconds: ONE_HOUR },
  /** Global reasoning budget — protects the model provider bill */
  reasoningBudget: { key: globalKey('reasoning'), limit: 2000, windowSeconds: ONE_DAY },
} as const satisfies Record<string, RateLimitConfig>;
