import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import {
  createRateLimitMiddleware,
  ipKey,
  assessmentKey,
  globalKey,
  RATE_LIMITS,
} from '../../src/middleware/rate-limit.js';
import { errorHandler } from '../../src/middleware/error-handler.js';
import { InMemoryRateLimitStore } from '../../src/stores/InMemoryRateLimitStore.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';

describe('rate limit middleware', () => {
  let store: InMemoryRateLimitStore;

  const okHandler: Handler = async () => {
    return new Response(JSON.stringify({ ok: true }), { status: 200 });
  };

  function makeReq(ip = '10.0.0.1'): Request {
    return new Request('http://test/api/v1/retrieve', {
      method: 'POST',
      headers: { 'X-Forwarded-For': ip },
    });
  }

  const ctx: HandlerContext = { params: {} };

  beforeEach(() => {
    store = new InMemoryRateLimitStore();
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2025-01-15T12:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('core behavior', () => {
    it('should allow request when under limit', async () => {
      const middleware = createRateLimitMiddleware(store, {
        key: () => 'test-key',
        limit: 10,
        windowSeconds: 3600,
      });

      const res = await middleware(okHandler)(makeReq(), ctx);

      expect(res.status).toBe(200);
    });

    it('should return 429 with Retry-After once the limit is exceeded', async () => {
      const middleware = createRateLimitMiddleware(store, {
        key: () => 'test-key',
        limit: 2,
        windowSeconds: 3600,
      });
      const wrapped = errorHandler(middleware(okHandler));

      await wrapped(makeReq(), ctx);
      await wrapped(makeReq(), ctx);
      const res = await wrapped(makeReq(), ctx);
      const body = await res.json();

      expect(res.status).toBe(429);
      // clock is frozen, so the whole window remains
      expect(res.headers.get('Retry-After')).toBe('3600');
      expect(body.error.code).toBe('RATE_LIMITED');
      expect(body.error.details.retryAfter).toBe(3600);
    });

    it('should not call the handler when limited', async () => {
      const handler = vi.fn(okHandler);
      const middleware = createRateLimitMiddleware(store, {
        key: () => 'test-key',
        limit: 1,
        windowSeconds: 60,
      });
      const wrapped = errorHandler(middleware(handler));

      await wrapped(makeReq(), ctx);
      await wrapped(makeReq(), ctx);

      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('should set X-RateLimit-* headers on successful responses', async () => {
      const middleware = createRateLimitMiddleware(store, {
        key: () => 'test-key',
        limit: 10,
        windowSeconds: 3600,
      });

      const res = await middleware(okHandler)(makeReq(), ctx);
      const nowSeconds = Math.floor(new Date('2025-01-15T12:00:00Z').getTime() / 1000);

      expect(res.headers.get('X-RateLimit-Limit')).toBe('10');
      expect(res.headers.get('X-RateLimit-Remaining')).toBe('9');
      expect(res.headers.get('X-RateLimit-Reset')).toBe(String(nowSeconds + 3600));
    });

    it('should decrement remaining count with each request', async () => {
      const middleware = createRateLimitMiddleware(store, {
        key: () => 'test-key',
        limit: 5,
        windowSeconds: 3600,
      });
      const wrapped = middleware(okHandler);

      const res1 = await wrapped(makeReq(), ctx);
      const res2 = await wrapped(makeReq(), ctx);
      const res3 = await wrapped(makeReq(), ctx);

      expect(res1.headers.get('X-RateLimit-Remaining')).toBe('4');
      expect(res2.headers.get('X-RateLimit-Remaining')).toBe('3');
      expect(res3.headers.get('X-RateLimit-Remaining')).toBe('2');
    });

    it('should reset after window expires', async () => {
      const middleware = createRateLimitMiddleware(store, {
        key: () => 'test-key',
        limit: 2,
        windowSeconds: 3600,
      });
      const wrapped = middleware(okHandler);

      await wrapped(makeReq(), ctx);
      await wrapped(makeReq(), ctx);

      vi.advanceTimersByTime(3600 * 1000);

      const res = await wrapped(makeReq(), ctx);
      expect(res.status).toBe(200);
      expect(res.headers.get('X-RateLimit-Remaining')).toBe('1');
    });

    it('should keep separate counts per key', async () => {
      const middleware = createRateLimitMiddleware(store, {
        key: ipKey('retrieve'),
        limit: 1,
        windowSeconds: 3600,
      });
      const wrapped = errorHandler(middleware(okHandler));

      await wrapped(makeReq('10.0.0.1'), ctx);
      const other = await wrapped(makeReq('10.0.0.2'), ctx);
      const repeat = await wrapped(makeReq('10.0.0.1'), ctx);

      expect(other.status).toBe(200);
      expect(repeat.status).toBe(429);
    });
  });

  describe('key helpers', () => {
    it('should key by the first forwarded hop', () => {
      const req = new Request('http://test', {
        headers: { 'X-Forwarded-For': '203.0.113.7, 10.0.0.1' },
      });

      expect(ipKey('ingest')(req)).toBe('ip:203.0.113.7:ingest');
    });

    it('should fall back to unknown without a forwarded header', () => {
      expect(ipKey('ingest')(new Request('http://test'))).toBe('ip:unknown:ingest');
    });

    it('should key by assessment id from route params', () => {
      const key = assessmentKey('analyze')(new Request('http://test'), {
        params: { assessmentId: 'asmt-1' },
      });

      expect(key).toBe('assessment:asmt-1:analyze');
    });

    it('should share a global key across callers', () => {
      expect(globalKey('reasoning')()).toBe('global:reasoning');
    });

    it('should share the batch analysis budget across callers of one assessment', async () => {
      const middleware = createRateLimitMiddleware(store, RATE_LIMITS.analyzeAssessment);
      const wrapped = errorHandler(middleware(okHandler));
      const asmtCtx: HandlerContext = { params: { assessmentId: 'asmt-1' } };

      const statuses: number[] = [];
      for (let i = 0; i < 6; i++) {
        const res = await wrapped(makeReq(`10.0.0.${i}`), asmtCtx);
        statuses.push(res.status);
      }

      expect(statuses).toEqual([200, 200, 200, 200, 200, 429]);
    });
  });
});
