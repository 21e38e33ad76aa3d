/**
 * In-memory rate limit store for development and tests.
 * Per-process only; counts are lost on restart.
 */

import type { IRateLimitStore, RateLimitResult } from './IRateLimitStore.js';

export class InMemoryRateLimitStore implements IRateLimitStore {
  private windows = new Map<string, RateLimitResult>();

  async increment(key: string, windowSeconds: number): Promise<RateLimitResult> {
    const now = Math.floor(Date.now() / 1000);
    const current = this.windows.get(key);

    if (!current || current.resetAt <= now) {
      const fresh = { count: 1, resetAt: now + windowSeconds };
      this.windows.set(key, fresh);
      return { ...fresh };
    }

    current.count++;
    return { ...current };
  }

  clear(): void {
    this.windows.clear();
  }
}
