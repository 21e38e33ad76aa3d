/**
 * Supabase-backed rate limit store.
 * The `increment_rate_limit` function upserts the counter row atomically, so
 * concurrent function instances share one count.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IRateLimitStore, RateLimitResult } from './IRateLimitStore.js';

export class SupabaseRateLimitStore implements IRateLimitStore {
  constructor(private readonly db: SupabaseClient) {}

  async increment(key: string, windowSeconds: number): Promise<RateLimitResult> {
    const now = Math.floor(Date.now() / 1000);
    const windowStart = now - (now % windowSeconds);
    const resetAt = windowStart + windowSeconds;

    const { data, error } = await this.db.rpc('increment_rate_limit', {
      p_key: key,
      p_window_key: String(windowStart),
    });

    if (error) throw new Error(`Failed to increment rate limit: ${error.message}`);
    return { count: typeof data === 'number' ? data : 0, resetAt };
  }
}
