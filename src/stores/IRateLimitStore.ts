/**
 * Rate limit counter storage.
 * Fixed windows: every key's count resets when its window ends.
 */

export interface RateLimitResult {
  /** Requests counted in the current window, including this one. */
  count: number;
  /** Unix seconds at which the current window ends. */
  resetAt: number;
}

export interface IRateLimitStore {
  /** Count one request against `key` and report the window's state. */
  increment(key: string, windowSeconds: number): Promise<RateLimitResult>;
}
