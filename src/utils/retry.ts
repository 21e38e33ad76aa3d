/**
 * Retry and timeout helpers for calls to external services
 * (embedding APIs, reasoning APIs).
 */

import { RetryExhaustedError, TimeoutError } from '../errors.js';

export interface RetryPolicy {
  /** Total attempts including the first. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Scale each delay by a random factor in [0.5, 1). */
  jitter: boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
  jitter: true,
};

export interface RetryOptions extends Partial<RetryPolicy> {
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  /** Stops retrying once aborted, even mid-delay; the abort reason is thrown. */
  signal?: AbortSignal;
}

export function calculateDelay(attempt: number, policy: RetryPolicy): number {
  let delay = policy.baseDelayMs * Math.pow(2, attempt);
  delay = Math.min(delay, policy.maxDelayMs);

  if (policy.jitter) {
    delay = delay * (0.5 + Math.random() * 0.5);
  }

  return Math.floor(delay);
}

/** Resolve after `ms`, or reject with the abort reason as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `operation` until it succeeds or the attempts run out.
 * `attempt` is zero-based. Throws RetryExhaustedError wrapping the last
 * failure. Once `signal` aborts, its reason is thrown instead, whatever the
 * operation failed with.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const policy: RetryPolicy = {
    maxAttempts: options.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
    jitter: options.jitter ?? DEFAULT_RETRY_POLICY.jitter,
  };
  const attempts = Math.max(1, policy.maxAttempts);
  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    options.signal?.throwIfAborted();

    try {
      return await operation(attempt);
    } catch (err) {
      lastError = err;
      options.signal?.throwIfAborted();
      if (attempt + 1 < attempts) {
        const delay = calculateDelay(attempt, policy);
        options.onRetry?.(err, attempt, delay);
        await sleep(delay, options.signal);
      }
    }
  }

  throw new RetryExhaustedError(attempts, lastError);
}

/**
 * Run `operation` with a deadline. The operation receives a signal that
 * aborts on timeout or when `parent` aborts; on timeout TimeoutError is thrown
 * even if the operation ignores its signal.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  parent?.throwIfAborted();

  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener('abort', onParentAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new TimeoutError(timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
