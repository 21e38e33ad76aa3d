/**
 * Embedding service.
 * Wraps whichever IEmbeddingProvider the deployment is configured with and
 * adds batching, retries, timeouts and a bound on concurrent upstream calls.
 * Callers see the same interface as a bare provider.
 */

import type {
  EmbeddingCallOptions,
  IEmbeddingProvider,
} from '../providers/IEmbeddingProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import {
  EmbeddingFailedError,
  EmbeddingRejectedError,
  RetryExhaustedError,
  errorMessage,
} from '../errors.js';
import { withRetry, withTimeout, type RetryPolicy } from '../utils/retry.js';
import { Semaphore } from '../utils/concurrency.js';

export interface EmbeddingServiceOptions {
  /** Texts per upstream call. Default: 100. */
  maxBatchSize?: number;
  /** Per-call deadline. Default: 30_000. */
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  /** Upstream calls in flight at once. Default: 4. */
  maxConcurrentCalls?: number;
}

export class EmbeddingService implements IEmbeddingProvider {
  private readonly maxBatchSize: number;
  private readonly timeoutMs: number;
  private readonly retry: Partial<RetryPolicy>;
  private readonly semaphore: Semaphore;

  constructor(
    private readonly provider: IEmbeddingProvider,
    private readonly log: ILogProvider,
    options: EmbeddingServiceOptions = {}
  ) {
    this.maxBatchSize = options.maxBatchSize ?? 100;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.retry = options.retry ?? {};
    this.semaphore = new Semaphore(options.maxConcurrentCalls ?? 4);
  }

  get dimensions(): number {
    return this.provider.dimensions;
  }

  async generate(
    text: string,
    options?: EmbeddingCallOptions
  ): Promise<number[]> {
    const [vector] = await this.generateBatch([text], options);
    return vector;
  }

  /**
   * Embed `texts` in order. Any sub-batch that cannot be embedded fails the
   * whole call with EmbeddingFailedError; indices refer to `texts`.
   */
  async generateBatch(
    texts: string[],
    options?: EmbeddingCallOptions
  ): Promise<number[][]> {
    if (texts.length === 0) return [];

    const batches: Array<{ offset: number; texts: string[] }> = [];
    for (let offset = 0; offset < texts.length; offset += this.maxBatchSize) {
      batches.push({ offset, texts: texts.slice(offset, offset + this.maxBatchSize) });
    }

    const results = await Promise.all(
      batches.map((b) => this.embedSubBatch(b.texts, b.offset, options))
    );

    this.log.debug('embedding.batch', {
      texts: texts.length,
      batches: batches.length,
      dimensions: this.provider.dimensions,
    });
    return results.flat();
  }

  private async embedSubBatch(
    texts: string[],
    offset: number,
    options: EmbeddingCallOptions = {}
  ): Promise<number[][]> {
    const { signal, inputType } = options;
    try {
      return await withRetry(
        () =>
          this.semaphore.use(() =>
            withTimeout(
              async (callSignal) => {
                const vectors = await this.provider.generateBatch(texts, {
                  signal: callSignal,
                  inputType,
                });
                checkShape(vectors, texts.length);
                return vectors;
              },
              this.timeoutMs,
              signal
            )
          ),
        {
          ...this.retry,
          signal,
          onRetry: (err, attempt, delayMs) => {
            this.log.warn('embedding.retry', {
              attempt: attempt + 1,
              delayMs,
              offset,
              size: texts.length,
              error: errorMessage(err),
            });
          },
        }
      );
    } catch (err) {
      if (err instanceof RetryExhaustedError && err.lastError instanceof EmbeddingRejectedError) {
        const rejected = err.lastError;
        const indices = rejected.indices.map((i) => i + offset);
        this.log.error('embedding.rejected', {
          attempts: err.attempts,
          indices,
          error: rejected.message,
        });
        throw new EmbeddingFailedError(indices, rejected.message);
      }
      if (err instanceof RetryExhaustedError) {
        const indices = texts.map((_, i) => i + offset);
        this.log.error('embedding.failed', {
          attempts: err.attempts,
          offset,
          size: texts.length,
          error: errorMessage(err.lastError),
        });
        throw new EmbeddingFailedError(indices, errorMessage(err.lastError));
      }
      throw err;
    }
  }
}

function checkShape(vectors: number[][], expected: number): void {
  if (vectors.length !== expected) {
    throw new Error(`Provider returned ${vectors.length} vectors for ${expected} texts`);
  }
  const width = vectors[0]?.length ?? 0;
  if (vectors.some((v) => v.length !== width)) {
    throw new Error('Provider returned vectors of differing lengths');
  }
}
