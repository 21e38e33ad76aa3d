import { describe, it, expect, beforeEach } from 'vitest';
import { EmbeddingService } from '../../src/services/EmbeddingService.js';
import type { IEmbeddingProvider } from '../../src/providers/IEmbeddingProvider.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { EmbeddingFailedError, EmbeddingRejectedError } from '../../src/errors.js';
import { MockEmbeddingProvider } from '../mocks/MockEmbeddingProvider.js';

const fastRetry = { maxAttempts: 3, baseDelayMs: 0, jitter: false };

/** Rejects any input equal to "bad", reporting its index within the batch. */
class PickyProvider implements IEmbeddingProvider {
  readonly dimensions = 2;
  calls = 0;

  async generateBatch(texts: string[]): Promise<number[][]> {
    this.calls++;
    const bad = texts.flatMap((t, i) => (t === 'bad' ? [i] : []));
    if (bad.length > 0) throw new EmbeddingRejectedError(bad, 'input rejected');
    return texts.map(() => [1, 0]);
  }

  async generate(text: string): Promise<number[]> {
    const [v] = await this.generateBatch([text]);
    return v;
  }
}

describe('EmbeddingService', () => {
  let provider: MockEmbeddingProvider;
  let log: ConsoleLogProvider;

  beforeEach(() => {
    provider = new MockEmbeddingProvider(8);
    log = new ConsoleLogProvider();
  });

  it('should report the provider dimensions', () => {
    const service = new EmbeddingService(provider, log);
    expect(service.dimensions).toBe(8);
  });

  it('should return an empty list without calling the provider', async () => {
    const service = new EmbeddingService(provider, log);

    await expect(service.generateBatch([])).resolves.toEqual([]);
    expect(provider.callCount).toBe(0);
  });

  it('should split large inputs and return vectors in input order', async () => {
    const service = new EmbeddingService(provider, log, { maxBatchSize: 2 });
    const texts = ['one', 'two', 'three', 'four', 'five'];

    const vectors = await service.generateBatch(texts);

    expect(provider.callCount).toBe(3);
    expect(provider.batches.map((b) => b.length).sort()).toEqual([1, 2, 2]);
    expect(vectors).toEqual(texts.map((t) => provider.textToVector(t)));
  });

  it('should retry a transient failure and log the retry', async () => {
    provider.failNext(new Error('503 Service Unavailable'));
    const service = new EmbeddingService(provider, log, { retry: fastRetry });

    const vector = await service.generate('access control policy');

    expect(vector).toEqual(provider.textToVector('access control policy'));
    expect(provider.callCount).toBe(2);
    expect(log.find('embedding.retry')).toHaveLength(1);
    expect(log.find('embedding.retry')[0].fields).toMatchObject({
      attempt: 1,
      error: '503 Service Unavailable',
    });
  });

  it('should retry rejected inputs and report their index in the caller batch', async () => {
    const picky = new PickyProvider();
    const service = new EmbeddingService(picky, log, {
      maxBatchSize: 2,
      maxConcurrentCalls: 1,
      retry: fastRetry,
    });

    const err = await service.generateBatch(['a', 'b', 'c', 'bad']).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(EmbeddingFailedError);
    if (!(err instanceof EmbeddingFailedError)) return;
    expect(err.indices).toEqual([3]);
    expect(err.message).toBe('Embedding batch failed: input rejected');
    // one call for ['a', 'b'], three attempts for ['c', 'bad']
    expect(picky.calls).toBe(4);
    expect(log.find('embedding.rejected')[0].fields).toMatchObject({ attempts: 3, indices: [3] });
  });

  it('should recover when a rejection clears on retry', async () => {
    provider.failNext(new EmbeddingRejectedError([0], 'too long'));
    const service = new EmbeddingService(provider, log, { retry: fastRetry });

    const vectors = await service.generateBatch(['a', 'b']);

    expect(vectors).toEqual([provider.textToVector('a'), provider.textToVector('b')]);
    expect(provider.callCount).toBe(2);
    expect(log.find('embedding.retry')).toHaveLength(1);
  });

  it('should pass the input type through to the provider', async () => {
    const seen: Array<string | undefined> = [];
    const recording: IEmbeddingProvider = {
      dimensions: 2,
      generate: async () => [1, 0],
      generateBatch: async (texts, options) => {
        seen.push(options?.inputType);
        return texts.map(() => [1, 0]);
      },
    };
    const service = new EmbeddingService(recording, log);

    await service.generate('who reviews accounts?', { inputType: 'query' });
    await service.generateBatch(['policy text']);

    expect(seen).toEqual(['query', undefined]);
  });

  it('should fail the whole sub-batch once retries are exhausted', async () => {
    provider.failNext(new Error('upstream down'));
    provider.failNext(new Error('upstream down'));
    const service = new EmbeddingService(provider, log, {
      retry: { ...fastRetry, maxAttempts: 2 },
    });

    const err = await service.generateBatch(['a', 'b']).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(EmbeddingFailedError);
    if (!(err instanceof EmbeddingFailedError)) return;
    expect(err.indices).toEqual([0, 1]);
    expect(err.message).toBe('Embedding batch failed: upstream down');
    expect(log.find('embedding.failed')[0].fields).toMatchObject({ attempts: 2 });
  });

  it('should time out a call that never answers', async () => {
    provider.hang = true;
    const service = new EmbeddingService(provider, log, {
      timeoutMs: 20,
      retry: { maxAttempts: 1 },
    });

    await expect(service.generate('slow')).rejects.toThrow(
      'Embedding batch failed: Operation timed out after 20ms'
    );
  });

  it('should reject a response with the wrong number of vectors', async () => {
    const short: IEmbeddingProvider = {
      dimensions: 2,
      generate: async () => [1, 0],
      generateBatch: async () => [[1, 0]],
    };
    const service = new EmbeddingService(short, log, { retry: { maxAttempts: 1 } });

    await expect(service.generateBatch(['a', 'b'])).rejects.toThrow(
      'Embedding batch failed: Provider returned 1 vectors for 2 texts'
    );
  });
});
