import { describe, it, expect, vi, beforeEach } from 'vitest';
import OpenAI from 'openai';
import { OpenAIEmbeddingProvider } from '../../src/providers/OpenAIEmbeddingProvider.js';
import { LocalEmbeddingProvider } from '../../src/providers/LocalEmbeddingProvider.js';
import { EmbeddingRejectedError } from '../../src/errors.js';
import { cosineSimilarity } from '../../src/services/RetrievalEngine.js';

describe('OpenAIEmbeddingProvider', () => {
  const mockFetch = vi.fn();
  let provider: OpenAIEmbeddingProvider;

  beforeEach(() => {
    mockFetch.mockReset();
    const client = new OpenAI({ apiKey: 'test-key', fetch: mockFetch, maxRetries: 0 });
    provider = new OpenAIEmbeddingProvider({ client, dimensions: 256 });
  });

  it('should report the configured dimensions', () => {
    expect(provider.dimensions).toBe(256);
  });

  it('should return an empty list without calling the API', async () => {
    await expect(provider.generateBatch([])).resolves.toEqual([]);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should map a 400 response to EmbeddingRejectedError and collapse whitespace in inputs', async () => {
    mockFetch.mockResolvedValueOnce(
      new Response(JSON.stringify({ error: { message: 'input too long', type: 'invalid_request_error' } }), {
        status: 400,
        headers: { 'content-type': 'application/json' },
      })
    );

    const err = await provider
      .generateBatch(['Access  control\n\npolicy', ''])
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(EmbeddingRejectedError);
    if (!(err instanceof EmbeddingRejectedError)) return;
    expect(err.indices).toEqual([0, 1]);

    const body = mockFetch.mock.calls[0][1]?.body;
    expect(typeof body).toBe('string');
    if (typeof body !== 'string') return;
    expect(JSON.parse(body)).toMatchObject({
      model: 'text-embedding-3-small',
      input: ['Access control policy', ' '],
      dimensions: 256,
    });
  });
});

describe('LocalEmbeddingProvider', () => {
  const provider = new LocalEmbeddingProvider({ dimensions: 128 });

  it('should produce unit vectors of the configured length', async () => {
    const vector = await provider.generate('Accounts are reviewed quarterly.');
    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));

    expect(vector).toHaveLength(128);
    expect(norm).toBeCloseTo(1);
  });

  it('should give the same vector for the same text', async () => {
    const [a, b] = await provider.generateBatch(['AC-2 account review', 'AC-2 account review']);
    expect(a).toEqual(b);
  });

  it('should ignore case and stop words', async () => {
    const [a, b] = await provider.generateBatch([
      'The account review of AC-2',
      'account REVIEW ac-2',
    ]);
    expect(a).toEqual(b);
  });

  it('should place related text closer than unrelated text', async () => {
    const [query, related, unrelated] = await provider.generateBatch([
      'quarterly review of user accounts',
      'user accounts get a quarterly review',
      'backup tapes rotate offsite weekly',
    ]);

    expect(cosineSimilarity(query, related)).toBeGreaterThan(cosineSimilarity(query, unrelated));
  });

  it('should return a zero vector for text with no tokens', async () => {
    const vector = await provider.generate('!!!');
    expect(vector.every((v) => v === 0)).toBe(true);
  });
});
