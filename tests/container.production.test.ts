import { describe, it, expect, afterEach } from 'vitest';
import {
  getProductionContainer,
  disposeProductionContainer,
} from '../src/container.production.js';

const SUPABASE = {
  SUPABASE_URL: 'http://localhost:54321',
  SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
};

const LOCAL = {
  ...SUPABASE,
  EMBEDDING_PROVIDER: 'local',
  EMBEDDING_DIMENSIONS: '256',
  VECTOR_DIMENSIONS: '256',
  REASONING_PROVIDER: 'anthropic',
  ANTHROPIC_API_KEY: 'test-key',
};

describe('getProductionContainer', () => {
  afterEach(async () => {
    await disposeProductionContainer();
  });

  it('should require Supabase credentials', () => {
    expect(() => getProductionContainer({})).toThrow(
      'Missing required environment variables: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY'
    );
  });

  it('should require the key of the selected reasoning provider', () => {
    expect(() =>
      getProductionContainer({ ...SUPABASE, EMBEDDING_PROVIDER: 'local', REASONING_PROVIDER: 'anthropic' })
    ).toThrow('Missing required environment variable: ANTHROPIC_API_KEY');
  });

  it('should require the key of the selected embedding provider', () => {
    expect(() => getProductionContainer({ ...SUPABASE, EMBEDDING_PROVIDER: 'voyage' })).toThrow(
      'Missing required environment variable: VOYAGE_API_KEY'
    );
  });

  it('should refuse to start when the embedding width differs from the stored one', () => {
    expect(() =>
      getProductionContainer({ ...LOCAL, EMBEDDING_DIMENSIONS: undefined, VECTOR_DIMENSIONS: undefined })
    ).toThrow('Vector has 384 dimensions, index is configured for 1536');
  });

  it('should refuse confidence weights that do not sum to one', () => {
    expect(() => getProductionContainer({ ...LOCAL, CONFIDENCE_WEIGHT_AI: '0.5' })).toThrow(
      'Confidence weights must sum to 1, got 1.40'
    );
  });

  it('should build once and reuse the container', () => {
    const first = getProductionContainer(LOCAL);
    const second = getProductionContainer({});

    expect(first.embeddingService.dimensions).toBe(256);
    expect(second).toBe(first);
  });

  it('should build a fresh container after dispose', async () => {
    const first = getProductionContainer(LOCAL);
    await disposeProductionContainer();
    const second = getProductionContainer({
      ...LOCAL,
      EMBEDDING_DIMENSIONS: '128',
      VECTOR_DIMENSIONS: '128',
    });

    expect(second).not.toBe(first);
    expect(second.embeddingService.dimensions).toBe(128);
  });

  it('should do nothing when disposing without a container', async () => {
    await expect(disposeProductionContainer()).resolves.toBeUndefined();
  });
});
