/**
 * Pipeline configuration.
 * Read once from environment variables at startup; every tunable has a
 * default and a valid range.
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { ConfidenceFactors } from './types/models.js';

export type Env = Record<string, string | undefined>;

const blank = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const int = (min: number, max: number, fallback: number) =>
  z.preprocess(blank, z.coerce.number().int().min(min).max(max).default(fallback));

const optionalInt = (min: number, max: number) =>
  z.preprocess(blank, z.coerce.number().int().min(min).max(max).optional());

const ratio = (fallback: number) =>
  z.preprocess(blank, z.coerce.number().min(0).max(1).default(fallback));

const optionalString = z.preprocess(blank, z.string().optional());

const envSchema = z.object({
  EMBEDDING_PROVIDER: z.preprocess(blank, z.enum(['openai', 'voyage', 'local']).default('openai')),
  EMBEDDING_MODEL: optionalString,
  EMBEDDING_DIMENSIONS: optionalInt(1, 8192),
  EMBEDDING_BATCH_SIZE: int(1, 2048, 100),
  VECTOR_DIMENSIONS: int(1, 16_000, 1536),
  REASONING_PROVIDER: z.preprocess(blank, z.enum(['openai', 'anthropic']).default('openai')),
  REASONING_MODEL: optionalString,
  CHUNK_UNIT: z.preprocess(blank, z.enum(['chars', 'tokens']).default('chars')),
  CHUNK_WINDOW: optionalInt(1, 100_000),
  CHUNK_OVERLAP: optionalInt(0, 100_000),
  RETRIEVAL_TOP_K: int(1, 100, 10),
  RETRIEVAL_THRESHOLD: ratio(0.7),
  MMR_LAMBDA: ratio(0.7),
  CONFIDENCE_THRESHOLD: int(0, 100, 80),
  INHERITED_CONFIDENCE: int(0, 100, 95),
  CONFIDENCE_WEIGHT_QUALITY: ratio(0.4),
  CONFIDENCE_WEIGHT_QUANTITY: ratio(0.2),
  CONFIDENCE_WEIGHT_RECENCY: ratio(0.15),
  CONFIDENCE_WEIGHT_INHERITANCE: ratio(0.15),
  CONFIDENCE_WEIGHT_AI: ratio(0.1),
  EXTERNAL_TIMEOUT_MS: int(100, 600_000, 30_000),
  RETRY_MAX_ATTEMPTS: int(1, 10, 3),
  RETRY_BASE_DELAY_MS: int(0, 60_000, 500),
  INGEST_CONCURRENCY: int(1, 64, 4),
  ANALYSIS_CONCURRENCY: int(1, 64, 4),
  ANALYSIS_REENTRANCY: z.preprocess(blank, z.enum(['reject', 'queue']).default('reject')),
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  VOYAGE_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  AXIOM_API_KEY: optionalString,
  AXIOM_DATASET: optionalString,
});

export interface PipelineConfig {
  embedding: {
    provider: 'openai' | 'voyage' | 'local';
    model?: string;
    dimensions?: number;
    batchSize: number;
  };
  vectorIndex: {
    /** Width of the stored embedding column; the embedding provider must match it. */
    dimensions: number;
  };
  reasoning: {
    provider: 'openai' | 'anthropic';
    model?: string;
  };
  chunking: {
    unit: 'chars' | 'tokens';
    window?: number;
    overlap?: number;
  };
  retrieval: {
    topK: number;
    similarityThreshold: number;
    lambda: number;
  };
  gate: {
    confidenceThreshold: number;
    inheritedConfidence: number;
    /** Factor weights for model findings; must sum to 1. */
    weights: ConfidenceFactors;
  };
  external: {
    timeoutMs: number;
    retryMaxAttempts: number;
    retryBaseDelayMs: number;
  };
  concurrency: {
    ingest: number;
    analysis: number;
    reentrancy: 'reject' | 'queue';
  };
  secrets: {
    supabaseUrl?: string;
    supabaseServiceRoleKey?: string;
    openaiApiKey?: string;
    voyageApiKey?: string;
    anthropicApiKey?: string;
    axiomApiKey?: string;
    axiomDataset?: string;
  };
}

export function loadConfig(env: Env = process.env): PipelineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ValidationError(`Invalid configuration: ${fields.join('; ')}`, { fields });
  }
  const e = parsed.data;

  if (
    e.CHUNK_WINDOW !== undefined &&
    e.CHUNK_OVERLAP !== undefined &&
    e.CHUNK_OVERLAP >= e.CHUNK_WINDOW
  ) {
    throw new ValidationError('Invalid configuration: CHUNK_OVERLAP must be below CHUNK_WINDOW', {
      fields: ['CHUNK_OVERLAP'],
    });
  }

  return {
    embedding: {
      provider: e.EMBEDDING_PROVIDER,
      model: e.EMBEDDING_MODEL,
      dimensions: e.EMBEDDING_DIMENSIONS,
      batchSize: e.EMBEDDING_BATCH_SIZE,
    },
    vectorIndex: {
      dimensions: e.VECTOR_DIMENSIONS,
    },
    reasoning: {
      provider: e.REASONING_PROVIDER,
      model: e.REASONING_MODEL,
    },
    chunking: {
      unit: e.CHUNK_UNIT,
      window: e.CHUNK_WINDOW,
      overlap: e.CHUNK_OVERLAP,
    },
    retrieval: {
      topK: e.RETRIEVAL_TOP_K,
      similarityThreshold: e.RETRIEVAL_THRESHOLD,
      lambda: e.MMR_LAMBDA,
    },
    gate: {
      confidenceThreshold: e.CONFIDENCE_THRESHOLD,
      inheritedConfidence: e.INHERITED_CONFIDENCE,
      weights: {
        evidenceQuality: e.CONFIDENCE_WEIGHT_QUALITY,
        evidenceQuantity: e.CONFIDENCE_WEIGHT_QUANTITY,
        evidenceRecency: e.CONFIDENCE_WEIGHT_RECENCY,
        providerInheritance: e.CONFIDENCE_WEIGHT_INHERITANCE,
        aiCertainty: e.CONFIDENCE_WEIGHT_AI,
      },
    },
    external: {
      timeoutMs: e.EXTERNAL_TIMEOUT_MS,
      retryMaxAttempts: e.RETRY_MAX_ATTEMPTS,
      retryBaseDelayMs: e.RETRY_BASE_DELAY_MS,
    },
    concurrency: {
      ingest: e.INGEST_CONCURRENCY,
      analysis: e.ANALYSIS_CONCURRENCY,
      reentrancy: e.ANALYSIS_REENTRANCY,
    },
    secrets: {
      supabaseUrl: e.SUPABASE_URL,
      supabaseServiceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY,
      openaiApiKey: e.OPENAI_API_KEY,
      voyageApiKey: e.VOYAGE_API_KEY,
      anthropicApiKey: e.ANTHROPIC_API_KEY,
      axiomApiKey: e.AXIOM_API_KEY,
      axiomDataset: e.AXIOM_DATASET,
    },
  };
}
