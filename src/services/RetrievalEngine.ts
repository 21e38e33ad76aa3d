/**
 * Retrieval engine.
 * Embeds a query, pulls a candidate pool from the vector index, applies the
 * similarity threshold and re-ranks with Maximal Marginal Relevance so the
 * excerpts handed to analysis are relevant without repeating each other.
 */

import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type {
  AssessmentMethod,
  RetrievalResult,
  ScoredChunk,
} from '../types/models.js';
import type { VectorIndex } from './VectorIndex.js';
import { ValidationError } from '../errors.js';

export interface RetrievalQuery {
  /** Text to embed, or a vector used as given. */
  query: string | number[];
  controlId?: string;
  documentIds?: string[];
  method?: AssessmentMethod;
  topK?: number;
  similarityThreshold?: number;
  /** Candidates fetched before re-ranking. Default: 2 * topK. */
  rerankPool?: number;
  /** 1 favours relevance only, 0 diversity only. */
  lambda?: number;
}

export interface RetrievalDefaults {
  topK: number;
  similarityThreshold: number;
  lambda: number;
}

export const DEFAULT_RETRIEVAL: RetrievalDefaults = {
  topK: 10,
  similarityThreshold: 0.7,
  lambda: 0.7,
};

export class RetrievalEngine {
  private readonly defaults: RetrievalDefaults;

  constructor(
    private readonly embedder: IEmbeddingProvider,
    private readonly index: VectorIndex,
    private readonly log: ILogProvider,
    defaults: Partial<RetrievalDefaults> = {}
  ) {
    this.defaults = { ...DEFAULT_RETRIEVAL, ...defaults };
  }

  async retrieve(
    request: RetrievalQuery,
    options?: { signal?: AbortSignal }
  ): Promise<RetrievalResult[]> {
    const topK = request.topK ?? this.defaults.topK;
    const threshold = request.similarityThreshold ?? this.defaults.similarityThreshold;
    const lambda = request.lambda ?? this.defaults.lambda;
    const poolSize = request.rerankPool ?? topK * 2;

    if (!Number.isInteger(topK) || topK < 0) {
      throw new ValidationError('topK must be a non-negative integer', { topK });
    }
    if (lambda < 0 || lambda > 1) {
      throw new ValidationError('lambda must be between 0 and 1', { lambda });
    }
    if (!Number.isInteger(poolSize) || poolSize < topK) {
      throw new ValidationError('rerankPool must be an integer no smaller than topK', {
        rerankPool: poolSize,
        topK,
      });
    }
    if (topK === 0) return [];

    const vector =
      typeof request.query === 'string'
        ? await this.embedder.generate(request.query, {
            signal: options?.signal,
            inputType: 'query',
          })
        : request.query;

    const candidates = await this.index.query(vector, poolSize, {
      controlId: request.controlId,
      documentIds: request.documentIds,
      method: request.method,
    });

    const eligible = [...candidates]
      .sort((a, b) => b.similarity - a.similarity)
      .filter((c) => c.similarity >= threshold);

    const selected = selectMmr(eligible, topK, lambda);
    const results = selected.map((c, i) => ({ ...c, rank: i + 1 }));

    if (results.length === 0) {
      this.log.warn('retrieval.degraded', {
        controlId: request.controlId ?? null,
        candidates: candidates.length,
        threshold,
      });
    } else {
      this.log.debug('retrieval.completed', {
        controlId: request.controlId ?? null,
        candidates: candidates.length,
        eligible: eligible.length,
        returned: results.length,
      });
    }

    return results;
  }
}

/**
 * Greedy Maximal Marginal Relevance over candidates sorted best-first.
 * Ties go to the earlier candidate.
 */
export function selectMmr(
  candidates: ScoredChunk[],
  topK: number,
  lambda: number
): ScoredChunk[] {
  const remaining = [...candidates];
  const selected: ScoredChunk[] = [];

  while (selected.length < topK && remaining.length > 0) {
    let bestIndex = 0;
    let bestScore = -Infinity;

    for (let i = 0; i < remaining.length; i++) {
      const candidate = remaining[i];
      const redundancy =
        selected.length === 0
          ? 0
          : Math.max(
              ...selected.map((s) =>
                cosineSimilarity(candidate.chunk.embedding, s.chunk.embedding)
              )
            );
      const score = lambda * candidate.similarity - (1 - lambda) * redundancy;
      if (score > bestScore) {
        bestScore = score;
        bestIndex = i;
      }
    }

    selected.push(remaining[bestIndex]);
    remaining.splice(bestIndex, 1);
  }

  return selected;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Render retrieved excerpts for an analysis request, best first.
 * Stops before an excerpt would push the text past `maxChars`.
 */
export function formatContext(results: RetrievalResult[], maxChars: number): string {
  const parts: string[] = [];
  let length = 0;

  for (const r of results) {
    const source = r.chunk.documentTitle ?? r.chunk.documentId;
    const part =
      `[Source ${r.rank}: ${source}, chunk ${r.chunk.index}, relevance ${r.similarity.toFixed(2)}]\n` +
      r.chunk.text;
    const added = parts.length === 0 ? part.length : part.length + 2;
    if (length + added > maxChars) break;
    parts.push(part);
    length += added;
  }

  return parts.join('\n\n');
}
