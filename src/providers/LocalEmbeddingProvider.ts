/**
 * Local embedding provider.
 * Computes vectors in-process with signed feature hashing over word unigrams
 * and bigrams. No network, no model download; suited to air-gapped
 * deployments and development. Vectors are L2-normalised so cosine similarity
 * reduces to a dot product.
 */

import type { IEmbeddingProvider } from './IEmbeddingProvider.js';

const DEFAULT_DIMENSIONS = 384;

// Keeps control identifiers such as "ac.l2-3.1.1" or "ac-2(1)" as single tokens.
const TOKEN_PATTERN = /[a-z0-9]+(?:[.\-()][a-z0-9]+\)?)*/g;

const STOP_WORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from', 'in',
  'is', 'it', 'of', 'on', 'or', 'shall', 'that', 'the', 'this', 'to', 'with',
]);

export class LocalEmbeddingProvider implements IEmbeddingProvider {
  readonly dimensions: number;

  constructor(opts?: { dimensions?: number }) {
    this.dimensions = opts?.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async generate(text: string): Promise<number[]> {
    return this.embed(text);
  }

  async generateBatch(texts: string[]): Promise<number[][]> {
    return texts.map((t) => this.embed(t));
  }

  private embed(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const tokens = tokenize(text);

    for (let i = 0; i < tokens.length; i++) {
      this.addFeature(vector, tokens[i], 1);
      if (i > 0) {
        // Bigrams carry phrase information at half weight
        this.addFeature(vector, `${tokens[i - 1]} ${tokens[i]}`, 0.5);
      }
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }

  private addFeature(vector: number[], feature: string, weight: number): void {
    const hash = fnv1a(feature);
    const bucket = hash % this.dimensions;
    const sign = (hash >>> 31) === 0 ? 1 : -1;
    vector[bucket] += sign * weight;
  }
}

function tokenize(text: string): string[] {
  const matches = text.toLowerCase().match(TOKEN_PATTERN) ?? [];
  return matches.filter((t) => !STOP_WORDS.has(t));
}

/** 32-bit FNV-1a, returned as an unsigned integer. */
function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
