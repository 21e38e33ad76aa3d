/**
 * OpenAI embedding provider.
 * Wraps the OpenAI API for text-embedding-3-small (1536 dimensions).
 */

import OpenAI from 'openai';
import type {
  EmbeddingCallOptions,
  IEmbeddingProvider,
} from './IEmbeddingProvider.js';
import { EmbeddingRejectedError } from '../errors.js';

const DEFAULT_MODEL = 'text-embedding-3-small';
const DEFAULT_DIMENSIONS = 1536;

/** Inputs longer than this are truncated before sending; the API rejects oversized text. */
const MAX_INPUT_CHARS = 8000;

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  private client: OpenAI;
  private model: string;
  readonly dimensions: number;

  constructor(opts?: {
    apiKey?: string;
    model?: string;
    dimensions?: number;
    client?: OpenAI;
  }) {
    this.client =
      opts?.client ??
      new OpenAI({
        apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY,
        maxRetries: 0, // retries are owned by EmbeddingService
      });
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.dimensions = opts?.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async generate(
    text: string,
    options?: EmbeddingCallOptions
  ): Promise<number[]> {
    const [embedding] = await this.generateBatch([text], options);
    return embedding;
  }

  async generateBatch(
    texts: string[],
    options?: EmbeddingCallOptions
  ): Promise<number[][]> {
    if (texts.length === 0) return [];

    try {
      const response = await this.client.embeddings.create(
        {
          model: this.model,
          input: texts.map(prepareInput),
          dimensions: this.dimensions,
        },
        { signal: options?.signal }
      );

      // OpenAI returns embeddings in the same order as input
      return response.data
        .sort((a, b) => a.index - b.index)
        .map((d) => d.embedding);
    } catch (err) {
      if (err instanceof OpenAI.BadRequestError) {
        throw new EmbeddingRejectedError(
          texts.map((_, i) => i),
          `OpenAI rejected embedding input: ${err.message}`
        );
      }
      throw err;
    }
  }
}

function prepareInput(text: string): string {
  const collapsed = text.split(/\s+/).filter(Boolean).join(' ');
  // The API rejects empty strings
  const nonEmpty = collapsed.length > 0 ? collapsed : ' ';
  return nonEmpty.slice(0, MAX_INPUT_CHARS);
}
