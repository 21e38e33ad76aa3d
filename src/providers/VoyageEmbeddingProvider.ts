/**
 * Voyage AI embedding provider.
 * Uses the Voyage API (OpenAI-compatible format) for voyage-3-lite (512 dimensions).
 * No SDK dependency — uses native fetch.
 */

import { z } from 'zod';
import type {
  EmbeddingCallOptions,
  EmbeddingInputType,
  IEmbeddingProvider,
} from './IEmbeddingProvider.js';
import { EmbeddingRejectedError } from '../errors.js';

const API_URL = 'https://api.voyageai.com/v1/embeddings';
const DEFAULT_MODEL = 'voyage-3-lite';
const DEFAULT_DIMENSIONS = 512;

const voyageResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    })
  ),
  model: z.string(),
});

const voyageErrorSchema = z.object({ detail: z.string() });

export class VoyageEmbeddingProvider implements IEmbeddingProvider {
  private apiKey: string;
  private model: string;
  readonly dimensions: number;

  constructor(opts?: {
    apiKey?: string;
    model?: string;
    dimensions?: number;
  }) {
    this.apiKey = opts?.apiKey ?? process.env.VOYAGE_API_KEY ?? '';
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.dimensions = opts?.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async generate(
    text: string,
    options?: EmbeddingCallOptions
  ): Promise<number[]> {
    const data = await this.callApi([text], options);
    return data[0].embedding;
  }

  async generateBatch(
    texts: string[],
    options?: EmbeddingCallOptions
  ): Promise<number[][]> {
    if (texts.length === 0) return [];

    const data = await this.callApi(texts, options);

    return data
      .sort((a, b) => a.index - b.index)
      .map((d) => d.embedding);
  }

  private async callApi(
    input: string[],
    options: EmbeddingCallOptions = {}
  ): Promise<Array<{ embedding: number[]; index: number }>> {
    const inputType: EmbeddingInputType = options.inputType ?? 'document';
    const body: Record<string, unknown> = {
      input,
      model: this.model,
      input_type: inputType,
    };

    // Only include output_dimension for non-default values
    if (this.dimensions !== DEFAULT_DIMENSIONS) {
      body.output_dimension = this.dimensions;
    }

    const res = await fetch(API_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(body),
      signal: options.signal,
    });

    if (!res.ok) {
      const parsed = voyageErrorSchema.safeParse(
        await res.json().catch(() => ({}))
      );
      const detail = parsed.success ? parsed.data.detail : 'Unknown error';
      const message = `Voyage API error (${res.status}): ${detail}`;

      if (res.status === 400) {
        throw new EmbeddingRejectedError(
          input.map((_, i) => i),
          message
        );
      }
      throw new Error(message);
    }

    const parsed = voyageResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error(`Voyage API returned an unexpected payload: ${parsed.error.message}`);
    }
    return parsed.data.data;
  }
}
