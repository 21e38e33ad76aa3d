/**
 * Embedding provider interface.
 * Turns text into fixed-length vectors. Implementations are selected once at
 * startup; callers never depend on a concrete backend.
 */

/** Whether the texts are stored passages or a search query. */
export type EmbeddingInputType = 'document' | 'query';

export interface EmbeddingCallOptions {
  /** Aborts the upstream call (timeouts, batch cancellation). */
  signal?: AbortSignal;
  /**
   * Backends with asymmetric models embed queries and documents differently;
   * the rest ignore it. Default: 'document'.
   */
  inputType?: EmbeddingInputType;
}

export interface IEmbeddingProvider {
  /** Length of every vector this provider returns. */
  readonly dimensions: number;

  generate(text: string, options?: EmbeddingCallOptions): Promise<number[]>;

  /** One vector per input text, in input order. */
  generateBatch(
    texts: string[],
    options?: EmbeddingCallOptions
  ): Promise<number[][]>;
}
