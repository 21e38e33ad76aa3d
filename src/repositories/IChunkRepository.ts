/**
 * Chunk data access interface.
 * Chunks carry their embedding; search is cosine similarity over it.
 */

import type { ChunkRow, ScoredChunkRow } from '../types/database.js';

export interface ChunkSearchOptions {
  maxResults: number;
  controlId?: string;
  documentIds?: string[];
  method?: string;
}

export interface IChunkRepository {
  /** Insert or replace chunks by id. */
  upsert(rows: ChunkRow[]): Promise<void>;

  /** Remove every chunk of a document. */
  deleteByDocument(documentId: string): Promise<void>;

  /**
   * Nearest chunks to `embedding`, most similar first.
   * `similarity` is 1 - cosine distance.
   */
  search(
    embedding: number[],
    options: ChunkSearchOptions
  ): Promise<ScoredChunkRow[]>;

  /** Width of the stored embedding column, or null when the store does not fix one. */
  storedDimensions(): Promise<number | null>;
}
