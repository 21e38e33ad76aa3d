/**
 * Vector index over document chunks.
 * Holds one dimensionality per deployment and rejects any vector that does
 * not match it, on write and on query. The store's own column width is
 * checked once before the first write or query.
 */

import { z } from 'zod';
import type { IChunkRepository } from '../repositories/IChunkRepository.js';
import type { ChunkRow, ScoredChunkRow } from '../types/database.js';
import type {
  AssessmentMethod,
  Chunk,
  RetrievedChunk,
  ScoredChunk,
} from '../types/models.js';
import { toAssessmentMethod } from '../types/models.js';
import { DimensionMismatchError } from '../errors.js';

export interface VectorEntry {
  chunkId: string;
  vector: number[];
  metadata: Omit<Chunk, 'id' | 'embedding'>;
}

export interface VectorFilters {
  controlId?: string;
  documentIds?: string[];
  method?: AssessmentMethod;
}

const storedVectorSchema = z.array(z.number());

export class VectorIndex {
  private storeCheck: Promise<void> | null = null;

  constructor(
    private readonly chunkRepo: IChunkRepository,
    readonly dimensions: number
  ) {}

  /**
   * Throws DimensionMismatchError when the store holds vectors of another
   * width. A mismatch is remembered; a failed lookup is tried again next call.
   */
  verifyStore(): Promise<void> {
    this.storeCheck ??= this.checkStore().catch((err: unknown) => {
      if (!(err instanceof DimensionMismatchError)) this.storeCheck = null;
      throw err;
    });
    return this.storeCheck;
  }

  async upsert(entries: VectorEntry[]): Promise<void> {
    for (const entry of entries) {
      this.checkDimensions(entry.vector);
    }
    await this.verifyStore();

    const rows: ChunkRow[] = entries.map((e) => ({
      id: e.chunkId,
      document_id: e.metadata.documentId,
      chunk_index: e.metadata.index,
      start_char: e.metadata.start,
      end_char: e.metadata.end,
      chunk_text: e.metadata.text,
      control_ids: e.metadata.controlIds,
      method: e.metadata.method,
      embedding: JSON.stringify(e.vector),
    }));
    await this.chunkRepo.upsert(rows);
  }

  async deleteDocument(documentId: string): Promise<void> {
    await this.chunkRepo.deleteByDocument(documentId);
  }

  /** Up to `topK` candidates, most similar first. */
  async query(
    vector: number[],
    topK: number,
    filters: VectorFilters = {}
  ): Promise<ScoredChunk[]> {
    this.checkDimensions(vector);
    if (topK <= 0) return [];
    await this.verifyStore();

    const rows = await this.chunkRepo.search(vector, {
      maxResults: topK,
      controlId: filters.controlId,
      documentIds: filters.documentIds,
      method: filters.method,
    });

    // Array.prototype.sort is stable, so equal scores keep the store's order
    return rows
      .map((row) => ({ chunk: this.rowToChunk(row), similarity: row.similarity }))
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, topK);
  }

  private async checkStore(): Promise<void> {
    const stored = await this.chunkRepo.storedDimensions();
    if (stored !== null && stored !== this.dimensions) {
      throw new DimensionMismatchError(stored, this.dimensions);
    }
  }

  private checkDimensions(vector: number[]): void {
    if (vector.length !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, vector.length);
    }
  }

  private rowToChunk(row: ScoredChunkRow): RetrievedChunk {
    const embedding = storedVectorSchema.parse(JSON.parse(row.embedding));
    this.checkDimensions(embedding);

    return {
      id: row.id,
      documentId: row.document_id,
      documentTitle: row.document_title,
      index: row.chunk_index,
      start: row.start_char,
      end: row.end_char,
      text: row.chunk_text,
      controlIds: row.control_ids,
      method: toAssessmentMethod(row.method),
      embedding,
    };
  }
}
