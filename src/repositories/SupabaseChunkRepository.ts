/**
 * Supabase implementation of IChunkRepository.
 * Uses pgvector for semantic similarity search.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type {
  ChunkSearchOptions,
  IChunkRepository,
} from './IChunkRepository.js';
import type { ChunkRow, ScoredChunkRow } from '../types/database.js';

export class SupabaseChunkRepository implements IChunkRepository {
  constructor(private readonly db: SupabaseClient) {}

  async upsert(rows: ChunkRow[]): Promise<void> {
    if (rows.length === 0) return;

    const { error } = await this.db
      .from('document_chunks')
      .upsert(rows, { onConflict: 'id' });

    if (error) throw new Error(`Failed to upsert chunks: ${error.message}`);
  }

  async deleteByDocument(documentId: string): Promise<void> {
    const { error } = await this.db
      .from('document_chunks')
      .delete()
      .eq('document_id', documentId);

    if (error) throw new Error(`Failed to delete chunks: ${error.message}`);
  }

  /**
   * Vector similarity search using pgvector.
   * Calls a Supabase RPC function that orders by the `<=>` cosine distance.
   */
  async search(
    embedding: number[],
    options: ChunkSearchOptions
  ): Promise<ScoredChunkRow[]> {
    const { data, error } = await this.db.rpc('match_document_chunks', {
      query_embedding: JSON.stringify(embedding),
      match_count: options.maxResults,
      filter_control_id: options.controlId ?? null,
      filter_document_ids: options.documentIds ?? null,
      filter_method: options.method ?? null,
    });

    if (error) throw new Error(`Failed to search chunks: ${error.message}`);
    return (data ?? []) as ScoredChunkRow[];
  }

  async storedDimensions(): Promise<number | null> {
    const { data, error } = await this.db.rpc('embedding_dimensions');

    if (error) throw new Error(`Failed to read embedding dimensions: ${error.message}`);
    return dimensionsSchema.parse(data);
  }
}

const dimensionsSchema = z.number().int().positive().nullable();
