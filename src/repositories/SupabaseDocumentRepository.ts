/**
 * Supabase implementation of IDocumentRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  DocumentUpdate,
  IDocumentRepository,
} from './IDocumentRepository.js';
import type { DocumentRow } from '../types/database.js';

export class SupabaseDocumentRepository implements IDocumentRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findById(id: string): Promise<DocumentRow | null> {
    const { data, error } = await this.db
      .from('documents')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find document: ${error.message}`);
    return data as DocumentRow | null;
  }

  async update(id: string, data: DocumentUpdate): Promise<DocumentRow> {
    const { data: updated, error } = await this.db
      .from('documents')
      .update({ ...data, updated_at: new Date().toISOString() })
      .eq('id', id)
      .select()
      .single();

    if (error) throw new Error(`Failed to update document: ${error.message}`);
    return updated as DocumentRow;
  }

  async findEmbeddedIds(assessmentId: string): Promise<string[]> {
    const { data, error } = await this.db
      .from('documents')
      .select('id')
      .eq('assessment_id', assessmentId)
      .eq('status', 'embedded');

    if (error) throw new Error(`Failed to list documents: ${error.message}`);
    return ((data ?? []) as Array<{ id: string }>).map((row) => row.id);
  }
}
