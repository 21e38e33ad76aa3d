/**
 * Supabase implementation of IFindingRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  FindingReviewUpdate,
  IFindingRepository,
} from './IFindingRepository.js';
import type { FindingRow } from '../types/database.js';

export class SupabaseFindingRepository implements IFindingRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(row: Omit<FindingRow, 'id' | 'created_at'>): Promise<FindingRow> {
    const { data, error } = await this.db
      .from('control_findings')
      .insert(row)
      .select()
      .single();

    if (error) throw new Error(`Failed to insert finding: ${error.message}`);
    return data as FindingRow;
  }

  async findById(id: string): Promise<FindingRow | null> {
    const { data, error } = await this.db
      .from('control_findings')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find finding: ${error.message}`);
    return data as FindingRow | null;
  }

  async findLatest(
    assessmentId: string,
    controlId: string
  ): Promise<FindingRow | null> {
    const { data, error } = await this.db
      .from('control_findings')
      .select('*')
      .eq('assessment_id', assessmentId)
      .eq('control_id', controlId)
      .order('version', { ascending: false })
      .limit(1)
      .maybeSingle();

    if (error) throw new Error(`Failed to find latest finding: ${error.message}`);
    return data as FindingRow | null;
  }

  async findHistory(
    assessmentId: string,
    controlId: string
  ): Promise<FindingRow[]> {
    const { data, error } = await this.db
      .from('control_findings')
      .select('*')
      .eq('assessment_id', assessmentId)
      .eq('control_id', controlId)
      .order('version', { ascending: false });

    if (error) throw new Error(`Failed to find finding history: ${error.message}`);
    return (data ?? []) as FindingRow[];
  }

  async updateReview(id: string, data: FindingReviewUpdate): Promise<FindingRow> {
    const { data: updated, error } = await this.db
      .from('control_findings')
      .update(data)
      .eq('id', id)
      .select()
      .single();

    if (error) throw new Error(`Failed to update finding review: ${error.message}`);
    return updated as FindingRow;
  }
}
