/**
 * Supabase implementation of IAssessmentRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IAssessmentRepository } from './IAssessmentRepository.js';
import type { AssessmentRow } from '../types/database.js';

export class SupabaseAssessmentRepository implements IAssessmentRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findById(id: string): Promise<AssessmentRow | null> {
    const { data, error } = await this.db
      .from('assessments')
      .select('id, providers')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find assessment: ${error.message}`);
    return data as AssessmentRow | null;
  }
}
