/**
 * Supabase implementation of IEvidenceRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IEvidenceRepository } from './IEvidenceRepository.js';
import type { EvidenceRow } from '../types/database.js';

export class SupabaseEvidenceRepository implements IEvidenceRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findForControl(
    assessmentId: string,
    controlId: string
  ): Promise<EvidenceRow[]> {
    const { data, error } = await this.db
      .from('evidence')
      .select('id, assessment_id, title, evidence_type, description, control_ids, collected_at')
      .eq('assessment_id', assessmentId)
      .contains('control_ids', [controlId])
      .order('title', { ascending: true });

    if (error) throw new Error(`Failed to find evidence: ${error.message}`);
    return (data ?? []) as EvidenceRow[];
  }
}
