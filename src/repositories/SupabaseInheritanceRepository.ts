/**
 * Supabase implementation of IInheritanceRepository.
 * Reads the `control_inheritance` view, which joins
 * provider_control_inheritance to provider_offerings.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IInheritanceRepository } from './IInheritanceRepository.js';
import type { InheritanceRow } from '../types/database.js';

const COLUMNS = 'control_id, provider_name, responsibility, provider_narrative';

export class SupabaseInheritanceRepository implements IInheritanceRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findForControl(
    controlId: string,
    providers: string[]
  ): Promise<InheritanceRow[]> {
    if (providers.length === 0) return [];

    const { data, error } = await this.db
      .from('control_inheritance')
      .select(COLUMNS)
      .eq('control_id', controlId)
      .in('provider_name', providers);

    if (error)
      throw new Error(`Failed to find control inheritance: ${error.message}`);
    return (data ?? []) as InheritanceRow[];
  }

  async findByProvider(provider: string): Promise<InheritanceRow[]> {
    const { data, error } = await this.db
      .from('control_inheritance')
      .select(COLUMNS)
      .eq('provider_name', provider)
      .order('control_id', { ascending: true });

    if (error)
      throw new Error(`Failed to find provider inheritance: ${error.message}`);
    return (data ?? []) as InheritanceRow[];
  }
}
