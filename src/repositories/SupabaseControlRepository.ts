/**
 * Supabase implementation of IControlRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IControlRepository } from './IControlRepository.js';
import type { ControlRow, ObjectiveRow } from '../types/database.js';

export class SupabaseControlRepository implements IControlRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findById(controlId: string): Promise<ControlRow | null> {
    const { data, error } = await this.db
      .from('controls')
      .select('id, title, requirement_text, family')
      .eq('id', controlId)
      .maybeSingle();

    if (error) throw new Error(`Failed to find control: ${error.message}`);
    return data as ControlRow | null;
  }

  async findObjectives(controlId: string): Promise<ObjectiveRow[]> {
    const { data, error } = await this.db
      .from('assessment_objectives')
      .select('id, control_id, objective_text, method')
      .eq('control_id', controlId)
      .order('id', { ascending: true });

    if (error) throw new Error(`Failed to find objectives: ${error.message}`);
    return (data ?? []) as ObjectiveRow[];
  }

  async listIds(): Promise<string[]> {
    const { data, error } = await this.db
      .from('controls')
      .select('id')
      .order('id', { ascending: true });

    if (error) throw new Error(`Failed to list controls: ${error.message}`);
    return ((data ?? []) as Array<{ id: string }>).map((row) => row.id);
  }

  async count(): Promise<number> {
    const { count, error } = await this.db
      .from('controls')
      .select('*', { count: 'exact', head: true });

    if (error) throw new Error(`Failed to count controls: ${error.message}`);
    return count ?? 0;
  }
}
