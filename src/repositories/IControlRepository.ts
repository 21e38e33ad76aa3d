/**
 * Control catalog data access interface (read-only).
 */

import type { ControlRow, ObjectiveRow } from '../types/database.js';

export interface IControlRepository {
  findById(controlId: string): Promise<ControlRow | null>;

  /** Assessment objectives of a control, in catalog order. */
  findObjectives(controlId: string): Promise<ObjectiveRow[]>;

  /** Every control id in the catalog, sorted. */
  listIds(): Promise<string[]>;

  count(): Promise<number>;
}
