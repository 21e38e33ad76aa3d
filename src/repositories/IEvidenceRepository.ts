/**
 * Evidence data access interface (read-only).
 */

import type { EvidenceRow } from '../types/database.js';

export interface IEvidenceRepository {
  /** Evidence items of an assessment tagged with `controlId`. */
  findForControl(assessmentId: string, controlId: string): Promise<EvidenceRow[]>;
}
