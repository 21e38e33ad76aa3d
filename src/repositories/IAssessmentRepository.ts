/**
 * Assessment data access interface (read-only).
 * Assessments are owned by a separate subsystem; the pipeline only needs the
 * declared providers.
 */

import type { AssessmentRow } from '../types/database.js';

export interface IAssessmentRepository {
  findById(id: string): Promise<AssessmentRow | null>;
}
