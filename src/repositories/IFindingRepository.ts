/**
 * Finding data access interface.
 * Findings are append-only per version: analysis inserts, review updates only
 * the review columns.
 */

import type { FindingRow } from '../types/database.js';

export type FindingReviewUpdate = Pick<
  FindingRow,
  | 'review_state'
  | 'reviewer_id'
  | 'review_decision'
  | 'override_status'
  | 'review_notes'
  | 'reviewed_at'
>;

export interface IFindingRepository {
  insert(row: Omit<FindingRow, 'id' | 'created_at'>): Promise<FindingRow>;

  findById(id: string): Promise<FindingRow | null>;

  /** Highest version for the control, or null if never analysed. */
  findLatest(assessmentId: string, controlId: string): Promise<FindingRow | null>;

  /** Every version for the control, newest first. */
  findHistory(assessmentId: string, controlId: string): Promise<FindingRow[]>;

  updateReview(id: string, data: FindingReviewUpdate): Promise<FindingRow>;
}
