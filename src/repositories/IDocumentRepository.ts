/**
 * Document data access interface.
 * Documents are created by the upload path; ingestion only moves them
 * through their statuses.
 */

import type { DocumentRow } from '../types/database.js';

export type DocumentUpdate = Partial<
  Pick<DocumentRow, 'status' | 'chunk_count' | 'error'>
>;

export interface IDocumentRepository {
  findById(id: string): Promise<DocumentRow | null>;

  update(id: string, data: DocumentUpdate): Promise<DocumentRow>;

  /** Ids of an assessment's documents that have reached `embedded`. */
  findEmbeddedIds(assessmentId: string): Promise<string[]>;
}
