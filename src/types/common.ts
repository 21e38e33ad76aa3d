/**
 * Shared primitive types used across layers.
 */

/** Per-item outcome of a batch operation. */
export type ItemOutcome<T> =
  | { id: string; status: 'succeeded'; result: T }
  | { id: string; status: 'failed'; error: { code: string; message: string } }
  | { id: string; status: 'skipped'; reason: string }
  | { id: string; status: 'cancelled' };
