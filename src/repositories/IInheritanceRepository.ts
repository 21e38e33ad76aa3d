/**
 * Provider inheritance data access interface.
 * Rows come from the provider offering mappings (read-only here).
 */

import type { InheritanceRow } from '../types/database.js';

export interface IInheritanceRepository {
  /** Mappings for one control, limited to the named providers. */
  findForControl(controlId: string, providers: string[]): Promise<InheritanceRow[]>;

  /** Every mapping a provider publishes. */
  findByProvider(provider: string): Promise<InheritanceRow[]>;
}
