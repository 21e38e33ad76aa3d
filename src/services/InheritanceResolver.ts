/**
 * Inheritance resolver.
 * Looks up how responsibility for a control is split with the assessment's
 * declared infrastructure providers.
 */

import type { IInheritanceRepository } from '../repositories/IInheritanceRepository.js';
import type { IControlRepository } from '../repositories/IControlRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { InheritanceRow } from '../types/database.js';
import type { InheritanceRecord, Responsibility } from '../types/models.js';

export interface ProviderCoverage {
  provider: string;
  totalControls: number;
  mappedControls: number;
  /** mappedControls / totalControls * 100, rounded to one decimal. */
  coveragePercentage: number;
  inherited: number;
  shared: number;
  customer: number;
}

const RESPONSIBILITY_ALIASES = new Map<string, Responsibility>([
  ['inherited', 'Inherited'],
  ['shared', 'Shared'],
  ['customer', 'Customer-responsibility'],
  ['customer-responsibility', 'Customer-responsibility'],
]);

// Lower sorts first when a provider maps a control more than once
const PRECEDENCE: Record<Responsibility, number> = {
  Inherited: 0,
  Shared: 1,
  'Customer-responsibility': 2,
};

export class InheritanceResolver {
  constructor(
    private readonly inheritanceRepo: IInheritanceRepository,
    private readonly controlRepo: IControlRepository,
    private readonly log: ILogProvider
  ) {}

  /**
   * At most one record per declared provider, in declaration order.
   * A provider mapped more than once keeps its strongest responsibility.
   */
  async resolve(controlId: string, providers: string[]): Promise<InheritanceRecord[]> {
    const declared = [...new Set(providers)];
    const rows = await this.inheritanceRepo.findForControl(controlId, declared);

    const byProvider = new Map<string, InheritanceRecord>();
    for (const row of rows) {
      const record = this.rowToRecord(row);
      if (!record) continue;
      const existing = byProvider.get(record.provider);
      if (!existing || PRECEDENCE[record.responsibility] < PRECEDENCE[existing.responsibility]) {
        byProvider.set(record.provider, record);
      }
    }

    return declared.flatMap((p) => {
      const record = byProvider.get(p);
      return record ? [record] : [];
    });
  }

  /** First record that fully inherits the control, if any. */
  findInherited(records: InheritanceRecord[]): InheritanceRecord | null {
    return records.find((r) => r.responsibility === 'Inherited') ?? null;
  }

  async summarize(provider: string): Promise<ProviderCoverage> {
    const [rows, totalControls] = await Promise.all([
      this.inheritanceRepo.findByProvider(provider),
      this.controlRepo.count(),
    ]);

    const strongest = new Map<string, Responsibility>();
    for (const row of rows) {
      const record = this.rowToRecord(row);
      if (!record) continue;
      const existing = strongest.get(record.controlId);
      if (!existing || PRECEDENCE[record.responsibility] < PRECEDENCE[existing]) {
        strongest.set(record.controlId, record.responsibility);
      }
    }

    const counts = { inherited: 0, shared: 0, customer: 0 };
    for (const responsibility of strongest.values()) {
      if (responsibility === 'Inherited') counts.inherited++;
      else if (responsibility === 'Shared') counts.shared++;
      else counts.customer++;
    }

    const mappedControls = strongest.size;
    const coveragePercentage =
      totalControls > 0 ? Math.round((mappedControls / totalControls) * 1000) / 10 : 0;

    return { provider, totalControls, mappedControls, coveragePercentage, ...counts };
  }

  private rowToRecord(row: InheritanceRow): InheritanceRecord | null {
    const responsibility = RESPONSIBILITY_ALIASES.get(row.responsibility.toLowerCase());
    if (!responsibility) {
      this.log.warn('inheritance.unknown_responsibility', {
        controlId: row.control_id,
        provider: row.provider_name,
        responsibility: row.responsibility,
      });
      return null;
    }
    return {
      controlId: row.control_id,
      provider: row.provider_name,
      responsibility,
      narrative: row.provider_narrative,
    };
  }
}
