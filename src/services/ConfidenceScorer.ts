/**
 * Confidence scorer.
 * Blends five evidence factors, each on a 0-1 scale, into the confidence a
 * model finding carries, and explains which factors held it back.
 *
 *   evidenceQuality      0.40   relevance and directness of the evidence
 *   evidenceQuantity     0.20   items available per assessment objective
 *   evidenceRecency      0.15   age of the newest evidence item
 *   providerInheritance  0.15   strongest provider responsibility
 *   aiCertainty          0.10   confidence the model reported
 */

import type {
  ConfidenceBreakdown,
  ConfidenceFactor,
  ConfidenceFactors,
  ConfidenceLevel,
  EvidenceRef,
  EvidenceType,
  InheritanceRecord,
  Responsibility,
  RetrievalResult,
} from '../types/models.js';
import { z } from 'zod';
import { ValidationError } from '../errors.js';

export const CONFIDENCE_FACTORS: readonly ConfidenceFactor[] = [
  'evidenceQuality',
  'evidenceQuantity',
  'evidenceRecency',
  'providerInheritance',
  'aiCertainty',
];

export const DEFAULT_CONFIDENCE_WEIGHTS: ConfidenceFactors = {
  evidenceQuality: 0.4,
  evidenceQuantity: 0.2,
  evidenceRecency: 0.15,
  providerInheritance: 0.15,
  aiCertainty: 0.1,
};

const factorsSchema = z.object({
  evidenceQuality: z.number(),
  evidenceQuantity: z.number(),
  evidenceRecency: z.number(),
  providerInheritance: z.number(),
  aiCertainty: z.number(),
});

const breakdownSchema = z.object({
  score: z.number().min(0).max(1),
  level: z.enum(['Very High', 'High', 'Medium', 'Low', 'Very Low']),
  factors: factorsSchema,
  weighted: factorsSchema,
  recommendations: z.array(z.string()),
});

/** Read a stored breakdown back; anything unrecognised reads as null. */
export function parseConfidenceBreakdown(value: unknown): ConfidenceBreakdown | null {
  const parsed = breakdownSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export interface ScoringInput {
  evidence: EvidenceRef[];
  objectiveCount: number;
  retrieved: RetrievalResult[];
  records: InheritanceRecord[];
  /** Confidence the model reported, 0-100. */
  modelConfidence: number;
}

const DIRECT_EVIDENCE: ReadonlySet<EvidenceType> = new Set<EvidenceType>([
  'screenshot',
  'configuration',
  'test_result',
  'scan_result',
  'log',
]);

const RECOMMENDATIONS: Record<ConfidenceFactor, string> = {
  evidenceQuality:
    'Obtain more direct evidence (e.g., screenshots, configuration exports, test results)',
  evidenceQuantity: 'Gather additional evidence from multiple sources to corroborate findings',
  evidenceRecency: 'Update evidence to reflect current state (evidence may be outdated)',
  providerInheritance: 'Clarify provider inheritance responsibilities with documentation',
  aiCertainty: 'AI analysis is uncertain - recommend manual assessor review',
};

const RESPONSIBILITY_SCORE: Record<Responsibility, number> = {
  Inherited: 1,
  Shared: 0.7,
  'Customer-responsibility': 0.5,
};

const WELL_SUPPORTED = 'Confidence is high - finding is well-supported by evidence';

/** Factors below this value produce a recommendation. */
const WEAK_FACTOR = 0.6;
/** Used wherever a factor has nothing to measure. */
const NEUTRAL = 0.5;
const MAX_AGE_DAYS = 180;
const DAY_MS = 86_400_000;

export function confidenceLevel(score: number): ConfidenceLevel {
  if (score >= 0.9) return 'Very High';
  if (score >= 0.75) return 'High';
  if (score >= 0.6) return 'Medium';
  if (score >= 0.4) return 'Low';
  return 'Very Low';
}

export class ConfidenceScorer {
  readonly weights: ConfidenceFactors;

  constructor(
    weights: Partial<ConfidenceFactors> = {},
    private readonly now: () => Date = () => new Date()
  ) {
    this.weights = { ...DEFAULT_CONFIDENCE_WEIGHTS, ...weights };

    const negative = CONFIDENCE_FACTORS.filter((f) => !(this.weights[f] >= 0));
    if (negative.length > 0) {
      throw new ValidationError(`Confidence weights must be non-negative: ${negative.join(', ')}`);
    }
    const total = CONFIDENCE_FACTORS.reduce((sum, f) => sum + this.weights[f], 0);
    if (Math.abs(total - 1) > 0.01) {
      throw new ValidationError(`Confidence weights must sum to 1, got ${total.toFixed(2)}`, {
        weights: this.weights,
      });
    }
  }

  score(input: ScoringInput): ConfidenceBreakdown {
    return this.combine({
      evidenceQuality: this.assessQuality(input.evidence, input.retrieved),
      evidenceQuantity: this.assessQuantity(input.evidence.length, input.objectiveCount),
      evidenceRecency: this.assessRecency(input.evidence),
      providerInheritance: this.assessInheritance(input.records),
      aiCertainty: input.modelConfidence / 100,
    });
  }

  /** Weight already-measured factors. Values outside 0-1 are clamped. */
  combine(raw: ConfidenceFactors): ConfidenceBreakdown {
    const factors = { ...raw };
    const weighted = { ...raw };
    let total = 0;

    for (const f of CONFIDENCE_FACTORS) {
      factors[f] = clamp(raw[f]);
      weighted[f] = factors[f] * this.weights[f];
      total += weighted[f];
    }

    const score = clamp(total);
    const weak = CONFIDENCE_FACTORS.filter((f) => factors[f] < WEAK_FACTOR);

    return {
      score,
      level: confidenceLevel(score),
      factors,
      weighted,
      recommendations: weak.length > 0 ? weak.map((f) => RECOMMENDATIONS[f]) : [WELL_SUPPORTED],
    };
  }

  /**
   * Mean excerpt similarity, raised for direct evidence and for a mix of
   * evidence types. A single item keeps 70% of that; no items scores 0.
   */
  assessQuality(evidence: EvidenceRef[], retrieved: RetrievalResult[]): number {
    if (evidence.length === 0) return 0;

    let quality =
      retrieved.length > 0
        ? clamp(retrieved.reduce((sum, r) => sum + r.similarity, 0) / retrieved.length)
        : NEUTRAL;

    if (evidence.some((e) => DIRECT_EVIDENCE.has(e.type))) {
      quality = Math.min(quality + 0.1, 1);
    }
    const types = new Set(evidence.map((e) => e.type)).size;
    quality = Math.min(quality + Math.min((types - 1) * 0.05, 0.15), 1);

    return evidence.length === 1 ? quality * 0.7 : quality;
  }

  /** Two items per objective scores 1; one per objective scores 0.7. */
  assessQuantity(count: number, objectiveCount: number): number {
    const objectives = Math.max(objectiveCount, 1);
    if (count >= objectives * 2) return 1;
    if (count >= objectives) return 0.7 + ((count - objectives) / objectives) * 0.3;
    if (count > 0) return 0.4 + (count / objectives) * 0.3;
    return 0;
  }

  /**
   * Full marks within 30 days, 0.9 within 90, then linear to 0.5 at 180
   * days and exponential decay after that, never below 0.1.
   */
  assessRecency(evidence: EvidenceRef[]): number {
    const dates = evidence.flatMap((e) => (e.collectedAt ? [e.collectedAt.getTime()] : []));
    if (dates.length === 0) return NEUTRAL;

    const ageDays = Math.floor((this.now().getTime() - Math.max(...dates)) / DAY_MS);
    if (ageDays <= 30) return 1;
    if (ageDays <= 90) return 0.9;
    if (ageDays <= MAX_AGE_DAYS) return 0.9 - ((ageDays - 90) / (MAX_AGE_DAYS - 90)) * 0.4;
    return Math.max(0.5 * 0.95 ** ((ageDays - MAX_AGE_DAYS) / 30), 0.1);
  }

  /** Scores the strongest responsibility among the declared providers. */
  assessInheritance(records: InheritanceRecord[]): number {
    let best = records.length > 0 ? 0 : NEUTRAL;
    for (const record of records) {
      const documented = record.responsibility === 'Shared' && record.narrative ? 0.1 : 0;
      best = Math.max(best, RESPONSIBILITY_SCORE[record.responsibility] + documented);
    }
    return best;
  }
}

function clamp(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(Math.max(value, 0), 1);
}
