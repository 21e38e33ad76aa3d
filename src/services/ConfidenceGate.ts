/**
 * Confidence gate.
 * Routes draft findings to automatic acceptance or human review and owns
 * every later review transition.
 *
 *   Pending      -> Auto-Accepted | Needs-Review   (evaluate)
 *   Needs-Review -> Approved | Overridden          (applyReview)
 *
 * Auto-Accepted, Approved and Overridden are terminal.
 */

import type { ILogProvider } from '../providers/ILogProvider.js';
import type {
  DraftFinding,
  Finding,
  FindingStatus,
  ReviewRecord,
  ReviewState,
} from '../types/models.js';
import { isFallbackFinding } from '../types/models.js';
import { FindingNotFinalError, InvalidReviewTransitionError } from '../errors.js';

export type ReviewAction =
  | { decision: 'approve'; reviewerId: string; notes?: string }
  | { decision: 'override'; reviewerId: string; status: FindingStatus; notes?: string };

export type GatedFinding = Omit<DraftFinding, 'reviewState'> & {
  reviewState: 'Auto-Accepted' | 'Needs-Review';
};

const TRANSITIONS: Record<ReviewState, readonly ReviewState[]> = {
  Pending: ['Auto-Accepted', 'Needs-Review'],
  'Needs-Review': ['Approved', 'Overridden'],
  'Auto-Accepted': [],
  Approved: [],
  Overridden: [],
};

const FINAL_STATES: readonly ReviewState[] = ['Auto-Accepted', 'Approved'];

export function canTransition(from: ReviewState, to: ReviewState): boolean {
  return TRANSITIONS[from].includes(to);
}

export class ConfidenceGate {
  constructor(
    private readonly log: ILogProvider,
    readonly threshold = 80
  ) {}

  /** Route a freshly analysed draft. */
  evaluate(draft: DraftFinding): GatedFinding {
    const fallback = isFallbackFinding(draft);
    const reviewState: GatedFinding['reviewState'] =
      !fallback && draft.confidence >= this.threshold ? 'Auto-Accepted' : 'Needs-Review';

    this.log.info('gate.routed', {
      controlId: draft.controlId,
      assessmentId: draft.assessmentId,
      confidence: draft.confidence,
      threshold: this.threshold,
      fallback,
      reviewState,
    });
    return { ...draft, reviewState };
  }

  /** Apply a human decision to a finding awaiting review. */
  applyReview(finding: Finding, action: ReviewAction, now = new Date()): Finding {
    const to: ReviewState = action.decision === 'approve' ? 'Approved' : 'Overridden';
    if (!canTransition(finding.reviewState, to)) {
      throw new InvalidReviewTransitionError(finding.reviewState, to);
    }

    const review: ReviewRecord = {
      reviewerId: action.reviewerId,
      decision: action.decision,
      overrideStatus: action.decision === 'override' ? action.status : null,
      notes: action.notes ?? null,
      reviewedAt: now,
    };

    this.log.info('gate.reviewed', {
      findingId: finding.id,
      controlId: finding.controlId,
      from: finding.reviewState,
      to,
      reviewerId: action.reviewerId,
    });
    return { ...finding, reviewState: to, review };
  }

  isFinal(finding: Pick<Finding, 'reviewState'>): boolean {
    return FINAL_STATES.includes(finding.reviewState);
  }

  /** Throws FindingNotFinalError unless the finding may be reported. */
  assertFinal(finding: Pick<Finding, 'id' | 'reviewState'>): void {
    if (!this.isFinal(finding)) {
      throw new FindingNotFinalError(finding.id, finding.reviewState);
    }
  }

  reportable<T extends Pick<Finding, 'reviewState'>>(findings: T[]): T[] {
    return findings.filter((f) => this.isFinal(f));
  }
}
