/**
 * Analysis service.
 * Loads what one control analysis needs, runs the analyzer, routes the draft
 * through the confidence gate and stores the result as a new finding version.
 */

import type { IControlRepository } from '../repositories/IControlRepository.js';
import type { IEvidenceRepository } from '../repositories/IEvidenceRepository.js';
import type { IAssessmentRepository } from '../repositories/IAssessmentRepository.js';
import type { IDocumentRepository } from '../repositories/IDocumentRepository.js';
import type { IFindingRepository } from '../repositories/IFindingRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { EvidenceRow, FindingRow, ObjectiveRow } from '../types/database.js';
import type {
  AssessmentObjective,
  AssessmentScope,
  ControlRequirement,
  EvidenceRef,
  EvidenceType,
  Finding,
  FindingStatus,
  ReviewState,
} from '../types/models.js';
import { FINDING_STATUSES, toAssessmentMethod } from '../types/models.js';
import type { ItemOutcome } from '../types/common.js';
import type { ControlAnalyzer } from './ControlAnalyzer.js';
import { parseConfidenceBreakdown } from './ConfidenceScorer.js';
import type { ConfidenceGate, ReviewAction } from './ConfidenceGate.js';
import {
  AnalysisInProgressError,
  AppError,
  DimensionMismatchError,
  NotFoundError,
  errorMessage,
} from '../errors.js';
import { KeyedLock, runPool } from '../utils/concurrency.js';

export type ReentrancyMode = 'reject' | 'queue';

export interface AnalysisServiceDeps {
  controlRepo: IControlRepository;
  evidenceRepo: IEvidenceRepository;
  assessmentRepo: IAssessmentRepository;
  documentRepo: IDocumentRepository;
  findingRepo: IFindingRepository;
  analyzer: ControlAnalyzer;
  gate: ConfidenceGate;
  log: ILogProvider;
}

export interface AnalysisServiceOptions {
  /** What a second analysis of a control already in progress does. Default: 'reject'. */
  reentrancy?: ReentrancyMode;
  /** Controls analysed at once in a batch. Default: 4. */
  concurrency?: number;
}

export interface AnalyzeControlOptions {
  includeRetrieval?: boolean;
  signal?: AbortSignal;
}

export interface AnalyzeAssessmentOptions extends AnalyzeControlOptions {
  /** Defaults to every control in the catalog. */
  controlIds?: string[];
}

export interface BatchAnalysisResult {
  results: ItemOutcome<Finding>[];
  completed: number;
  failed: number;
  cancelled: number;
}

const EVIDENCE_TYPES: readonly EvidenceType[] = [
  'policy',
  'procedure',
  'plan',
  'screenshot',
  'configuration',
  'log',
  'scan_result',
  'test_result',
  'interview_notes',
  'attestation',
  'diagram',
  'training_record',
  'other',
];

const REVIEW_STATES: readonly ReviewState[] = [
  'Pending',
  'Auto-Accepted',
  'Needs-Review',
  'Approved',
  'Overridden',
];

export class AnalysisService {
  private readonly locks = new KeyedLock();
  private readonly reentrancy: ReentrancyMode;
  private readonly concurrency: number;

  constructor(
    private readonly deps: AnalysisServiceDeps,
    options: AnalysisServiceOptions = {}
  ) {
    this.reentrancy = options.reentrancy ?? 'reject';
    this.concurrency = options.concurrency ?? 4;
  }

  /** Analyse one control and store the gated result as the next version. */
  async analyzeControl(
    assessmentId: string,
    controlId: string,
    options: AnalyzeControlOptions = {}
  ): Promise<Finding> {
    const key = `${assessmentId}:${controlId}`;
    const release =
      this.reentrancy === 'queue'
        ? await this.locks.acquire(key)
        : this.locks.tryAcquire(key);
    if (!release) {
      throw new AnalysisInProgressError(assessmentId, controlId);
    }

    try {
      const [control, evidence, assessment] = await Promise.all([
        this.loadControl(controlId),
        this.loadEvidence(assessmentId, controlId),
        this.loadScope(assessmentId),
      ]);

      const draft = await this.deps.analyzer.analyze({
        control,
        evidence,
        assessment,
        includeRetrieval: options.includeRetrieval,
        signal: options.signal,
      });
      const gated = this.deps.gate.evaluate(draft);

      const previous = await this.deps.findingRepo.findLatest(assessmentId, controlId);
      const row = await this.deps.findingRepo.insert({
        assessment_id: assessmentId,
        control_id: controlId,
        version: previous ? previous.version + 1 : 1,
        previous_version_id: previous?.id ?? null,
        status: gated.status,
        confidence: gated.confidence,
        confidence_breakdown: gated.confidenceBreakdown,
        narrative: gated.narrative,
        evidence_contributions: gated.evidenceContributions.map((c) => ({
          evidence_id: c.evidenceId,
          weight: c.weight,
          contribution: c.contribution,
        })),
        gaps: gated.gaps,
        recommendations: gated.recommendations,
        retrieved_chunk_ids: gated.retrievedChunkIds,
        model_used: gated.modelUsed,
        review_state: gated.reviewState,
        reviewer_id: null,
        review_decision: null,
        override_status: null,
        review_notes: null,
        reviewed_at: null,
      });

      return this.rowToFinding(row);
    } finally {
      release();
    }
  }

  /**
   * Analyse many controls concurrently. Stops starting new controls once the
   * signal aborts; those are reported as cancelled.
   */
  async analyzeAssessment(
    assessmentId: string,
    options: AnalyzeAssessmentOptions = {}
  ): Promise<BatchAnalysisResult> {
    await this.loadScope(assessmentId);
    const controlIds = [
      ...new Set(options.controlIds ?? (await this.deps.controlRepo.listIds())),
    ];
    const results: ItemOutcome<Finding>[] = controlIds.map((id) => ({
      id,
      status: 'cancelled',
    }));

    await runPool(
      controlIds,
      this.concurrency,
      async (controlId, i) => {
        try {
          const finding = await this.analyzeControl(assessmentId, controlId, options);
          results[i] = { id: controlId, status: 'succeeded', result: finding };
        } catch (err) {
          if (err instanceof DimensionMismatchError) throw err;
          if (options.signal?.aborted) return;
          this.deps.log.warn('analysis.control_failed', {
            assessmentId,
            controlId,
            error: errorMessage(err),
          });
          results[i] = {
            id: controlId,
            status: 'failed',
            error: {
              code: err instanceof AppError ? err.code : 'ANALYSIS_FAILED',
              message: errorMessage(err),
            },
          };
        }
      },
      { signal: options.signal }
    );

    const summary: BatchAnalysisResult = {
      results,
      completed: results.filter((r) => r.status === 'succeeded').length,
      failed: results.filter((r) => r.status === 'failed').length,
      cancelled: results.filter((r) => r.status === 'cancelled').length,
    };
    this.deps.log.info('analysis.batch_completed', {
      assessmentId,
      controls: controlIds.length,
      completed: summary.completed,
      failed: summary.failed,
      cancelled: summary.cancelled,
    });
    return summary;
  }

  /** Apply a reviewer's decision to a finding awaiting review. */
  async review(findingId: string, action: ReviewAction): Promise<Finding> {
    const finding = await this.getFinding(findingId);
    const reviewed = this.deps.gate.applyReview(finding, action);
    const review = reviewed.review;

    const row = await this.deps.findingRepo.updateReview(findingId, {
      review_state: reviewed.reviewState,
      reviewer_id: review?.reviewerId ?? null,
      review_decision: review?.decision ?? null,
      override_status: review?.overrideStatus ?? null,
      review_notes: review?.notes ?? null,
      reviewed_at: review?.reviewedAt.toISOString() ?? null,
    });
    return this.rowToFinding(row);
  }

  async getFinding(findingId: string): Promise<Finding> {
    const row = await this.deps.findingRepo.findById(findingId);
    if (!row) throw new NotFoundError(`Finding "${findingId}" not found`);
    return this.rowToFinding(row);
  }

  /** Every version for a control, newest first. */
  async getHistory(assessmentId: string, controlId: string): Promise<Finding[]> {
    const rows = await this.deps.findingRepo.findHistory(assessmentId, controlId);
    return rows.map((row) => this.rowToFinding(row));
  }

  private async loadControl(controlId: string): Promise<ControlRequirement> {
    const [row, objectives] = await Promise.all([
      this.deps.controlRepo.findById(controlId),
      this.deps.controlRepo.findObjectives(controlId),
    ]);
    if (!row) throw new NotFoundError(`Control "${controlId}" not found`);

    return {
      id: row.id,
      title: row.title,
      requirement: row.requirement_text,
      family: row.family,
      objectives: objectives.map((o) => this.rowToObjective(o)),
    };
  }

  private async loadEvidence(assessmentId: string, controlId: string): Promise<EvidenceRef[]> {
    const rows = await this.deps.evidenceRepo.findForControl(assessmentId, controlId);
    return rows.map((row) => this.rowToEvidence(row));
  }

  private async loadScope(assessmentId: string): Promise<AssessmentScope> {
    const [row, documentIds] = await Promise.all([
      this.deps.assessmentRepo.findById(assessmentId),
      this.deps.documentRepo.findEmbeddedIds(assessmentId),
    ]);
    if (!row) throw new NotFoundError(`Assessment "${assessmentId}" not found`);
    return { id: row.id, providers: row.providers, documentIds };
  }

  private rowToObjective(row: ObjectiveRow): AssessmentObjective {
    return { id: row.id, text: row.objective_text, method: toAssessmentMethod(row.method) };
  }

  private rowToEvidence(row: EvidenceRow): EvidenceRef {
    const type = EVIDENCE_TYPES.find((t) => t === row.evidence_type) ?? 'other';
    return {
      id: row.id,
      title: row.title,
      type,
      description: row.description,
      controlIds: row.control_ids,
      collectedAt: row.collected_at ? new Date(row.collected_at) : null,
    };
  }

  private rowToFinding(row: FindingRow): Finding {
    const reviewState = REVIEW_STATES.find((s) => s === row.review_state) ?? 'Needs-Review';

    return {
      id: row.id,
      version: row.version,
      previousVersionId: row.previous_version_id,
      assessmentId: row.assessment_id,
      controlId: row.control_id,
      status: toStatus(row.status) ?? 'Not Met',
      confidence: row.confidence,
      confidenceBreakdown: parseConfidenceBreakdown(row.confidence_breakdown),
      narrative: row.narrative,
      evidenceContributions: row.evidence_contributions.map((c) => ({
        evidenceId: c.evidence_id,
        weight: c.weight,
        contribution: c.contribution,
      })),
      gaps: row.gaps,
      recommendations: row.recommendations,
      retrievedChunkIds: row.retrieved_chunk_ids,
      modelUsed: row.model_used,
      reviewState,
      review:
        row.reviewer_id && row.reviewed_at
          ? {
              reviewerId: row.reviewer_id,
              decision: row.review_decision === 'override' ? 'override' : 'approve',
              overrideStatus: toStatus(row.override_status),
              notes: row.review_notes,
              reviewedAt: new Date(row.reviewed_at),
            }
          : null,
      createdAt: new Date(row.created_at),
    };
  }
}

function toStatus(value: string | null): FindingStatus | null {
  return FINDING_STATUSES.find((s) => s === value) ?? null;
}
