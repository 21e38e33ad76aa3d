/**
 * Control analyzer.
 * Produces a draft finding for one control: inherited controls are settled
 * from the provider's narrative, everything else goes to the reasoning
 * service with retrieved excerpts, falling back to a deterministic heuristic
 * when no usable response comes back.
 */

import type { IReasoningProvider, ReasoningRequest } from '../providers/IReasoningProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type {
  AssessmentMethod,
  AssessmentScope,
  ControlRequirement,
  DraftFinding,
  EvidenceContribution,
  EvidenceRef,
  EvidenceType,
  InheritanceRecord,
  RetrievalResult,
} from '../types/models.js';
import { FALLBACK_MODEL, INHERITANCE_MODEL_PREFIX } from '../types/models.js';
import type { RetrievalEngine } from './RetrievalEngine.js';
import { formatContext } from './RetrievalEngine.js';
import type { InheritanceResolver } from './InheritanceResolver.js';
import { ConfidenceScorer } from './ConfidenceScorer.js';
import {
  buildAnalysisRequest,
  controlMethods,
  parseAnalysisResponse,
  renderPrompt,
  withRepairReminder,
  type AnalysisResponse,
} from './analysis-prompt.js';
import {
  DimensionMismatchError,
  MalformedResponseError,
  ReasoningServiceUnavailableError,
  RetryExhaustedError,
  errorMessage,
} from '../errors.js';
import { withRetry, withTimeout, type RetryPolicy } from '../utils/retry.js';

export interface AnalyzeInput {
  control: ControlRequirement;
  evidence: EvidenceRef[];
  assessment: AssessmentScope;
  includeRetrieval?: boolean;
  signal?: AbortSignal;
}

export interface ControlAnalyzerOptions {
  /** Confidence given to inherited controls. Default: 95. */
  inheritedConfidence?: number;
  /** Confidence ceiling when there are no evidence items. Default: 30. */
  noEvidenceCeiling?: number;
  /** Per-call deadline for the reasoning service. Default: 60_000. */
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  /** Excerpts requested per control. Default: the engine's topK. */
  retrievalTopK?: number;
  /** Character budget for rendered excerpts. Default: 12_000. */
  contextChars?: number;
  /** Derives model findings' confidence. Default: the standard weights. */
  scorer?: ConfidenceScorer;
}

/** Evidence types an assessor expects to see for each assessment method. */
export const EXPECTED_EVIDENCE: Record<AssessmentMethod, readonly EvidenceType[]> = {
  examine: [
    'policy',
    'procedure',
    'plan',
    'configuration',
    'screenshot',
    'log',
    'diagram',
    'training_record',
  ],
  interview: ['interview_notes', 'attestation'],
  test: ['test_result', 'scan_result', 'screenshot', 'log'],
};

const FALLBACK_CONFIDENCE = { met: 40, notMet: 35, noEvidence: 20 };

export class ControlAnalyzer {
  private readonly inheritedConfidence: number;
  private readonly noEvidenceCeiling: number;
  private readonly timeoutMs: number;
  private readonly retry: Partial<RetryPolicy>;
  private readonly retrievalTopK: number | undefined;
  private readonly contextChars: number;
  private readonly scorer: ConfidenceScorer;

  constructor(
    private readonly reasoner: IReasoningProvider,
    private readonly retrieval: RetrievalEngine,
    private readonly inheritance: InheritanceResolver,
    private readonly log: ILogProvider,
    options: ControlAnalyzerOptions = {}
  ) {
    this.inheritedConfidence = options.inheritedConfidence ?? 95;
    this.noEvidenceCeiling = options.noEvidenceCeiling ?? 30;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.retry = options.retry ?? {};
    this.retrievalTopK = options.retrievalTopK;
    this.contextChars = options.contextChars ?? 12_000;
    this.scorer = options.scorer ?? new ConfidenceScorer();
  }

  async analyze(input: AnalyzeInput): Promise<DraftFinding> {
    const { control, evidence, assessment, signal } = input;
    const started = Date.now();

    const records = await this.inheritance.resolve(control.id, assessment.providers);
    const inherited = this.inheritance.findInherited(records);
    if (inherited) {
      this.log.info('analysis.inherited', {
        controlId: control.id,
        assessmentId: assessment.id,
        provider: inherited.provider,
      });
      return this.inheritedFinding(control, assessment, inherited);
    }

    const retrieved =
      input.includeRetrieval === false
        ? []
        : await this.retrieveContext(control, assessment, signal);

    const request = buildAnalysisRequest(
      control,
      evidence,
      formatContext(retrieved, this.contextChars),
      records
    );
    const response = await this.reason(renderPrompt(request), control.id, signal);

    const draft = response
      ? this.modelFinding(control, assessment, evidence, retrieved, records, response)
      : this.fallbackFinding(control, assessment, evidence, retrieved);

    this.log.info('analysis.completed', {
      controlId: control.id,
      assessmentId: assessment.id,
      status: draft.status,
      confidence: draft.confidence,
      confidenceLevel: draft.confidenceBreakdown?.level ?? null,
      confidenceFactors: draft.confidenceBreakdown?.factors ?? null,
      modelUsed: draft.modelUsed,
      evidenceItems: evidence.length,
      excerpts: retrieved.length,
      durationMs: Date.now() - started,
    });
    return draft;
  }

  private inheritedFinding(
    control: ControlRequirement,
    assessment: AssessmentScope,
    record: InheritanceRecord
  ): DraftFinding {
    return {
      controlId: control.id,
      assessmentId: assessment.id,
      status: 'Met',
      confidence: this.inheritedConfidence,
      confidenceBreakdown: null,
      narrative:
        record.narrative ??
        `${control.id} is fully inherited from ${record.provider}, which implements and maintains it for this environment.`,
      evidenceContributions: [],
      gaps: [],
      recommendations: [],
      retrievedChunkIds: [],
      modelUsed: `${INHERITANCE_MODEL_PREFIX}${record.provider}`,
      reviewState: 'Pending',
    };
  }

  private async retrieveContext(
    control: ControlRequirement,
    assessment: AssessmentScope,
    signal?: AbortSignal
  ): Promise<RetrievalResult[]> {
    const query = [control.requirement, ...control.objectives.map((o) => o.text)].join('\n');
    try {
      return await this.retrieval.retrieve(
        {
          query,
          controlId: control.id,
          documentIds: assessment.documentIds,
          topK: this.retrievalTopK,
        },
        { signal }
      );
    } catch (err) {
      if (err instanceof DimensionMismatchError || signal?.aborted) throw err;
      this.log.warn('analysis.retrieval_failed', {
        controlId: control.id,
        error: errorMessage(err),
      });
      return [];
    }
  }

  /** A validated response, or null when the fallback should be used. */
  private async reason(
    prompt: ReasoningRequest,
    controlId: string,
    signal?: AbortSignal
  ): Promise<AnalysisResponse | null> {
    let current = prompt;

    for (let attempt = 1; attempt <= 2; attempt++) {
      let text: string;
      try {
        text = await this.callReasoner(current, signal);
      } catch (err) {
        if (err instanceof ReasoningServiceUnavailableError) {
          this.log.warn('analysis.reasoning_unavailable', {
            controlId,
            error: err.message,
          });
          return null;
        }
        throw err;
      }

      try {
        return parseAnalysisResponse(text);
      } catch (err) {
        if (!(err instanceof MalformedResponseError)) throw err;
        this.log.warn('analysis.malformed_response', {
          controlId,
          attempt,
          error: err.message,
        });
        current = withRepairReminder(prompt, err.message);
      }
    }

    return null;
  }

  private async callReasoner(
    request: ReasoningRequest,
    signal?: AbortSignal
  ): Promise<string> {
    try {
      return await withRetry(
        () =>
          withTimeout(
            (callSignal) => this.reasoner.complete(request, { signal: callSignal }),
            this.timeoutMs,
            signal
          ),
        {
          ...this.retry,
          signal,
          onRetry: (err, attempt, delayMs) => {
            this.log.warn('analysis.retry', {
              attempt: attempt + 1,
              delayMs,
              error: errorMessage(err),
            });
          },
        }
      );
    } catch (err) {
      // A cancelled analysis must not turn into a fallback finding
      signal?.throwIfAborted();
      if (err instanceof RetryExhaustedError) {
        throw new ReasoningServiceUnavailableError(errorMessage(err.lastError));
      }
      throw err;
    }
  }

  private modelFinding(
    control: ControlRequirement,
    assessment: AssessmentScope,
    evidence: EvidenceRef[],
    retrieved: RetrievalResult[],
    records: InheritanceRecord[],
    response: AnalysisResponse
  ): DraftFinding {
    const known = new Set(evidence.map((e) => e.id));
    const contributions: EvidenceContribution[] = [];
    const unknown: string[] = [];

    for (const [evidenceId, entry] of Object.entries(response.evidence_analysis)) {
      if (known.has(evidenceId)) {
        contributions.push({ evidenceId, weight: entry.weight, contribution: entry.contribution });
      } else {
        unknown.push(evidenceId);
      }
    }
    if (unknown.length > 0) {
      this.log.debug('analysis.unknown_evidence', { controlId: control.id, evidenceIds: unknown });
    }

    const breakdown = this.scorer.score({
      evidence,
      objectiveCount: control.objectives.length,
      retrieved,
      records,
      modelConfidence: response.confidence,
    });
    let status = response.determination;
    let confidence = Math.round(breakdown.score * 100);

    // Evidence metadata alone never scores above the model's own confidence
    if (retrieved.length === 0) {
      confidence = Math.min(confidence, Math.round(response.confidence));
    }

    if (evidence.length === 0) {
      confidence = Math.min(confidence, this.noEvidenceCeiling);
      if (status === 'Met' || status === 'Partially Met') status = 'Not Met';
    }

    return {
      controlId: control.id,
      assessmentId: assessment.id,
      status,
      confidence,
      confidenceBreakdown: breakdown,
      narrative: response.narrative,
      evidenceContributions: contributions,
      gaps: response.gaps_identified,
      recommendations: response.recommendations,
      retrievedChunkIds: retrieved.map((r) => r.chunk.id),
      modelUsed: this.reasoner.model,
      reviewState: 'Pending',
    };
  }

  /** Deterministic determination from evidence types alone. */
  private fallbackFinding(
    control: ControlRequirement,
    assessment: AssessmentScope,
    evidence: EvidenceRef[],
    retrieved: RetrievalResult[]
  ): DraftFinding {
    const methods = controlMethods(control);
    const expected = new Set(methods.flatMap((m) => EXPECTED_EVIDENCE[m]));
    const matching = evidence.filter((e) => expected.has(e.type));
    const met = matching.length > 0;

    const confidence =
      evidence.length === 0
        ? FALLBACK_CONFIDENCE.noEvidence
        : met
          ? FALLBACK_CONFIDENCE.met
          : FALLBACK_CONFIDENCE.notMet;

    const weight = matching.length > 0 ? Math.floor(100 / matching.length) : 0;
    const methodList = methods.join('/');

    return {
      controlId: control.id,
      assessmentId: assessment.id,
      status: met ? 'Met' : 'Not Met',
      confidence,
      confidenceBreakdown: null,
      narrative:
        `Automated analysis was unavailable for ${control.id}. ` +
        `${matching.length} of ${evidence.length} evidence items are of a type expected for ${methodList} assessment. ` +
        'This determination requires reviewer confirmation.',
      evidenceContributions: matching.map((e) => ({
        evidenceId: e.id,
        weight,
        contribution: `${e.type} evidence is expected for ${methodList} assessment`,
      })),
      gaps: met ? [] : [`No evidence of a type expected for ${methodList} assessment`],
      recommendations: ['Re-run the analysis once the reasoning service is available'],
      retrievedChunkIds: retrieved.map((r) => r.chunk.id),
      modelUsed: FALLBACK_MODEL,
      reviewState: 'Pending',
    };
  }
}
