/**
 * Domain models — core entities as the pipeline understands them.
 * Decoupled from both API shapes and database row shapes.
 */

// ── Ingestion ──

export type DocumentStatus =
  | 'uploaded'
  | 'extracted'
  | 'chunked'
  | 'embedded'
  | 'failed';

export type AssessmentMethod = 'examine' | 'interview' | 'test';

export function toAssessmentMethod(value: string | null): AssessmentMethod | null {
  switch (value) {
    case 'examine':
    case 'interview':
    case 'test':
      return value;
    default:
      return null;
  }
}

export interface Document {
  id: string;
  assessmentId: string;
  title: string;
  documentType: string | null;
  status: DocumentStatus;
  /** Control the whole document is scoped to, if the uploader tagged one. */
  controlScope: string | null;
  method: AssessmentMethod | null;
  chunkCount: number;
  error: string | null;
}

export interface Chunk {
  /** `<documentId>:<index>` — stable across re-ingestion. */
  id: string;
  documentId: string;
  index: number;
  start: number;
  end: number;
  text: string;
  embedding: number[] | null;
  controlIds: string[];
  method: AssessmentMethod | null;
}

// ── Retrieval (never persisted) ──

export interface RetrievedChunk extends Omit<Chunk, 'embedding'> {
  documentTitle: string | null;
  embedding: number[];
}

export interface ScoredChunk {
  chunk: RetrievedChunk;
  /** 1 - cosine distance to the query vector. */
  similarity: number;
}

export interface RetrievalResult extends ScoredChunk {
  /** 1-based position in the final ordering. */
  rank: number;
}

// ── Control catalog (read-only) ──

export interface AssessmentObjective {
  id: string;
  text: string;
  method: AssessmentMethod | null;
}

export interface ControlRequirement {
  id: string;
  title: string;
  requirement: string;
  objectives: AssessmentObjective[];
  family: string;
}

export type EvidenceType =
  | 'policy'
  | 'procedure'
  | 'plan'
  | 'screenshot'
  | 'configuration'
  | 'log'
  | 'scan_result'
  | 'test_result'
  | 'interview_notes'
  | 'attestation'
  | 'diagram'
  | 'training_record'
  | 'other';

export interface EvidenceRef {
  id: string;
  title: string;
  type: EvidenceType;
  description: string | null;
  controlIds: string[];
  /** When the artefact was captured, if recorded. */
  collectedAt: Date | null;
}

// ── Inheritance ──

export type Responsibility = 'Inherited' | 'Shared' | 'Customer-responsibility';

export interface InheritanceRecord {
  controlId: string;
  provider: string;
  responsibility: Responsibility;
  /** Pre-approved narrative, usable verbatim when the control is inherited. */
  narrative: string | null;
}

// ── Assessment scope (owned by the assessment subsystem) ──

export interface AssessmentScope {
  id: string;
  /** Declared infrastructure/platform providers, e.g. "Microsoft 365 GCC High". */
  providers: string[];
  documentIds: string[];
}

// ── Findings ──

export type FindingStatus = 'Met' | 'Not Met' | 'Partially Met' | 'Not Applicable';

export const FINDING_STATUSES: readonly FindingStatus[] = [
  'Met',
  'Not Met',
  'Partially Met',
  'Not Applicable',
];

export type ReviewState =
  | 'Pending'
  | 'Auto-Accepted'
  | 'Needs-Review'
  | 'Approved'
  | 'Overridden';

export interface EvidenceContribution {
  evidenceId: string;
  /** Share of the determination attributed to this item, 0-100. */
  weight: number;
  contribution: string;
}

export interface ReviewRecord {
  reviewerId: string;
  decision: 'approve' | 'override';
  /** Status the reviewer substituted; null for approvals. */
  overrideStatus: FindingStatus | null;
  notes: string | null;
  reviewedAt: Date;
}

export type ConfidenceFactor =
  | 'evidenceQuality'
  | 'evidenceQuantity'
  | 'evidenceRecency'
  | 'providerInheritance'
  | 'aiCertainty';

export type ConfidenceFactors = Record<ConfidenceFactor, number>;

export type ConfidenceLevel = 'Very High' | 'High' | 'Medium' | 'Low' | 'Very Low';

export interface ConfidenceBreakdown {
  /** Weighted sum of the factors, 0-1. */
  score: number;
  level: ConfidenceLevel;
  factors: ConfidenceFactors;
  /** Each factor multiplied by its weight. */
  weighted: ConfidenceFactors;
  recommendations: string[];
}

/** Analyzer output before the confidence gate has routed it. */
export interface DraftFinding {
  controlId: string;
  assessmentId: string;
  status: FindingStatus;
  /** 0-100 integer. */
  confidence: number;
  /** How a model finding's confidence was derived; null for inherited and fallback findings. */
  confidenceBreakdown: ConfidenceBreakdown | null;
  narrative: string;
  evidenceContributions: EvidenceContribution[];
  gaps: string[];
  recommendations: string[];
  retrievedChunkIds: string[];
  modelUsed: string;
  reviewState: 'Pending';
}

export interface Finding extends Omit<DraftFinding, 'reviewState'> {
  id: string;
  version: number;
  previousVersionId: string | null;
  reviewState: ReviewState;
  review: ReviewRecord | null;
  createdAt: Date;
}

/** `modelUsed` value marking a finding produced without the reasoning service. */
export const FALLBACK_MODEL = 'heuristic-fallback';

/** `modelUsed` prefix for findings taken from a provider's pre-approved narrative. */
export const INHERITANCE_MODEL_PREFIX = 'inheritance:';

export function isFallbackFinding(finding: Pick<DraftFinding, 'modelUsed'>): boolean {
  return finding.modelUsed === FALLBACK_MODEL;
}
