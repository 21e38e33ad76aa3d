/**
 * Database row types — mirror actual Supabase table schemas.
 * Kept separate so the database can evolve independently of domain models.
 * Column names use snake_case to match PostgreSQL conventions.
 */

// ── Ingestion Tables ──

export interface DocumentRow {
  id: string;
  assessment_id: string;
  title: string;
  document_type: string | null;
  status: string;
  control_scope: string | null;
  method: string | null;
  chunk_count: number;
  error: string | null;
  extracted_text: string | null;
  created_at: string;
  updated_at: string;
}

export interface ChunkRow {
  id: string;
  document_id: string;
  chunk_index: number;
  start_char: number;
  end_char: number;
  chunk_text: string;
  control_ids: string[];
  method: string | null;
  embedding: string; // pgvector serialized
}

export interface ScoredChunkRow extends ChunkRow {
  document_title: string | null;
  similarity: number;
}

// ── Catalog Tables (read-only) ──

export interface ControlRow {
  id: string;
  title: string;
  requirement_text: string;
  family: string;
}

export interface ObjectiveRow {
  id: string;
  control_id: string;
  objective_text: string;
  method: string | null;
}

export interface EvidenceRow {
  id: string;
  assessment_id: string;
  title: string;
  evidence_type: string;
  description: string | null;
  control_ids: string[];
  collected_at: string | null;
}

export interface AssessmentRow {
  id: string;
  providers: string[];
}

export interface InheritanceRow {
  control_id: string;
  provider_name: string;
  responsibility: string;
  provider_narrative: string | null;
}

// ── Findings ──

export interface FindingRow {
  id: string;
  assessment_id: string;
  control_id: string;
  version: number;
  previous_version_id: string | null;
  status: string;
  confidence: number;
  confidence_breakdown: unknown; // jsonb, validated on read
  narrative: string;
  evidence_contributions: Array<{
    evidence_id: string;
    weight: number;
    contribution: string;
  }>;
  gaps: string[];
  recommendations: string[];
  retrieved_chunk_ids: string[];
  model_used: string;
  review_state: string;
  reviewer_id: string | null;
  review_decision: string | null;
  override_status: string | null;
  review_notes: string | null;
  reviewed_at: string | null;
  created_at: string;
}

// ── Rate Limiting ──

export interface RateLimitRow {
  key: string;
  window_key: string;
  count: number;
}
