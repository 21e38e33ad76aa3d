/**
 * Application error hierarchy.
 * Every error carries a stable machine-readable code and the HTTP status the
 * error handler maps it to. Pipeline errors extend the same base so they can
 * surface through the API unchanged.
 */

export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

// ── HTTP ──

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, 400, details);
  }
}

export class ConflictError extends AppError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, 409, details);
  }
}

export class RateLimitError extends AppError {
  constructor(retryAfter: number) {
    super('RATE_LIMITED', 'Rate limit exceeded', 429, { retryAfter });
  }
}

// ── Ingestion ──

/** Document text could not be obtained; the document is marked failed. */
export class ExtractionFailedError extends AppError {
  constructor(documentId: string, reason: string) {
    super(
      'EXTRACTION_FAILED',
      `Text extraction failed for document "${documentId}": ${reason}`,
      422,
      { documentId }
    );
  }
}

/** A whole embedding batch failed after retries. `indices` point into the caller's batch. */
export class EmbeddingFailedError extends AppError {
  readonly indices: number[];

  constructor(indices: number[], reason: string) {
    super('EMBEDDING_FAILED', `Embedding batch failed: ${reason}`, 502, {
      indices,
    });
    this.indices = indices;
  }
}

/**
 * Thrown by a provider when the upstream service rejects specific inputs.
 * Indices are relative to the batch the provider was given.
 */
export class EmbeddingRejectedError extends Error {
  constructor(
    readonly indices: number[],
    message: string
  ) {
    super(message);
    this.name = 'EmbeddingRejectedError';
  }
}

/** Vector length differs from the deployment's dimensionality. Fatal. */
export class DimensionMismatchError extends AppError {
  constructor(expected: number, actual: number) {
    super(
      'DIMENSION_MISMATCH',
      `Vector has ${actual} dimensions, index is configured for ${expected}`,
      500,
      { expected, actual }
    );
  }
}

// ── Analysis ──

export class ReasoningServiceUnavailableError extends AppError {
  constructor(reason: string) {
    super('REASONING_UNAVAILABLE', `Reasoning service unavailable: ${reason}`, 503);
  }
}

export class MalformedResponseError extends AppError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super('MALFORMED_RESPONSE', `Malformed reasoning response: ${reason}`, 502, details);
  }
}

export class AnalysisInProgressError extends ConflictError {
  constructor(assessmentId: string, controlId: string) {
    super(
      'ANALYSIS_IN_PROGRESS',
      `Control "${controlId}" is already being analyzed for assessment "${assessmentId}"`,
      { assessmentId, controlId }
    );
  }
}

export class InvalidReviewTransitionError extends ConflictError {
  constructor(from: string, to: string) {
    super(
      'INVALID_REVIEW_TRANSITION',
      `Cannot move a finding from "${from}" to "${to}"`,
      { from, to }
    );
  }
}

export class FindingNotFinalError extends ConflictError {
  constructor(findingId: string, reviewState: string) {
    super(
      'FINDING_NOT_FINAL',
      `Finding "${findingId}" is ${reviewState} and cannot be reported`,
      { findingId, reviewState }
    );
  }
}

// ── External calls ──

export class TimeoutError extends AppError {
  constructor(timeoutMs: number) {
    super('TIMEOUT', `Operation timed out after ${timeoutMs}ms`, 504, { timeoutMs });
  }
}

export class RetryExhaustedError extends AppError {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown
  ) {
    super(
      'RETRY_EXHAUSTED',
      `All ${attempts} attempts failed: ${errorMessage(lastError)}`,
      502,
      { attempts }
    );
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
