/**
 * Ingestion service.
 * Moves documents through uploaded -> extracted -> chunked -> embedded,
 * storing each transition. Documents are processed by a bounded worker pool;
 * the stages of one document run in order.
 */

import type { IDocumentRepository } from '../repositories/IDocumentRepository.js';
import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { DocumentRow } from '../types/database.js';
import type { DocumentStatus } from '../types/models.js';
import { toAssessmentMethod } from '../types/models.js';
import type { ItemOutcome } from '../types/common.js';
import type { Chunker } from './Chunker.js';
import type { VectorEntry, VectorIndex } from './VectorIndex.js';
import {
  AppError,
  DimensionMismatchError,
  ExtractionFailedError,
  errorMessage,
} from '../errors.js';
import { runPool } from '../utils/concurrency.js';

export interface IngestSummary {
  results: ItemOutcome<{ chunkCount: number }>[];
  succeeded: number;
  failed: number;
  skipped: number;
}

export interface IngestionServiceOptions {
  /** Documents processed at once. Default: 4. */
  concurrency?: number;
}

const STATUS_ORDER: Record<DocumentStatus, number> = {
  uploaded: 0,
  extracted: 1,
  chunked: 2,
  embedded: 3,
  failed: -1,
};

export class IngestionService {
  private readonly concurrency: number;

  constructor(
    private readonly documentRepo: IDocumentRepository,
    private readonly chunker: Chunker,
    private readonly embedder: IEmbeddingProvider,
    private readonly index: VectorIndex,
    private readonly log: ILogProvider,
    options: IngestionServiceOptions = {}
  ) {
    this.concurrency = options.concurrency ?? 4;
  }

  /**
   * Ingest documents by id. Per-document failures are reported in the
   * summary; DimensionMismatchError stops the run and is rethrown.
   */
  async ingest(
    documentIds: string[],
    options?: { signal?: AbortSignal }
  ): Promise<IngestSummary> {
    const ids = [...new Set(documentIds)];
    const results: ItemOutcome<{ chunkCount: number }>[] = ids.map((id) => ({
      id,
      status: 'cancelled',
    }));

    try {
      await this.index.verifyStore();
      await runPool(
        ids,
        this.concurrency,
        async (id, i) => {
          results[i] = await this.ingestOne(id, options?.signal);
        },
        { signal: options?.signal }
      );
    } catch (err) {
      this.log.error('ingest.aborted', { error: errorMessage(err) });
      throw err;
    }

    const summary: IngestSummary = {
      results,
      succeeded: results.filter((r) => r.status === 'succeeded').length,
      failed: results.filter((r) => r.status === 'failed').length,
      skipped: results.filter((r) => r.status === 'skipped').length,
    };
    this.log.info('ingest.completed', {
      documents: ids.length,
      succeeded: summary.succeeded,
      failed: summary.failed,
      skipped: summary.skipped,
    });
    return summary;
  }

  private async ingestOne(
    id: string,
    signal?: AbortSignal
  ): Promise<ItemOutcome<{ chunkCount: number }>> {
    try {
      const row = await this.documentRepo.findById(id);
      if (!row) {
        return { id, status: 'failed', error: { code: 'NOT_FOUND', message: `Document "${id}" not found` } };
      }
      if (row.status === 'embedded') {
        return { id, status: 'skipped', reason: 'already embedded' };
      }
      const chunkCount = await this.process(row, signal);
      return { id, status: 'succeeded', result: { chunkCount } };
    } catch (err) {
      await this.markFailed(id, err);
      if (err instanceof DimensionMismatchError) throw err;
      return {
        id,
        status: 'failed',
        error: {
          code: err instanceof AppError ? err.code : 'INGEST_FAILED',
          message: errorMessage(err),
        },
      };
    }
  }

  private async process(row: DocumentRow, signal?: AbortSignal): Promise<number> {
    const id = row.id;
    let current = parseStatus(row.status);

    const text = row.extracted_text;
    if (!text || text.trim().length === 0) {
      throw new ExtractionFailedError(id, 'no text could be extracted');
    }
    current = await this.advance(id, current, 'extracted');

    const spans = this.chunker.chunk(text);
    current = await this.advance(id, current, 'chunked', { chunk_count: spans.length });

    const vectors = await this.embedder.generateBatch(
      spans.map((s) => s.text),
      { signal }
    );
    const method = toAssessmentMethod(row.method);
    const entries: VectorEntry[] = spans.map((span, i) => ({
      chunkId: `${id}:${span.index}`,
      vector: vectors[i],
      metadata: {
        documentId: id,
        index: span.index,
        start: span.start,
        end: span.end,
        text: span.text,
        controlIds: withScope(span.controlIds, row.control_scope),
        method,
      },
    }));

    // Re-ingestion replaces whatever an earlier attempt left behind
    await this.index.deleteDocument(id);
    await this.index.upsert(entries);
    await this.advance(id, current, 'embedded');

    this.log.info('ingest.document', { documentId: id, chunks: spans.length });
    return spans.length;
  }

  /** Store a forward status move; a failed document may start over. */
  private async advance(
    id: string,
    from: DocumentStatus,
    to: DocumentStatus,
    extra: { chunk_count?: number } = {}
  ): Promise<DocumentStatus> {
    if (from === 'failed' || STATUS_ORDER[to] > STATUS_ORDER[from]) {
      await this.documentRepo.update(id, { status: to, error: null, ...extra });
      return to;
    }
    if (extra.chunk_count !== undefined) {
      await this.documentRepo.update(id, extra);
    }
    return from;
  }

  /** Record the failure on the document. A failed write is logged, never thrown. */
  private async markFailed(id: string, err: unknown): Promise<void> {
    this.log.warn('ingest.document_failed', {
      documentId: id,
      code: err instanceof AppError ? err.code : 'INGEST_FAILED',
      error: errorMessage(err),
    });
    try {
      await this.documentRepo.update(id, { status: 'failed', error: errorMessage(err) });
    } catch (updateErr) {
      this.log.error('ingest.mark_failed_error', {
        documentId: id,
        error: errorMessage(updateErr),
      });
    }
  }
}

function parseStatus(value: string): DocumentStatus {
  switch (value) {
    case 'uploaded':
    case 'extracted':
    case 'chunked':
    case 'embedded':
    case 'failed':
      return value;
    default:
      return 'uploaded';
  }
}

function withScope(controlIds: string[], scope: string | null): string[] {
  return scope && !controlIds.includes(scope) ? [...controlIds, scope] : controlIds;
}
