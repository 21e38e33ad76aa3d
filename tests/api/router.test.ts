import { describe, it, expect, beforeEach } from 'vitest';
import { createRouter } from '../../src/api/router.js';
import { createContainer } from '../../src/container.js';
import { loadConfig } from '../../src/config.js';
import { InMemoryRateLimitStore } from '../../src/stores/InMemoryRateLimitStore.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { MockChunkRepository } from '../mocks/MockChunkRepository.js';
import { MockDocumentRepository } from '../mocks/MockDocumentRepository.js';
import { MockEmbeddingProvider } from '../mocks/MockEmbeddingProvider.js';
import { MockFindingRepository } from '../mocks/MockFindingRepository.js';
import { MockReasoningProvider } from '../mocks/MockReasoningProvider.js';
import {
  MockAssessmentRepository,
  MockControlRepository,
  MockEvidenceRepository,
  MockInheritanceRepository,
} from '../mocks/MockCatalogRepositories.js';

const BASE = 'http://localhost/api/v1';
const POLICY_TEXT = 'Accounts are reviewed quarterly as required by AC-2.';

describe('API Router', () => {
  let handle: ReturnType<typeof createRouter>['handle'];
  let documents: MockDocumentRepository;
  let chunks: MockChunkRepository;
  let reasoner: MockReasoningProvider;
  let log: ConsoleLogProvider;
  let inheritance: MockInheritanceRepository;

  function post(path: string, body: unknown): Request {
    return new Request(`${BASE}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  function get(path: string): Request {
    return new Request(`${BASE}${path}`, { method: 'GET' });
  }

  beforeEach(() => {
    documents = new MockDocumentRepository();
    chunks = new MockChunkRepository();
    reasoner = new MockReasoningProvider('mock-reasoner');
    log = new ConsoleLogProvider();
    inheritance = new MockInheritanceRepository();

    const controls = new MockControlRepository();
    controls.add({ id: 'AC-2', title: 'Account Management' }, [
      { id: 'AC-2[a]', objective_text: 'Account types are defined.', method: 'examine' },
    ]);
    const evidence = new MockEvidenceRepository();
    evidence.add({ id: 'ev-1', control_ids: ['AC-2'], evidence_type: 'procedure' });
    const assessments = new MockAssessmentRepository();
    assessments.add('asmt-1', []);

    documents.seed({ id: 'doc-1', extracted_text: POLICY_TEXT });
    chunks.titles.set('doc-1', 'Access Control Policy');

    const container = createContainer(
      {
        chunkRepo: chunks,
        documentRepo: documents,
        inheritanceRepo: inheritance,
        controlRepo: controls,
        evidenceRepo: evidence,
        assessmentRepo: assessments,
        findingRepo: new MockFindingRepository(),
        embeddingProvider: new MockEmbeddingProvider(8),
        reasoningProvider: reasoner,
        logProvider: log,
        rateLimitStore: new InMemoryRateLimitStore(),
      },
      loadConfig({ RETRY_MAX_ATTEMPTS: '1', RETRY_BASE_DELAY_MS: '0', VECTOR_DIMENSIONS: '8' })
    );
    handle = createRouter(container).handle;
  });

  describe('routing', () => {
    it('should return 404 for an unknown path', async () => {
      const res = await handle(get('/nowhere'));
      const body = await res.json();

      expect(res.status).toBe(404);
      expect(body.error).toEqual({
        code: 'NOT_FOUND',
        message: 'No route matches GET /api/v1/nowhere',
      });
    });

    it('should return 405 with Allow for a known path and wrong method', async () => {
      const res = await handle(get('/retrieve'));
      const body = await res.json();

      expect(res.status).toBe(405);
      expect(res.headers.get('Allow')).toBe('POST');
      expect(body.error.message).toBe('Method GET not allowed');
    });

    it('should answer CORS preflight with 204', async () => {
      const res = await handle(new Request(`${BASE}/retrieve`, { method: 'OPTIONS' }));

      expect(res.status).toBe(204);
      expect(res.headers.get('Access-Control-Allow-Methods')).toBe('GET, POST, OPTIONS');
    });

    it('should add CORS headers to routed responses', async () => {
      const res = await handle(get('/assessments/asmt-1/controls/AC-2/findings'));

      expect(res.status).toBe(200);
      expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
    });

    it('should decode path params', async () => {
      await handle(get('/assessments/asmt-1/controls/AC-2%281%29/findings'));

      expect(log.events[0].fields).toEqual({
        params: { assessmentId: 'asmt-1', controlId: 'AC-2(1)' },
      });
    });

    it('should reject a malformed percent-encoded segment with 400', async () => {
      const res = await handle(post('/findings/%E0%A4%A/review', {
        decision: 'approve',
        reviewerId: 'reviewer-1',
      }));
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error).toEqual({
        code: 'INVALID_REQUEST',
        message: 'Malformed path segment in /api/v1/findings/%E0%A4%A/review',
      });
      expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
    });

    it('should reject an invalid body before reaching the service', async () => {
      const res = await handle(post('/documents/ingest', { documentIds: [] }));
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error.code).toBe('INVALID_REQUEST');
      expect(documents.statusLog).toEqual([]);
    });

    it('should map service errors through the error handler', async () => {
      const res = await handle(post('/findings/finding-404/review', {
        decision: 'approve',
        reviewerId: 'reviewer-1',
      }));
      const body = await res.json();

      expect(res.status).toBe(404);
      expect(body.error.message).toBe('Finding "finding-404" not found');
    });
  });

  describe('evidence flow', () => {
    it('should ingest a document and retrieve its excerpt', async () => {
      const ingest = await handle(post('/documents/ingest', { documentIds: ['doc-1'] }));

      expect(ingest.status).toBe(200);
      expect(await ingest.json()).toEqual({
        results: [{ id: 'doc-1', status: 'succeeded', result: { chunkCount: 1 } }],
        succeeded: 1,
        failed: 0,
        skipped: 0,
      });

      const retrieve = await handle(post('/retrieve', { query: POLICY_TEXT, controlId: 'AC-2' }));
      const body = await retrieve.json();

      expect(retrieve.status).toBe(200);
      expect(body.results).toHaveLength(1);
      expect(body.results[0]).toMatchObject({
        chunkId: 'doc-1:0',
        documentId: 'doc-1',
        documentTitle: 'Access Control Policy',
        chunkIndex: 0,
        text: POLICY_TEXT,
        controlIds: ['AC-2'],
        rank: 1,
      });
      expect(body.results[0].similarity).toBeCloseTo(1);
    });

    it('should analyse a control, list its history and accept a review', async () => {
      reasoner.replyJson({
        determination: 'Met',
        confidence: 60,
        narrative: 'Quarterly account reviews are documented.',
        evidence_analysis: { 'ev-1': { contribution: 'Describes the review', weight: 100 } },
      });

      const analyzed = await handle(post('/assessments/asmt-1/controls/AC-2/analyze', {}));
      const finding = await analyzed.json();

      expect(analyzed.status).toBe(201);
      expect(finding).toMatchObject({
        id: 'finding-1',
        version: 1,
        controlId: 'AC-2',
        status: 'Met',
        confidence: 49,
        confidenceBreakdown: { level: 'Low' },
        modelUsed: 'mock-reasoner',
        aiGenerated: true,
        reviewState: 'Needs-Review',
        final: false,
        review: null,
      });

      const history = await handle(get('/assessments/asmt-1/controls/AC-2/findings'));
      const { findings } = await history.json();
      expect(findings.map((f: { id: string }) => f.id)).toEqual(['finding-1']);

      const reviewed = await handle(post('/findings/finding-1/review', {
        decision: 'approve',
        reviewerId: 'reviewer-1',
      }));
      const approved = await reviewed.json();

      expect(reviewed.status).toBe(200);
      expect(approved).toMatchObject({
        reviewState: 'Approved',
        final: true,
        review: { reviewerId: 'reviewer-1', decision: 'approve', overrideStatus: null },
      });
    });

    it('should require notes on an override', async () => {
      const res = await handle(post('/findings/finding-1/review', {
        decision: 'override',
        reviewerId: 'reviewer-1',
        status: 'Not Met',
      }));

      expect(res.status).toBe(400);
    });

    it('should report per-control outcomes for a batch analysis', async () => {
      reasoner.replyJson({
        determination: 'Met',
        confidence: 92,
        narrative: 'Quarterly account reviews are documented.',
        evidence_analysis: { 'ev-1': { contribution: 'Describes the review', weight: 100 } },
      });

      const res = await handle(post('/assessments/asmt-1/analyze', { controlIds: ['AC-2'] }));
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({ completed: 1, failed: 0, cancelled: 0 });
      expect(body.results[0]).toMatchObject({
        id: 'AC-2',
        status: 'succeeded',
        result: { confidence: 52, reviewState: 'Needs-Review', final: false },
      });
    });
  });

  describe('providers', () => {
    it('should report how much of the catalog a provider covers', async () => {
      inheritance.add('AC-2', 'Cloud Platform', 'inherited');

      const res = await handle(get('/providers/Cloud%20Platform/coverage'));
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toEqual({
        provider: 'Cloud Platform',
        totalControls: 1,
        mappedControls: 1,
        coveragePercentage: 100,
        inherited: 1,
        shared: 0,
        customer: 0,
      });
    });
  });
});
