import { describe, it, expect, beforeEach } from 'vitest';
import { createRouter } from '../../src/api/router.js';
import { createContainer } from '../../src/container.js';
import { InMemoryFeedbackRepository } from '../../src/repositories/InMemoryFeedbackRepository.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { GatewayUnavailableError } from '../../src/errors.js';
import { extractCitations } from '../../src/grounding/citations.js';
import type { HandlerContext } from '../../src/middleware/pipeline.js';
import { MockEmbeddingProvider } from '../mocks/MockEmbeddingProvider.js';
import { MockTextGenerationProvider } from '../mocks/MockTextGenerationProvider.js';

describe('API Router', () => {
  let handle: (req: Request, ctx: HandlerContext) => Promise<Response>;
  let embeddings: MockEmbeddingProvider;
  let textProvider: MockTextGenerationProvider;

  function ctx(): HandlerContext {
    return { requestId: 'req-test' };
  }

  function post(path: string, body: unknown): Request {
    return new Request(`http://localhost${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  function get(path: string): Request {
    return new Request(`http://localhost${path}`, { method: 'GET' });
  }

  const seedRows = [
    { text: 'Login fails after the update', platform: 'ios', country: 'US', rating: '2' },
    { text: '', platform: 'ios' },
    { text: 'Love the new widgets', platform: 'android', country: 'US', rating: '5' },
  ];

  beforeEach(() => {
    embeddings = new MockEmbeddingProvider(3)
      .define('Login fails after the update', [1, 0, 0])
      .define('Love the new widgets', [0, 1, 0])
      .define('login problems', [1, 0.1, 0]);
    textProvider = new MockTextGenerationProvider((req) =>
      extractCitations(req.prompt)
        .map((id) => `- Finding [#${id}]`)
        .join('\n')
    );

    const container = createContainer({
      feedbackRepo: new InMemoryFeedbackRepository(),
      embeddingProvider: embeddings,
      textProvider,
      logProvider: new ConsoleLogProvider(),
    });

    handle = createRouter(container).handle;
  });

  async function seed(): Promise<void> {
    const res = await handle(post('/api/v1/ingest', { rows: seedRows }), ctx());
    expect(res.status).toBe(200);
  }

  // ── Ingestion ──

  describe('POST /api/v1/ingest', () => {
    it('should store valid rows and report rejected ones', async () => {
      const res = await handle(post('/api/v1/ingest', { rows: seedRows }), ctx());
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toEqual({
        stored: 2,
        ids: [1, 2],
        failures: [{ index: 1, code: 'INVALID_INPUT', message: 'text is required' }],
      });
    });

    it('should reject a missing rows array', async () => {
      const res = await handle(post('/api/v1/ingest', {}), ctx());
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error.message).toBe('rows is required');
    });

    it('should reject rows that are not objects', async () => {
      const res = await handle(post('/api/v1/ingest', { rows: ['just text'] }), ctx());
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error).toEqual({
        code: 'INVALID_INPUT',
        message: 'rows[0] must be an object',
        details: { field: 'rows', index: 0 },
      });
    });

    it('should reject batches over 500 rows', async () => {
      const rows = Array.from({ length: 501 }, (_, i) => ({ text: `row ${i}` }));
      const res = await handle(post('/api/v1/ingest', { rows }), ctx());
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error.message).toBe('rows must have 500 items or fewer');
      expect(embeddings.callCount).toBe(0);
    });
  });

  // ── Retrieval ──

  describe('POST /api/v1/retrieve', () => {
    it('should return evidence ranked by similarity', async () => {
      await seed();

      const res = await handle(post('/api/v1/retrieve', { queryText: 'login problems', topK: 2 }), ctx());
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.matches).toBe(2);
      expect(body.evidence.query).toBe('login problems');
      expect(body.evidence.items.map((i: { id: number }) => i.id)).toEqual([1, 2]);
      expect(body.topSimilarity).toBeCloseTo(1 / Math.sqrt(1.01), 10);
      expect(body.listing.startsWith('## Evidence #1\n- Platform: ios\n')).toBe(true);
    });

    it('should apply filters', async () => {
      await seed();

      const res = await handle(
        post('/api/v1/retrieve', { queryText: 'login problems', platform: 'android', country: null }),
        ctx()
      );
      const body = await res.json();

      expect(body.evidence.items.map((i: { id: number }) => i.id)).toEqual([2]);
      expect(body.evidence.filters).toEqual({ country: null, platform: 'android', minRating: null });
    });

    it('should return an empty listing when nothing matches', async () => {
      await seed();

      const res = await handle(post('/api/v1/retrieve', { queryText: 'login problems', country: 'JP' }), ctx());
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.matches).toBe(0);
      expect(body.topSimilarity).toBeNull();
      expect(body.listing).toBe(
        'No feedback matched "login problems" (filters: platform=all, country=JP).'
      );
    });

    it('should accept a query longer than any embedding input', async () => {
      await seed();

      const queryText = 'checkout '.repeat(1000).trim();
      const res = await handle(post('/api/v1/retrieve', { queryText }), ctx());
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.matches).toBe(2);
      expect(embeddings.calls.at(-1)).toBe(queryText);
    });

    it('should reject an out-of-range topK', async () => {
      const res = await handle(post('/api/v1/retrieve', { queryText: 'q', topK: 16 }), ctx());
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error.message).toBe('topK must be at most 15');
    });

    it('should reject a blank query', async () => {
      const res = await handle(post('/api/v1/retrieve', { queryText: '   ' }), ctx());
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error.message).toBe('queryText is required');
    });

    it('should answer 503 when the embedding gateway is down', async () => {
      await seed();
      embeddings.failNext(new GatewayUnavailableError('Test embeddings', 'HTTP 503: overloaded'));

      const res = await handle(post('/api/v1/retrieve', { queryText: 'login problems' }), ctx());
      const body = await res.json();

      expect(res.status).toBe(503);
      expect(body.error.code).toBe('GATEWAY_UNAVAILABLE');
    });
  });

  // ── Synthesis ──

  describe('POST /api/v1/analysis and /api/v1/brief', () => {
    it('should return the evidence with a grounded analysis', async () => {
      await seed();

      const res = await handle(post('/api/v1/analysis', { queryText: 'login problems', topK: 1 }), ctx());
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.evidence.items).toHaveLength(1);
      expect(body.synthesis).toEqual({
        kind: 'analysis',
        text: '- Finding [#1]',
        cited: [1],
        ungrounded: [],
        grounded: true,
      });
    });

    it('should not call the model when there is no evidence', async () => {
      const res = await handle(post('/api/v1/brief', { queryText: 'login problems' }), ctx());
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.synthesis.kind).toBe('weekly_brief');
      expect(body.synthesis.text.startsWith('## No evidence')).toBe(true);
      expect(textProvider.requests).toHaveLength(0);
    });

    it('should ignore client-supplied evidence', async () => {
      await seed();

      const res = await handle(
        post('/api/v1/analysis', {
          queryText: 'login problems',
          topK: 1,
          evidence: { items: [{ id: 99, content: 'invented' }] },
        }),
        ctx()
      );
      const body = await res.json();

      expect(body.evidence.items.map((i: { id: number }) => i.id)).toEqual([1]);
      expect(textProvider.requests[0].prompt).not.toContain('invented');
    });
  });

  // ── Stats ──

  describe('GET /api/v1/stats', () => {
    it('should report record count and dimension', async () => {
      await seed();

      const res = await handle(get('/api/v1/stats'), ctx());

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ records: 2, dimension: 3 });
      expect(res.headers.get('Cache-Control')).toBe('public, max-age=60');
    });
  });

  // ── Routing ──

  describe('routing', () => {
    it('should answer CORS preflight', async () => {
      const res = await handle(new Request('http://localhost/api/v1/retrieve', { method: 'OPTIONS' }), ctx());

      expect(res.status).toBe(204);
      expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
      expect(res.headers.get('Access-Control-Allow-Methods')).toBe('GET, POST, OPTIONS');
    });

    it('should add CORS headers to handler responses', async () => {
      const res = await handle(get('/api/v1/stats'), ctx());
      expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
    });

    it('should return 405 with Allow for a known path and wrong method', async () => {
      const res = await handle(get('/api/v1/retrieve'), ctx());

      expect(res.status).toBe(405);
      expect(res.headers.get('Allow')).toBe('POST');
    });

    it('should return 404 for unknown paths', async () => {
      const res = await handle(get('/api/v1/feedback'), ctx());
      const body = await res.json();

      expect(res.status).toBe(404);
      expect(body.error).toEqual({
        code: 'NOT_FOUND',
        message: 'No route matches GET /api/v1/feedback',
      });
      expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
    });
  });
});
