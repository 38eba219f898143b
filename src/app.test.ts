import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { buildApp } from './app';
import { KnowledgeStore } from '@services/knowledge';
import { FakeBackend, FakeClock, replyByKind } from '@/test/fakes';
import { PermanentBackendError } from '@utils/errors';

const API = '/api/v1';

const replies = replyByKind({
  events: [{ description: 'Drivers walked out', event_type: 'strike', valid_time: '2024-03-05' }],
  statements: [{ content: 'We stay out', speaker: 'Dana Ruiz', stance: 'pro' }],
  entities: [{ name: 'Transit Workers Union', entity_type: 'organization' }],
  topics: [{ name: 'Transit Strike', category: 'economy', relevance: 0.9 }],
  article: '# Transit Strike\n\nDrivers walked out.',
});

const document = {
  id: 'doc-1',
  headline: 'Transit workers walk out',
  abstract: 'Bus drivers began a strike after talks collapsed.',
  observedAt: '2024-03-05T12:00:00Z',
};

describe('HTTP API', () => {
  let dataDir: string;
  let app: Awaited<ReturnType<typeof buildApp>>;
  let backend: FakeBackend;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'api-'));
    backend = new FakeBackend((prompt, systemPrompt, options) => {
      if (prompt.includes('Headline: Broken')) throw new PermanentBackendError('backend down');
      return replies(prompt, systemPrompt, options);
    });
    app = await buildApp({
      env: { SWAGGER_ENABLED: false },
      store: new KnowledgeStore({ dataDir }),
      backend,
      clock: new FakeClock(),
    });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
    await rm(dataDir, { recursive: true, force: true });
  });

  const ingest = (payload: object) => app.inject({ method: 'POST', url: `${API}/ingest/documents`, payload });

  describe('health', () => {
    it('reports liveness', async () => {
      const res = await app.inject({ method: 'GET', url: `${API}/health` });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ status: 'ok', environment: 'test' });
    });

    it('reports readiness of each dependency', async () => {
      const res = await app.inject({ method: 'GET', url: `${API}/ready` });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({
        status: 'ready',
        services: { store: true, generation: true, source: false },
        backend: 'fake',
      });
    });
  });

  describe('POST /ingest/documents', () => {
    it('ingests documents and fills optional fields', async () => {
      const res = await ingest({ documents: [document] });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        success: true,
        data: {
          documentsSaved: 1,
          extracted: 1,
          failed: [],
          discoveredTopics: ['Transit Strike'],
          stats: { documents: 1, extractions: 1, topics: 1, events: 1, statements: 1 },
        },
      });

      const stored = await app.inject({ method: 'GET', url: `${API}/documents/doc-1` });
      expect(stored.json().data).toEqual({
        ...document,
        webUrl: null,
        snippet: null,
        leadParagraph: null,
        byline: null,
        source: 'unknown',
        sectionName: null,
        keywords: [],
        wordCount: 0,
      });
    });

    it('rejects bodies that fail validation', async () => {
      const res = await ingest({ documents: [] });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({
        success: false,
        error: { statusCode: 400, code: 'FST_ERR_VALIDATION', path: `${API}/ingest/documents` },
      });
    });

    it('rejects document ids longer than 512 characters', async () => {
      const res = await ingest({ documents: [{ ...document, id: 'x'.repeat(513) }] });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ success: false, error: { code: 'FST_ERR_VALIDATION' } });
    });

    it('names the failing document in fail-fast mode', async () => {
      const res = await ingest({ documents: [{ ...document, id: 'doc-9', headline: 'Broken' }] });

      expect(res.statusCode).toBe(502);
      expect(res.json().error).toMatchObject({
        code: 'ExtractionError',
        message: 'Extraction failed for document doc-9: backend down',
        details: { documentId: 'doc-9' },
      });

      const metrics = await app.inject({ method: 'GET', url: '/metrics' });
      expect(metrics.body).toContain('extraction_documents_total{status="failed"} 1');
    });

    it('lists failures in partial mode', async () => {
      const res = await ingest({
        documents: [document, { ...document, id: 'doc-9', headline: 'Broken' }],
        mode: 'partial',
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().data.failed).toEqual([
        { documentId: 'doc-9', message: 'Extraction failed for document doc-9: backend down', statusCode: 502 },
      ]);
    });
  });

  it('answers 503 for source ingestion without a source', async () => {
    const res = await app.inject({ method: 'POST', url: `${API}/ingest/search`, payload: { query: 'transit' } });
    expect(res.statusCode).toBe(503);
  });

  describe('topics', () => {
    beforeEach(async () => {
      expect((await ingest({ documents: [document] })).statusCode).toBe(200);
    });

    it('lists ranked summaries and names', async () => {
      const summary = await app.inject({ method: 'GET', url: `${API}/topics?category=economy&limit=5` });
      expect(summary.json().data).toEqual([
        { name: 'Transit Strike', category: 'economy', documentCount: 1, eventCount: 1, statementCount: 1 },
      ]);

      const other = await app.inject({ method: 'GET', url: `${API}/topics?category=sports` });
      expect(other.json().data).toEqual([]);

      const names = await app.inject({ method: 'GET', url: `${API}/topics/names` });
      expect(names.json().data).toEqual(['Transit Strike']);
    });

    it('returns the valid-time timeline by default', async () => {
      const res = await app.inject({ method: 'GET', url: `${API}/topics/Transit%20Strike/timeline` });
      const { data } = res.json();

      expect(data.clock).toBe('valid');
      expect(data.items.map((item: { kind: string; time: string }) => [item.kind, item.time])).toEqual([
        ['event', '2024-03-05T00:00:00.000Z'],
        ['statement', '2024-03-05T12:00:00.000Z'],
      ]);
    });

    it('returns the observation timeline on request', async () => {
      const res = await app.inject({ method: 'GET', url: `${API}/topics/Transit%20Strike/timeline?clock=observation` });
      expect(res.json().data.items.map((item: { time: string }) => item.time)).toEqual([
        '2024-03-05T12:00:00.000Z',
        '2024-03-05T12:00:00.000Z',
      ]);
    });

    it('returns both orderings', async () => {
      const res = await app.inject({ method: 'GET', url: `${API}/topics/Transit%20Strike/timeline/dual` });
      const { data } = res.json();
      expect(data.topic).toBe('Transit Strike');
      expect(data.validTime).toHaveLength(2);
      expect(data.observationTime).toHaveLength(2);
    });

    it('exports TimelineJS slides', async () => {
      const res = await app.inject({ method: 'GET', url: `${API}/topics/Transit%20Strike/timelinejs` });
      const body = res.json();
      expect(body.title.text.headline).toBe('Transit Strike');
      expect(body.events.map((slide: { text: { headline: string } }) => slide.text.headline)).toEqual([
        'Drivers walked out',
        'Dana Ruiz: We stay out',
      ]);
    });

    it('writes an article with perspectives', async () => {
      const res = await app.inject({ method: 'POST', url: `${API}/topics/Transit%20Strike/article?perspectives=true` });
      const { data } = res.json();

      expect(res.statusCode).toBe(200);
      expect(data.markdown.startsWith('# Transit Strike\n\nDrivers walked out.\n\n## Timeline\n')).toBe(true);
      expect(data.markdown).toContain('### Supporting Views\n- **Dana Ruiz**: "We stay out"');
    });

    it('answers 404 for unknown topics', async () => {
      const res = await app.inject({ method: 'GET', url: `${API}/topics/Nothing%20Here/timeline` });
      expect(res.statusCode).toBe(404);
      expect(res.json().error.message).toBe('Topic not found: Nothing Here');
    });
  });

  describe('records', () => {
    it('returns stats and stored extractions', async () => {
      await ingest({ documents: [document] });

      const stats = await app.inject({ method: 'GET', url: `${API}/stats` });
      expect(stats.json().data).toEqual({ documents: 1, extractions: 1, topics: 1, events: 1, statements: 1 });

      const extraction = await app.inject({ method: 'GET', url: `${API}/extractions/doc-1` });
      expect(extraction.json().data.entities.map((e: { name: string }) => e.name)).toEqual(['Transit Workers Union']);
    });

    it('answers 404 for unknown records', async () => {
      const res = await app.inject({ method: 'GET', url: `${API}/documents/missing` });
      expect(res.statusCode).toBe(404);
    });
  });

  it('answers 404 for unknown routes', async () => {
    const res = await app.inject({ method: 'GET', url: '/nowhere' });
    expect(res.statusCode).toBe(404);
    expect(res.json().error.message).toBe('Route not found');
  });
});
