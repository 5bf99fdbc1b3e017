import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import {
  EngineRegistry,
  ExtractionOrchestrator,
  MemoryDocumentStore,
  processDocument,
} from '@advice-corpus/shared';
import { createApp, parseRecordFilter } from '../../services/query-api/src/app';
import { FakeEngine, LETTER, makeAttempt, makeEntry } from './fixtures';

const store = new MemoryDocumentStore();
let server: Server;
let baseUrl: string;

beforeAll(async () => {
  const registry = new EngineRegistry().register(
    new FakeEngine('text-layer', makeAttempt({ method: 'text-layer', text: LETTER }))
  );
  const orchestrator = new ExtractionOrchestrator(registry, {
    minUsableWords: 5,
    escalation: { yearThreshold: 0, qualityFloor: 0, minWordsPerPage: 0, minAlphaRatio: 0, maxGarbageWords: 100000 },
  });
  await processDocument(makeEntry('reg-0101', { letter_id: 'A-03-101' }), { store, orchestrator }, { runId: 'api' });
  await store.writeCitationGraph({
    citedBy: new Map(),
    forward: new Map(),
    knownGaps: [{ identifier: 'A-98-200', cited_by_count: 1, example_citing: ['A-03-101'] }],
  });

  const app = createApp(store);
  await new Promise<void>((resolve) => {
    server = app.listen(0, () => resolve());
  });
  const address: string | AddressInfo | null = server.address();
  if (address === null || typeof address === 'string') throw new Error('server has no port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
});

describe('parseRecordFilter', () => {
  it('defaults and caps the limit', () => {
    expect(parseRecordFilter({})).toEqual({ ok: true, filter: { limit: 20 } });
    expect(parseRecordFilter({ limit: '500', year: '2003' })).toEqual({ ok: true, filter: { year: 2003, limit: 100 } });
  });

  it('rejects unknown values', () => {
    expect(parseRecordFilter({ tier: 'severe' })).toEqual({
      ok: false,
      message: 'tier must be one of verified, low, medium, high, critical',
    });
    expect(parseRecordFilter({ year: '03' })).toEqual({ ok: false, message: 'year must be a four-digit year' });
    expect(parseRecordFilter({ limit: '0' })).toEqual({ ok: false, message: 'limit must be a positive integer' });
  });
});

describe('Query API', () => {
  it('returns a stored record', async () => {
    const res = await fetch(`${baseUrl}/documents/A-03-101`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      id: 'A-03-101',
      registry_key: 'reg-0101',
      classification: { topic: 'conflicts_of_interest' },
    });
  });

  it('answers a missing record with the error envelope', async () => {
    const res = await fetch(`${baseUrl}/documents/A-99-999`, { headers: { 'x-correlation-id': 'corr-test-1' } });

    expect(res.status).toBe(404);
    expect(res.headers.get('x-correlation-id')).toBe('corr-test-1');
    expect(await res.json()).toEqual({
      error: { code: 'not_found', message: 'Document A-99-999 not found', correlation_id: 'corr-test-1' },
    });
  });

  it('rejects an unknown topic', async () => {
    const res = await fetch(`${baseUrl}/documents?topic=zoning`, { headers: { 'x-correlation-id': 'corr-test-2' } });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: 'invalid_request',
        message: 'topic must be one of conflicts_of_interest, campaign_finance, lobbying, other',
        correlation_id: 'corr-test-2',
      },
    });
  });

  it('filters the record list', async () => {
    const matching = await fetch(`${baseUrl}/documents?topic=conflicts_of_interest&year=2003`);
    expect(await matching.json()).toMatchObject({ count: 1, items: [{ id: 'A-03-101' }] });

    const empty = await fetch(`${baseUrl}/documents?topic=lobbying`);
    expect(await empty.json()).toEqual({ items: [], count: 0 });
  });

  it('lists known gaps', async () => {
    const res = await fetch(`${baseUrl}/known-gaps`);
    expect(await res.json()).toEqual({
      items: [{ identifier: 'A-98-200', cited_by_count: 1, example_citing: ['A-03-101'] }],
    });
  });

  it('reports health', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'healthy', service: 'query-api' });
  });
});
