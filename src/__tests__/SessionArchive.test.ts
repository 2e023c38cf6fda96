import { describe, it, expect } from 'vitest';
import { createMemoryStore, exchangesKey, summaryKey } from '../redis/client';
import { SessionArchive } from '../services/interview/SessionArchive';
import type { Exchange, SessionSummary } from '../types';

const exchange: Exchange = {
  itemId: 'q1',
  question: 'How do you invalidate a cache?',
  transcript: 'We version the keys.',
  decision: { kind: 'advance' },
  depth: 0,
  coverage: 1,
  elapsedMs: 120_000,
  timestamp: '2024-01-01T00:02:00.000Z',
};

const summary: SessionSummary = {
  sessionId: 'session-1',
  candidateId: 'candidate-1',
  jobId: 'job-1',
  finalPhase: 'completed',
  closeCause: 'plan_exhausted',
  history: [exchange],
  warnings: [],
  skippedItemIds: [],
  interruptions: [],
  startedAt: '2024-01-01T00:00:00.000Z',
  endedAt: '2024-01-01T00:02:05.000Z',
  totalElapsedMs: 125_000,
};

describe('SessionArchive', () => {
  it('appends exchanges in order', async () => {
    const archive = new SessionArchive(createMemoryStore(), 60);
    await archive.onExchange('session-1', exchange);
    await archive.onExchange('session-1', { ...exchange, itemId: 'q2' });

    expect((await archive.getExchanges('session-1')).map((e) => e.itemId)).toEqual(['q1', 'q2']);
    expect(await archive.getExchanges('other')).toEqual([]);
  });

  it('stores and reads back the summary', async () => {
    const archive = new SessionArchive(createMemoryStore(), 60);
    await archive.onSummary(summary);

    expect(await archive.getSummary('session-1')).toEqual(summary);
    expect(await archive.getSummary('missing')).toBeNull();
  });

  it('forgets sessions once the TTL passes', async () => {
    let now = 0;
    const archive = new SessionArchive(createMemoryStore(() => now), 60);
    await archive.onSummary(summary);
    await archive.onExchange('session-1', exchange);

    now = 59_000;
    expect(await archive.getSummary('session-1')).not.toBeNull();
    now = 61_000;
    expect(await archive.getSummary('session-1')).toBeNull();
    expect(await archive.getExchanges('session-1')).toEqual([]);
  });

  it('treats records of an unexpected shape as missing', async () => {
    const store = createMemoryStore();
    const archive = new SessionArchive(store, 60);
    await store.setex(summaryKey('session-1'), 60, JSON.stringify({ sessionId: 'session-1', finalPhase: 'paused' }));
    await store.setex(summaryKey('session-2'), 60, 'not json');

    expect(await archive.getSummary('session-1')).toBeNull();
    expect(await archive.getSummary('session-2')).toBeNull();
  });

  it('drops malformed exchanges and keeps the rest', async () => {
    const store = createMemoryStore();
    const archive = new SessionArchive(store, 60);
    await archive.onExchange('session-1', exchange);
    await store.rpush(exchangesKey('session-1'), JSON.stringify({ itemId: 'q2', decision: { kind: 'retry' } }));
    await archive.onExchange('session-1', { ...exchange, itemId: 'q3' });

    expect((await archive.getExchanges('session-1')).map((e) => e.itemId)).toEqual(['q1', 'q3']);
  });
});
