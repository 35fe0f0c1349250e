import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { buildTraceRecord, redact, redactEntities } from '../src/trace/redact.js';
import { TraceStore } from '../src/trace/store.js';

describe('Redaction', () => {
  it('masks sensitive keys and keeps the rest', () => {
    expect(redactEntities({ password: 'secret123', site: 'demo' })).toEqual({ password: '***', site: 'demo' });
  });

  it('matches keys case-insensitively inside nested values', () => {
    expect(redact({ fields: { Password: 'x', user: 'ada' }, list: [{ otp: '1234' }] })).toEqual({
      fields: { Password: '***', user: 'ada' },
      list: [{ otp: '***' }],
    });
  });

  it('masks configured secrets in the raw utterance', () => {
    const record = buildTraceRecord(
      'login with test-secret',
      { name: 'login', entities: { use_saved: true } },
      ['test-secret'],
      new Date('2026-01-02T03:04:05.000Z'),
    );
    expect(record).toEqual({
      ts: '2026-01-02T03:04:05.000Z',
      raw: 'login with ***',
      intent: 'login',
      entities: { use_saved: true },
    });
  });
});

describe('TraceStore', () => {
  let store: TraceStore;

  beforeAll(() => {
    store = new TraceStore(':memory:');
  });

  afterAll(() => {
    store.close();
  });

  it('returns traces newest first', () => {
    store.append(buildTraceRecord('open demo site', { name: 'navigate', entities: { site: 'demo' } }));
    store.append(buildTraceRecord('search for backpack', { name: 'search', entities: { query: 'backpack' } }));

    const traces = store.recent(10);
    expect(traces.map((t) => t.raw)).toEqual(['search for backpack', 'open demo site']);
    expect(traces[0]?.entities).toEqual({ query: 'backpack' });
  });

  it('redacts audit details before storing them', () => {
    store.audit('login_attempt', { site: 'demo', password: 'test-secret' }, new Date('2026-01-02T00:00:00.000Z'));
    expect(store.auditLog(1)).toEqual([
      { ts: '2026-01-02T00:00:00.000Z', event: 'login_attempt', details: { site: 'demo', password: '***' } },
    ]);
  });

  it('counts traces per intent', () => {
    expect(store.stats()).toEqual({
      traces: 2,
      audit_events: 1,
      by_intent: { navigate: 1, search: 1 },
    });
  });
});
