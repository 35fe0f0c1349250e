import Database from 'better-sqlite3';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { mkdirSync } from 'node:fs';
import type { ActionKind, TraceRecord, TraceSink } from '../types.js';
import { redactEntities } from './redact.js';

// ─────────────────────────────────────────────────────────────────────────────
// TraceStore — persisted utterance traces and audit events
//
// Records arrive already redacted (see buildTraceRecord); audit details are
// redacted here before they are written.
// ─────────────────────────────────────────────────────────────────────────────

export interface AuditEvent {
  ts: string;
  event: string;
  details: Record<string, unknown>;
}

export interface TraceStats {
  traces: number;
  audit_events: number;
  by_intent: Partial<Record<ActionKind, number>>;
}

export class TraceStore implements TraceSink {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? TraceStore.defaultPath();
    if (path !== ':memory:') mkdirSync(dirname(path), { recursive: true });
    this.db = new Database(path);
    this.init();
  }

  static defaultPath(): string {
    return join(homedir(), '.voicecart', 'traces.db');
  }

  private init(): void {
    this.db.exec(`
      -- One row per parsed utterance
      CREATE TABLE IF NOT EXISTS voice_traces (
        id        INTEGER PRIMARY KEY AUTOINCREMENT,
        ts        TEXT NOT NULL,
        raw       TEXT NOT NULL,
        intent    TEXT NOT NULL,
        entities  TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS audit_events (
        id        INTEGER PRIMARY KEY AUTOINCREMENT,
        ts        TEXT NOT NULL,
        event     TEXT NOT NULL,
        details   TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_traces_intent ON voice_traces(intent);
    `);
  }

  // ─── Traces ────────────────────────────────────────────────────────────────

  append(record: TraceRecord): void {
    this.db
      .prepare('INSERT INTO voice_traces (ts, raw, intent, entities) VALUES (?, ?, ?, ?)')
      .run(record.ts, record.raw, record.intent, JSON.stringify(record.entities));
  }

  /** Newest first */
  recent(limit = 20): TraceRecord[] {
    const rows = this.db
      .prepare('SELECT ts, raw, intent, entities FROM voice_traces ORDER BY id DESC LIMIT ?')
      .all(limit) as { ts: string; raw: string; intent: ActionKind; entities: string }[];

    return rows.map((r) => ({
      ts: r.ts,
      raw: r.raw,
      intent: r.intent,
      entities: JSON.parse(r.entities) as Record<string, unknown>,
    }));
  }

  // ─── Audit ─────────────────────────────────────────────────────────────────

  audit(event: string, details: Record<string, unknown> = {}, now: Date = new Date()): AuditEvent {
    const entry: AuditEvent = { ts: now.toISOString(), event, details: redactEntities(details) };
    this.db
      .prepare('INSERT INTO audit_events (ts, event, details) VALUES (?, ?, ?)')
      .run(entry.ts, entry.event, JSON.stringify(entry.details));
    return entry;
  }

  auditLog(limit = 50): AuditEvent[] {
    const rows = this.db
      .prepare('SELECT ts, event, details FROM audit_events ORDER BY id DESC LIMIT ?')
      .all(limit) as { ts: string; event: string; details: string }[];
    return rows.map((r) => ({
      ts: r.ts,
      event: r.event,
      details: JSON.parse(r.details) as Record<string, unknown>,
    }));
  }

  // ─── Stats ─────────────────────────────────────────────────────────────────

  stats(): TraceStats {
    const get = (sql: string) =>
      (this.db.prepare(sql).get() as { n: number }).n;

    const rows = this.db
      .prepare('SELECT intent, COUNT(*) as n FROM voice_traces GROUP BY intent')
      .all() as { intent: ActionKind; n: number }[];

    const by_intent: Partial<Record<ActionKind, number>> = {};
    for (const r of rows) by_intent[r.intent] = r.n;

    return {
      traces: get('SELECT COUNT(*) as n FROM voice_traces'),
      audit_events: get('SELECT COUNT(*) as n FROM audit_events'),
      by_intent,
    };
  }

  close(): void {
    this.db.close();
  }
}
