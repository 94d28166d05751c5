// packages/core/src/storage/event-log.ts — Append-only event log backed by SQLite

import type Database from 'better-sqlite3';
import { EventEmitter } from 'eventemitter3';
import type { NewEvent, VigilEvent } from '../types/events.js';
import { guard } from './database.js';

interface EventRow {
  seq: number;
  ts: string;
  kind: string;
  job_id: string | null;
  line: string | null;
  payload_json: string | null;
}

interface EventLogEvents {
  appended: (event: VigilEvent) => void;
}

export type EventListener = (event: VigilEvent) => void;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Single-writer, many-reader event log. Every append is committed before
 * in-process subscribers hear about it; readers in other processes tail with `since`.
 */
export class EventLog {
  private readonly emitter = new EventEmitter<EventLogEvents>();

  constructor(private readonly db: Database.Database) {}

  /** Append an event. Returns the stored record with its sequence number. */
  append(event: NewEvent): VigilEvent {
    const ts = event.ts ?? new Date().toISOString();
    const payloadJson = event.payload ? JSON.stringify(event.payload) : null;
    const stored = guard('event.append', () => {
      const result = this.db
        .prepare(
          'INSERT INTO events (ts, kind, job_id, line, payload_json) VALUES (?, ?, ?, ?, ?)',
        )
        .run(
          ts,
          event.kind,
          event.jobId ?? null,
          event.line ?? null,
          payloadJson,
        );
      return this.toEvent({
        seq: Number(result.lastInsertRowid),
        ts,
        kind: event.kind,
        job_id: event.jobId ?? null,
        line: event.line ?? null,
        payload_json: payloadJson,
      });
    });
    this.emitter.emit('appended', stored);
    return stored;
  }

  /** At most `n` newest events, oldest first. */
  tail(n: number): VigilEvent[] {
    if (n <= 0) return [];
    return guard('event.tail', () =>
      this.db
        .prepare<[number], EventRow>(
          'SELECT * FROM (SELECT * FROM events ORDER BY seq DESC LIMIT ?) ORDER BY seq ASC',
        )
        .all(n)
        .map((row) => this.toEvent(row)),
    );
  }

  /** Events strictly after `seq`, oldest first. */
  since(seq: number, limit = 1000): VigilEvent[] {
    return guard('event.since', () =>
      this.db
        .prepare<[number, number], EventRow>(
          'SELECT * FROM events WHERE seq > ? ORDER BY seq ASC LIMIT ?',
        )
        .all(seq, limit)
        .map((row) => this.toEvent(row)),
    );
  }

  /** All events recorded for one job, oldest first. */
  forJob(jobId: string): VigilEvent[] {
    return guard('event.forJob', () =>
      this.db
        .prepare<[string], EventRow>('SELECT * FROM events WHERE job_id = ? ORDER BY seq ASC')
        .all(jobId)
        .map((row) => this.toEvent(row)),
    );
  }

  /** Sequence number of the newest event, 0 when the log is empty. */
  lastSeq(): number {
    return guard('event.lastSeq', () => {
      const row = this.db
        .prepare<[], { seq: number | null }>('SELECT MAX(seq) AS seq FROM events')
        .get();
      return row?.seq ?? 0;
    });
  }

  /**
   * Listen for events appended through this instance.
   * Returns a function that removes the listener.
   */
  subscribe(listener: EventListener): () => void {
    this.emitter.on('appended', listener);
    return () => {
      this.emitter.off('appended', listener);
    };
  }

  get subscriberCount(): number {
    return this.emitter.listenerCount('appended');
  }

  private toEvent(row: EventRow): VigilEvent {
    const event: VigilEvent = { seq: row.seq, ts: row.ts, kind: row.kind };
    if (row.job_id !== null) event.jobId = row.job_id;
    if (row.line !== null) event.line = row.line;
    if (row.payload_json !== null) {
      const payload: unknown = JSON.parse(row.payload_json);
      if (isRecord(payload)) event.payload = payload;
    }
    return event;
  }
}
