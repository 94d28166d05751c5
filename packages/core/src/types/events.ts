// packages/core/src/types/events.ts

/**
 * Event kinds written by Vigil itself. The log accepts any string kind;
 * these are the ones the worker, queue and gateway produce.
 */
export type KnownEventKind =
  | 'job.queued'
  | 'job.started'
  | 'job.progress'
  | 'job.succeeded'
  | 'job.failed'
  | 'job.removed'
  | 'worker.started'
  | 'worker.stopped'
  | 'queue.recovered';

/** Event as handed to `EventLog.append`. */
export interface NewEvent {
  kind: KnownEventKind | (string & {});
  jobId?: string;
  line?: string;
  payload?: Record<string, unknown>;
  /** ISO-8601; filled in at append time when absent */
  ts?: string;
}

/** Event as stored: immutable, with its log position. */
export interface VigilEvent {
  seq: number;
  ts: string;
  kind: string;
  jobId?: string;
  line?: string;
  payload?: Record<string, unknown>;
}

/** Shape check for events arriving over the wire. */
export function isVigilEvent(value: unknown): value is VigilEvent {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'seq' in value &&
    typeof value.seq === 'number' &&
    'ts' in value &&
    typeof value.ts === 'string' &&
    'kind' in value &&
    typeof value.kind === 'string'
  );
}
