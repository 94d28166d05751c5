// packages/core/src/storage/job-queue.ts — Durable FIFO job queue with a single active claim

import Database from 'better-sqlite3';
import {
  JOB_MODES,
  JOB_TYPES,
  jobSpecSchema,
  type JobMode,
  type JobType,
  type QueueSnapshot,
  type QueuedJob,
} from '../types/jobs.js';
import { StorageError, ValidationError } from '../utils/errors.js';
import { generateJobId } from '../utils/id.js';
import { guard, toStorageError } from './database.js';
import type { EventLog } from './event-log.js';

interface JobRow {
  seq: number;
  id: string;
  type: string;
  mode: string;
  repo: string | null;
  auto_pr: number;
  enqueued_at: string;
  claimed_by: string | null;
  claimed_at: string | null;
}

function isJobType(value: string): value is JobType {
  return JOB_TYPES.some((t) => t === value);
}

function isJobMode(value: string): value is JobMode {
  return JOB_MODES.some((m) => m === value);
}

export interface WithdrawResult {
  outcome: 'removed' | 'claimed' | 'not_found';
  job: QueuedJob | null;
}

export class JobQueue {
  constructor(
    private readonly db: Database.Database,
    private readonly events?: EventLog,
  ) {}

  /**
   * Validate a submission and persist it. The row is committed before the id
   * is returned. Throws ValidationError listing every problem with the payload.
   */
  submit(spec: unknown): string {
    const parsed = jobSpecSchema.safeParse(spec);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      throw new ValidationError(
        `Invalid job submission: ${issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')}`,
        issues,
      );
    }

    const { type, mode, repo, auto_pr } = parsed.data;
    const id = generateJobId();
    const enqueuedAt = new Date().toISOString();

    guard('job.submit', () =>
      this.db
        .prepare(
          `INSERT INTO jobs (id, type, mode, repo, auto_pr, enqueued_at)
           VALUES (?, ?, ?, ?, ?, ?)`,
        )
        .run(id, type, mode, repo ?? null, auto_pr ? 1 : 0, enqueuedAt),
    );

    this.events?.append({
      kind: 'job.queued',
      jobId: id,
      line: `queued ${type}${repo ? ` for ${repo}` : ''}`,
      payload: { type, mode, repo: repo ?? null, autoPr: auto_pr },
    });
    return id;
  }

  get(id: string): QueuedJob | null {
    const row = guard('job.get', () =>
      this.db.prepare<[string], JobRow>('SELECT * FROM jobs WHERE id = ?').get(id),
    );
    return row ? this.toJob(row) : null;
  }

  /** Unclaimed jobs in FIFO order. */
  peekAll(): QueuedJob[] {
    return guard('job.peekAll', () =>
      this.db
        .prepare<[], JobRow>('SELECT * FROM jobs WHERE claimed_by IS NULL ORDER BY seq ASC')
        .all()
        .map((row) => this.toJob(row)),
    );
  }

  /** Every job still in storage, claimed or not, in FIFO order. */
  list(): QueuedJob[] {
    return guard('job.list', () =>
      this.db
        .prepare<[], JobRow>('SELECT * FROM jobs ORDER BY seq ASC')
        .all()
        .map((row) => this.toJob(row)),
    );
  }

  snapshot(): QueueSnapshot {
    const items = this.list();
    return { size: items.length, items };
  }

  size(): number {
    return guard('job.size', () => {
      const row = this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM jobs').get();
      return row?.n ?? 0;
    });
  }

  /**
   * Claim the oldest unclaimed job for `workerId`.
   * Returns null when the queue is empty, when a claim is already held, or
   * when another connection holds the write lock.
   */
  claimNext(workerId: string): QueuedJob | null {
    const claim = this.db.transaction((claimedAt: string): JobRow | null => {
      const held = this.db
        .prepare<[], { id: string }>('SELECT id FROM jobs WHERE claimed_by IS NOT NULL LIMIT 1')
        .get();
      if (held) return null;

      const row = this.db
        .prepare<[], JobRow>(
          'SELECT * FROM jobs WHERE claimed_by IS NULL ORDER BY seq ASC LIMIT 1',
        )
        .get();
      if (!row) return null;

      this.db
        .prepare('UPDATE jobs SET claimed_by = ?, claimed_at = ? WHERE seq = ? AND claimed_by IS NULL')
        .run(workerId, claimedAt, row.seq);
      return { ...row, claimed_by: workerId, claimed_at: claimedAt };
    });

    try {
      const row = claim.immediate(new Date().toISOString());
      return row ? this.toJob(row) : null;
    } catch (err) {
      if (err instanceof Database.SqliteError && err.code === 'SQLITE_BUSY') return null;
      throw toStorageError('job.claimNext', err);
    }
  }

  /** Delete a job. Removing an unknown id is a no-op. Returns whether a row went away. */
  remove(id: string): boolean {
    const result = guard('job.remove', () =>
      this.db.prepare('DELETE FROM jobs WHERE id = ?').run(id),
    );
    return result.changes > 0;
  }

  /**
   * Operator removal of a pending job. A claimed job is left alone; a removed
   * one gets a `job.removed` event. The delete only matches an unclaimed row,
   * so a worker claiming the job after it was read wins.
   */
  withdraw(id: string): WithdrawResult {
    const job = this.get(id);
    if (!job) return { outcome: 'not_found', job: null };
    if (job.claimedBy) return { outcome: 'claimed', job };

    const result = guard('job.withdraw', () =>
      this.db.prepare('DELETE FROM jobs WHERE id = ? AND claimed_by IS NULL').run(id),
    );
    if (result.changes === 0) {
      const current = this.get(id);
      return current ? { outcome: 'claimed', job: current } : { outcome: 'not_found', job: null };
    }

    this.events?.append({
      kind: 'job.removed',
      jobId: id,
      line: `removed ${job.type}${job.repo ? ` for ${job.repo}` : ''}`,
      payload: { type: job.type, repo: job.repo },
    });
    return { outcome: 'removed', job };
  }

  /**
   * Refresh the heartbeat of a claim held by `workerId`. Returns false when
   * the claim is gone or belongs to someone else.
   */
  touchClaim(id: string, workerId: string, now = new Date()): boolean {
    const result = guard('job.touchClaim', () =>
      this.db
        .prepare('UPDATE jobs SET claimed_at = ? WHERE id = ? AND claimed_by = ?')
        .run(now.toISOString(), id, workerId),
    );
    return result.changes > 0;
  }

  /**
   * Return claims whose heartbeat is older than `leaseMs` to the pending
   * state. Live claims are untouched. Returns how many were released.
   */
  releaseStaleClaims(leaseMs: number, now = new Date()): number {
    const cutoff = new Date(now.getTime() - leaseMs).toISOString();
    const result = guard('job.releaseStaleClaims', () =>
      this.db
        .prepare(
          `UPDATE jobs SET claimed_by = NULL, claimed_at = NULL
           WHERE claimed_by IS NOT NULL AND (claimed_at IS NULL OR claimed_at < ?)`,
        )
        .run(cutoff),
    );
    return result.changes;
  }

  /** Whether an unclaimed job of `type` for `repo` is waiting. */
  hasPending(type: JobType, repo: string): boolean {
    return guard('job.hasPending', () => {
      const row = this.db
        .prepare<[string, string], { id: string }>(
          'SELECT id FROM jobs WHERE type = ? AND repo = ? AND claimed_by IS NULL LIMIT 1',
        )
        .get(type, repo);
      return row !== undefined;
    });
  }

  private toJob(row: JobRow): QueuedJob {
    if (!isJobType(row.type) || !isJobMode(row.mode)) {
      throw new StorageError(`Job ${row.id} has an unreadable type or mode`, 'job.read');
    }
    return {
      seq: row.seq,
      id: row.id,
      type: row.type,
      mode: row.mode,
      repo: row.repo,
      autoPr: row.auto_pr === 1,
      enqueuedAt: row.enqueued_at,
      claimedBy: row.claimed_by,
      claimedAt: row.claimed_at,
    };
  }
}
