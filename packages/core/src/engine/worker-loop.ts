// packages/core/src/engine/worker-loop.ts — Single consumer: claim, execute, record, remove

import type { EventLog } from '../storage/event-log.js';
import type { JobQueue } from '../storage/job-queue.js';
import type { CheckRunner, CollaboratorResult, PrPublisher } from '../types/collaborators.js';
import type { WorkerConfig } from '../types/config.js';
import type { JobMode, QueuedJob } from '../types/jobs.js';
import { OUTPUT_MAX_CHARS } from '../utils/constants.js';
import { CollaboratorError, StorageError, errorMessage } from '../utils/errors.js';
import { generateId } from '../utils/id.js';
import type { Logger } from '../utils/logger.js';
import { CancellationToken } from './cancellation.js';

export interface WorkerLoopOptions {
  queue: JobQueue;
  events: EventLog;
  checks: CheckRunner;
  publisher: PrPublisher;
  worker: WorkerConfig;
  /** Repositories used when a job names none */
  repos: string[];
  logger?: Logger;
}

export interface WorkerStats {
  processed: number;
  succeeded: number;
  failed: number;
}

interface JobOutcome {
  line: string;
  repos: string[];
}

interface RepoFailure {
  repo: string;
  error: unknown;
}

function tailOutput(output: string): string {
  return output.length > OUTPUT_MAX_CHARS ? output.slice(-OUTPUT_MAX_CHARS) : output;
}

export class WorkerLoop {
  readonly workerId: string;
  private token: CancellationToken | null = null;
  private readonly stats: WorkerStats = { processed: 0, succeeded: 0, failed: 0 };

  constructor(private readonly options: WorkerLoopOptions) {
    this.workerId = options.worker.id ?? generateId('worker');
  }

  get running(): boolean {
    return this.token !== null;
  }

  get counters(): WorkerStats {
    return { ...this.stats };
  }

  /**
   * Process jobs until `stop()` is called. Claims whose heartbeat lapsed are
   * returned to the queue at start and whenever the loop is idle. Rejects
   * only with StorageError.
   */
  async run(): Promise<void> {
    if (this.token) throw new Error('Worker loop is already running');
    const token = new CancellationToken();
    this.token = token;
    const { events, worker, logger } = this.options;

    try {
      this.recoverStaleClaims();
      events.append({ kind: 'worker.started', line: `worker ${this.workerId} started`, payload: { workerId: this.workerId } });
      logger?.info(`Worker ${this.workerId} started`);

      let idleMs = worker.pollMs;
      while (!token.isCancelled) {
        const job = await this.runOnce();
        if (job) {
          idleMs = worker.pollMs;
          continue;
        }
        this.recoverStaleClaims();
        await token.sleep(idleMs);
        if (worker.idleBackoff) idleMs = Math.min(idleMs * 2, worker.maxIdleMs);
      }

      events.append({
        kind: 'worker.stopped',
        line: `worker ${this.workerId} stopped (${token.reason ?? 'stopped'})`,
        payload: { workerId: this.workerId, ...this.stats },
      });
      logger?.info(`Worker ${this.workerId} stopped`);
    } finally {
      this.token = null;
    }
  }

  /** Ask the loop to exit once the in-flight job, if any, has finished. */
  stop(reason = 'stop requested'): void {
    this.token?.cancel(reason);
  }

  /** Claim and execute at most one job. Returns the job, or null when idle. */
  async runOnce(): Promise<QueuedJob | null> {
    const { queue } = this.options;
    const job = queue.claimNext(this.workerId);
    if (!job) return null;
    const stopHeartbeat = this.startHeartbeat(job);
    try {
      await this.execute(job);
    } finally {
      stopHeartbeat();
    }
    queue.remove(job.id);
    return job;
  }

  private recoverStaleClaims(): void {
    const { queue, events, worker, logger } = this.options;
    const recovered = queue.releaseStaleClaims(worker.leaseMs);
    if (recovered === 0) return;
    logger?.warn(`Returned ${recovered} abandoned job(s) to the queue`);
    events.append({
      kind: 'queue.recovered',
      line: `requeued ${recovered} abandoned job(s)`,
      payload: { count: recovered },
    });
  }

  /** Keep the claim on `job` fresh so other workers leave it alone. */
  private startHeartbeat(job: QueuedJob): () => void {
    const { queue, worker, logger } = this.options;
    const timer = setInterval(() => {
      try {
        if (!queue.touchClaim(job.id, this.workerId)) {
          logger?.warn(`Claim on ${job.id} is no longer held by ${this.workerId}`);
        }
      } catch (err) {
        logger?.error(`Heartbeat for ${job.id} failed: ${errorMessage(err)}`);
      }
    }, Math.max(1, Math.floor(worker.leaseMs / 4)));
    timer.unref();
    return () => clearInterval(timer);
  }

  private async execute(job: QueuedJob): Promise<void> {
    const { events, logger } = this.options;
    const log = logger?.child(job.id);

    events.append({
      kind: 'job.started',
      jobId: job.id,
      line: `${job.type} started${job.repo ? ` for ${job.repo}` : ''}`,
      payload: { type: job.type, mode: job.mode, repo: job.repo, workerId: this.workerId },
    });
    log?.info(`Started ${job.type}`);
    this.stats.processed++;

    let outcome: JobOutcome;
    try {
      outcome = await this.dispatch(job);
    } catch (err) {
      if (err instanceof StorageError) throw err;
      const message = errorMessage(err);
      this.stats.failed++;
      log?.error(`Failed: ${message}`);
      events.append({
        kind: 'job.failed',
        jobId: job.id,
        line: `${job.type} failed: ${message}`,
        payload: {
          type: job.type,
          repo: job.repo,
          error: message,
          ...(err instanceof CollaboratorError ? { collaborator: err.collaborator } : {}),
          ...(err instanceof CollaboratorError && err.repos ? { failedRepos: err.repos } : {}),
        },
      });
      return;
    }

    this.stats.succeeded++;
    log?.info(outcome.line);
    events.append({
      kind: 'job.succeeded',
      jobId: job.id,
      line: outcome.line,
      payload: { type: job.type, repo: job.repo, repos: outcome.repos },
    });
  }

  private async dispatch(job: QueuedJob): Promise<JobOutcome> {
    const repos = job.repo ? [job.repo] : this.options.repos;
    switch (job.type) {
      case 'ScanChanged':
      case 'ScanAll': {
        const mode: JobMode = job.type === 'ScanAll' ? 'all' : job.mode;
        const failures: RepoFailure[] = [];
        for (const repo of repos) {
          try {
            await this.scan(job, repo, mode);
          } catch (err) {
            if (err instanceof StorageError) throw err;
            failures.push({ repo, error: err });
          }
        }
        if (failures.length > 0) throw this.scanFailure(failures, repos.length);
        return { line: `${job.type} finished for ${repos.length} repo(s)`, repos };
      }
      case 'PRSweep': {
        if (repos.length > 0) {
          const result = await this.options.publisher.publish(repos);
          this.progress(job, 'publish', repos.length === 1 ? repos[0] : null, result, repos);
          if (!result.success) {
            throw new CollaboratorError(result.error ?? 'PR sweep failed', 'pr-publisher', result.output);
          }
        }
        return { line: `PRSweep finished for ${repos.length} repo(s)`, repos };
      }
    }
  }

  /** A single-repo job keeps its own error; otherwise the failures fold into one naming each repo. */
  private scanFailure(failures: RepoFailure[], total: number): unknown {
    if (failures.length === 1 && total === 1) return failures[0].error;
    const first = failures[0].error;
    const detail = failures.map((f) => `${f.repo} (${errorMessage(f.error)})`).join('; ');
    return new CollaboratorError(
      `${failures.length} of ${total} repo(s) failed: ${detail}`,
      first instanceof CollaboratorError ? first.collaborator : 'check-runner',
      first instanceof CollaboratorError ? first.output : undefined,
      failures.map((f) => f.repo),
    );
  }

  private async scan(job: QueuedJob, repo: string, mode: JobMode): Promise<void> {
    const { checks, publisher } = this.options;
    let check: CollaboratorResult;
    try {
      check = await checks.run(repo, mode);
    } catch (err) {
      if (err instanceof StorageError) throw err;
      check = { success: false, output: '', error: errorMessage(err) };
    }
    this.progress(job, 'check', repo, check);
    if (!check.success) {
      throw new CollaboratorError(check.error ?? `checks failed for ${repo}`, 'check-runner', check.output);
    }

    if (job.autoPr) {
      const pr = await publisher.publish([repo]);
      this.progress(job, 'publish', repo, pr);
      if (!pr.success) {
        throw new CollaboratorError(pr.error ?? `PR publish failed for ${repo}`, 'pr-publisher', pr.output);
      }
    }
  }

  private progress(
    job: QueuedJob,
    step: 'check' | 'publish',
    repo: string | null,
    result: CollaboratorResult,
    repos?: string[],
  ): void {
    const target = repo ?? `${repos?.length ?? 0} repos`;
    this.options.events.append({
      kind: 'job.progress',
      jobId: job.id,
      line: `${target}: ${step} ${result.success ? 'ok' : 'failed'}`,
      payload: {
        step,
        repo,
        ...(repos ? { repos } : {}),
        success: result.success,
        output: tailOutput(result.output),
      },
    });
  }
}
