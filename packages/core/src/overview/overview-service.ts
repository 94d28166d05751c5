// packages/core/src/overview/overview-service.ts — Read-only view over queue, log and worker status

import type { EventLog } from '../storage/event-log.js';
import type { JobQueue } from '../storage/job-queue.js';
import type { WorkerStatus, WorkerStatusProbe } from '../types/collaborators.js';
import type { VigilEvent } from '../types/events.js';
import type { OverviewSnapshot, RepoStatus } from '../types/overview.js';
import { EVENT_BUFFER_SIZE } from '../utils/constants.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

const UNKNOWN_STATUS: WorkerStatus = { activeState: 'unknown', subState: 'unknown' };

/** Repositories an event is about, read from its payload. */
function reposOf(event: VigilEvent): string[] {
  const payload = event.payload;
  if (!payload) return [];
  const found: string[] = [];
  if (typeof payload.repo === 'string') found.push(payload.repo);
  if (Array.isArray(payload.repos)) {
    for (const repo of payload.repos) {
      if (typeof repo === 'string' && !found.includes(repo)) found.push(repo);
    }
  }
  return found;
}

export class OverviewService {
  constructor(
    private readonly queue: JobQueue,
    private readonly events: EventLog,
    private readonly probe: WorkerStatusProbe,
    private readonly repos: string[] = [],
    private readonly logger?: Logger,
  ) {}

  /** Worker status, degraded to unknown when the probe fails. */
  async workerStatus(): Promise<WorkerStatus> {
    try {
      return await this.probe.status();
    } catch (err) {
      this.logger?.warn(`Worker status unavailable: ${errorMessage(err)}`);
      return { ...UNKNOWN_STATUS };
    }
  }

  async snapshot(n: number = EVENT_BUFFER_SIZE): Promise<OverviewSnapshot> {
    const worker = await this.workerStatus();
    return {
      worker,
      queue: this.queue.snapshot(),
      events: this.events.tail(n),
    };
  }

  /**
   * Latest event per repository within the newest `n` events.
   * Configured repositories are listed even when nothing mentions them.
   */
  repoStatus(n: number = EVENT_BUFFER_SIZE): { repos: RepoStatus[] } {
    const latest = new Map<string, VigilEvent>();
    for (const event of this.events.tail(n)) {
      for (const repo of reposOf(event)) latest.set(repo, event);
    }

    const names = [...new Set([...this.repos, ...latest.keys()])].sort();
    return {
      repos: names.map((name) => {
        const lastEvent = latest.get(name);
        return lastEvent ? { name, lastEvent } : { name };
      }),
    };
  }
}
