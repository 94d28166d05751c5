// packages/core/src/types/overview.ts

import type { WorkerStatus } from './collaborators.js';
import type { VigilEvent } from './events.js';
import type { QueueSnapshot } from './jobs.js';

export interface OverviewSnapshot {
  worker: WorkerStatus;
  queue: QueueSnapshot;
  events: VigilEvent[];
}

export interface RepoStatus {
  name: string;
  lastEvent?: VigilEvent;
}
