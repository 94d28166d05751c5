// packages/core/src/types/collaborators.ts — External capabilities the worker calls into

import type { JobMode } from './jobs.js';

export interface CollaboratorResult {
  success: boolean;
  output: string;
  error?: string;
}

/** Runs static analyzers over one repository. */
export interface CheckRunner {
  run(repo: string, mode: JobMode): Promise<CollaboratorResult>;
}

/** Opens or updates pull requests for a set of repositories. */
export interface PrPublisher {
  publish(repos: string[]): Promise<CollaboratorResult>;
}

export interface WorkerStatus {
  activeState: string;
  subState: string;
  mainPID?: number;
  since?: string;
  lastExit?: string;
}

/** Asks the host's service supervisor about the worker process. */
export interface WorkerStatusProbe {
  status(): Promise<WorkerStatus>;
}
