// packages/core/src/types/index.ts -- barrel re-export

export type {
  CommandConfig,
  CheckConfig,
  WorkerConfig,
  GatewayAuthConfig,
  GatewayConfig,
  RateLimitConfig,
  ClientConfig,
  VigilConfig,
} from './config.js';

export { JOB_TYPES, JOB_MODES, REPO_PATTERN, jobSpecSchema } from './jobs.js';
export type { JobType, JobMode, Job, QueuedJob, JobSpec, ParsedJobSpec, QueueSnapshot } from './jobs.js';

export { isVigilEvent } from './events.js';
export type { KnownEventKind, NewEvent, VigilEvent } from './events.js';

export type {
  CollaboratorResult,
  CheckRunner,
  PrPublisher,
  WorkerStatus,
  WorkerStatusProbe,
} from './collaborators.js';

export type { OverviewSnapshot, RepoStatus } from './overview.js';
