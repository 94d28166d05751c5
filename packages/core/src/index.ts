// @vigil/core - job queue, event log, worker loop and event stream client

export const VERSION = '0.3.0';

// Type definitions
export type {
  // Config
  CommandConfig,
  CheckConfig,
  WorkerConfig,
  GatewayAuthConfig,
  GatewayConfig,
  RateLimitConfig,
  ClientConfig,
  VigilConfig,
  // Jobs
  JobType,
  JobMode,
  Job,
  QueuedJob,
  JobSpec,
  ParsedJobSpec,
  QueueSnapshot,
  // Events
  KnownEventKind,
  NewEvent,
  VigilEvent,
  // Collaborators
  CollaboratorResult,
  CheckRunner,
  PrPublisher,
  WorkerStatus,
  WorkerStatusProbe,
  // Overview
  OverviewSnapshot,
  RepoStatus,
} from './types/index.js';

export { JOB_TYPES, JOB_MODES, REPO_PATTERN, jobSpecSchema, isVigilEvent } from './types/index.js';

// Config
export {
  CONFIG_FILENAME,
  DEFAULT_CONFIG,
  configSchema,
  loadConfig,
  resolveStatePaths,
  validateConfig,
  writeConfig,
} from './config/index.js';
export type { DeepPartial, VigilConfigInput } from './config/index.js';

// Storage
export { openDatabase, runMigrations, getSchemaVersion, EventLog, JobQueue } from './storage/index.js';
export type { EventListener, WithdrawResult } from './storage/index.js';

// Engine
export { CancellationToken, WorkerLoop } from './engine/index.js';
export type { WorkerLoopOptions, WorkerStats } from './engine/index.js';

// Collaborators
export {
  CommandCheckRunner,
  CommandPrPublisher,
  SystemdStatusProbe,
  parseSystemctlShow,
  runCommand,
  expandArgs,
  repoDir,
} from './collaborators/index.js';
export type { CommandVars, ExecFn, ExecOptions } from './collaborators/index.js';

// Overview
export { OverviewService } from './overview/index.js';

// Client stream
export { EventStreamAdapter, PushEventSource, PollEventSource, SseParser, gatewayRequest } from './stream/index.js';
export type {
  EventStreamAdapterDeps,
  EventSourceHandlers,
  EventSourceStrategy,
  FetchFn,
  SseFrame,
  StreamClientOptions,
  StreamMode,
  StreamState,
} from './stream/index.js';

// Utils
export {
  generateJobId,
  generateId,
  createLogger,
  ConfigError,
  ValidationError,
  CollaboratorError,
  TransportError,
  StorageError,
  errorMessage,
} from './utils/index.js';
export type { Logger, LogLevel, ValidationIssue } from './utils/index.js';

// Constants
export {
  DEFAULT_POLL_MS,
  DEFAULT_MAX_IDLE_MS,
  DEFAULT_CLAIM_LEASE_MS,
  EVENT_BUFFER_SIZE,
  DEFAULT_REPLAY,
  DEFAULT_HEARTBEAT_SEC,
  DEFAULT_FEED_POLL_MS,
  DEFAULT_CLIENT_POLL_MS,
  DEFAULT_PUSH_RETRY_MS,
  MAX_RECENT_EVENTS,
  DEFAULT_PORT,
  DEFAULT_RATE_LIMIT,
  DEFAULT_RATE_WINDOW_SEC,
} from './utils/constants.js';
