// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';

export interface CommandConfig {
  command: string;
  args: string[];
  timeoutSec: number;
}

export interface CheckConfig extends CommandConfig {
  name: string;
}

export interface WorkerConfig {
  id?: string;
  pollMs: number;
  idleBackoff: boolean;
  maxIdleMs: number;
  /** Claims not refreshed within this window are returned to the queue */
  leaseMs: number;
  /** systemd unit the status probe asks about */
  unit: string;
}

export interface GatewayAuthConfig {
  enabled: boolean;
  apiKey?: string;
}

export interface RateLimitConfig {
  /** Requests allowed per client per window; 0 turns the limiter off */
  requests: number;
  windowSec: number;
}

export interface GatewayConfig {
  host: string;
  port: number;
  replay: number;
  heartbeatSec: number;
  bufferSize: number;
  feedPollMs: number;
  recentLimit: number;
  corsOrigins: string[];
  rateLimit: RateLimitConfig;
  auth: GatewayAuthConfig;
}

export interface ClientConfig {
  pollIntervalMs: number;
  pushRetryMs: number;
  bufferSize: number;
}

export interface VigilConfig {
  stateDir: string;
  /** Repositories swept when a job names none */
  repos: string[];
  /** Local checkout root; `<reposRoot>/<name>` is handed to commands as {dir} */
  reposRoot: string;
  worker: WorkerConfig;
  gateway: GatewayConfig;
  client: ClientConfig;
  checks: CheckConfig[];
  publisher?: CommandConfig;
  logLevel: LogLevel;
}
