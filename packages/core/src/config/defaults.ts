// packages/core/src/config/defaults.ts

import type { VigilConfig } from '../types/config.js';
import {
  DEFAULT_CLAIM_LEASE_MS,
  DEFAULT_CLIENT_POLL_MS,
  DEFAULT_FEED_POLL_MS,
  DEFAULT_HEARTBEAT_SEC,
  DEFAULT_MAX_IDLE_MS,
  DEFAULT_POLL_MS,
  DEFAULT_PORT,
  DEFAULT_PUSH_RETRY_MS,
  DEFAULT_RATE_LIMIT,
  DEFAULT_RATE_WINDOW_SEC,
  DEFAULT_REPLAY,
  DEFAULT_WORKER_UNIT,
  EVENT_BUFFER_SIZE,
} from '../utils/constants.js';

export const DEFAULT_CONFIG: VigilConfig = {
  stateDir: '.vigil',
  repos: [],
  reposRoot: 'repos',
  worker: {
    pollMs: DEFAULT_POLL_MS,
    idleBackoff: false,
    maxIdleMs: DEFAULT_MAX_IDLE_MS,
    leaseMs: DEFAULT_CLAIM_LEASE_MS,
    unit: DEFAULT_WORKER_UNIT,
  },
  gateway: {
    host: '127.0.0.1',
    port: DEFAULT_PORT,
    replay: DEFAULT_REPLAY,
    heartbeatSec: DEFAULT_HEARTBEAT_SEC,
    bufferSize: EVENT_BUFFER_SIZE,
    feedPollMs: DEFAULT_FEED_POLL_MS,
    recentLimit: EVENT_BUFFER_SIZE,
    corsOrigins: ['http://localhost:3000'],
    rateLimit: {
      requests: DEFAULT_RATE_LIMIT,
      windowSec: DEFAULT_RATE_WINDOW_SEC,
    },
    auth: {
      enabled: true,
    },
  },
  client: {
    pollIntervalMs: DEFAULT_CLIENT_POLL_MS,
    pushRetryMs: DEFAULT_PUSH_RETRY_MS,
    bufferSize: EVENT_BUFFER_SIZE,
  },
  checks: [],
  logLevel: 'info',
};
