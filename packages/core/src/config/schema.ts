// packages/core/src/config/schema.ts

import { z } from 'zod';
import type { VigilConfig } from '../types/config.js';
import { REPO_PATTERN } from '../types/jobs.js';
import {
  COLLABORATOR_TIMEOUT_SEC,
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
  MAX_RECENT_EVENTS,
} from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

const commandConfigSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  timeoutSec: z.number().int().positive().default(COLLABORATOR_TIMEOUT_SEC),
});

const checkConfigSchema = commandConfigSchema.extend({
  name: z.string().min(1),
});

const workerConfigSchema = z.object({
  id: z.string().min(1).optional(),
  pollMs: z.number().int().positive().default(DEFAULT_POLL_MS),
  idleBackoff: z.boolean().default(false),
  maxIdleMs: z.number().int().positive().default(DEFAULT_MAX_IDLE_MS),
  leaseMs: z.number().int().positive().default(DEFAULT_CLAIM_LEASE_MS),
  unit: z.string().min(1).default(DEFAULT_WORKER_UNIT),
});

const gatewayConfigSchema = z.object({
  host: z.string().min(1).default('127.0.0.1'),
  port: z.number().int().min(0).max(65535).default(DEFAULT_PORT),
  replay: z.number().int().nonnegative().max(EVENT_BUFFER_SIZE).default(DEFAULT_REPLAY),
  heartbeatSec: z.number().positive().default(DEFAULT_HEARTBEAT_SEC),
  bufferSize: z.number().int().positive().default(EVENT_BUFFER_SIZE),
  feedPollMs: z.number().int().positive().default(DEFAULT_FEED_POLL_MS),
  recentLimit: z.number().int().positive().max(MAX_RECENT_EVENTS).default(EVENT_BUFFER_SIZE),
  corsOrigins: z.array(z.string()).default(['http://localhost:3000']),
  rateLimit: z
    .object({
      requests: z.number().int().nonnegative().default(DEFAULT_RATE_LIMIT),
      windowSec: z.number().int().positive().default(DEFAULT_RATE_WINDOW_SEC),
    })
    .default({}),
  auth: z
    .object({
      enabled: z.boolean().default(true),
      apiKey: z.string().min(1).optional(),
    })
    .default({}),
});

const clientConfigSchema = z.object({
  pollIntervalMs: z.number().int().positive().default(DEFAULT_CLIENT_POLL_MS),
  pushRetryMs: z.number().int().positive().default(DEFAULT_PUSH_RETRY_MS),
  bufferSize: z.number().int().positive().default(EVENT_BUFFER_SIZE),
});

export const configSchema = z
  .object({
    stateDir: z.string().min(1).default('.vigil'),
    repos: z.array(z.string().regex(REPO_PATTERN, 'must look like owner/name')).default([]),
    reposRoot: z.string().min(1).default('repos'),
    worker: workerConfigSchema.default({}),
    gateway: gatewayConfigSchema.default({}),
    client: clientConfigSchema.default({}),
    checks: z.array(checkConfigSchema).default([]),
    publisher: commandConfigSchema.optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .superRefine((data, ctx) => {
    const names = new Set<string>();
    data.checks.forEach((check, index) => {
      if (names.has(check.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['checks', index, 'name'],
          message: `Duplicate check name "${check.name}"`,
        });
      }
      names.add(check.name);
    });
  });

export type VigilConfigInput = z.input<typeof configSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): VigilConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    const field = result.error.issues[0]?.path.join('.');
    throw new ConfigError(`Invalid configuration: ${issues}`, field);
  }
  return result.data;
}
