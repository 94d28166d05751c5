// packages/cli/src/utils.ts — Shared plumbing for commands: config, storage, logger

import { mkdirSync } from 'node:fs';
import { resolve } from 'node:path';
import {
  EventLog,
  JobQueue,
  createLogger,
  loadConfig,
  openDatabase,
  resolveStatePaths,
  type Logger,
  type VigilConfig,
} from '@vigil/core';

/** Options every command inherits from the program. */
export interface GlobalOptions {
  dir?: string;
  verbose?: boolean;
}

export interface CommandContext {
  projectDir: string;
  config: VigilConfig;
  logger: Logger;
  db: ReturnType<typeof openDatabase>;
  queue: JobQueue;
  events: EventLog;
}

export function resolveProjectDir(options: GlobalOptions): string {
  return resolve(options.dir ?? process.cwd());
}

export function cliLogger(config: VigilConfig, options: GlobalOptions): Logger {
  return createLogger(options.verbose ? 'debug' : config.logLevel);
}

export function getDbPath(config: VigilConfig, projectDir: string): string {
  const { stateDir, dbPath } = resolveStatePaths(config, projectDir);
  mkdirSync(stateDir, { recursive: true });
  return dbPath;
}

/**
 * Run a command body with the project's storage open. The database is closed
 * however the body ends.
 */
export async function withContext<T>(
  options: GlobalOptions,
  fn: (ctx: CommandContext) => Promise<T> | T,
): Promise<T> {
  const projectDir = resolveProjectDir(options);
  const config = loadConfig({ projectDir });
  const logger = cliLogger(config, options);
  const db = openDatabase(getDbPath(config, projectDir));
  const events = new EventLog(db);
  const queue = new JobQueue(db, events);

  try {
    return await fn({ projectDir, config, logger, db, queue, events });
  } finally {
    db.close();
  }
}

/** Machine-readable output goes to stdout, one JSON document per line. */
export function printJson(value: unknown): void {
  console.log(JSON.stringify(value));
}

/** Call `handler` on the first SIGINT or SIGTERM. Returns a disposer. */
export function onShutdownSignal(handler: (signal: NodeJS.Signals) => void): () => void {
  const listener = (signal: NodeJS.Signals) => handler(signal);
  process.once('SIGINT', listener);
  process.once('SIGTERM', listener);
  return () => {
    process.off('SIGINT', listener);
    process.off('SIGTERM', listener);
  };
}
