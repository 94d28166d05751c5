// packages/cli/src/commands/events.ts — Print the event log as JSONL, or follow the gateway live

import {
  EventStreamAdapter,
  loadConfig,
  type StreamMode,
  type StreamState,
  type VigilEvent,
} from '@vigil/core';
import chalk from 'chalk';

import { type GlobalOptions, cliLogger, onShutdownSignal, printJson, resolveProjectDir, withContext } from '../utils.js';

export interface EventsOptions extends GlobalOptions {
  follow?: boolean;
  n?: number;
  sinceSeq?: number;
  job?: string;
  url?: string;
  apiKey?: string;
}

const DEFAULT_TAIL = 50;

/**
 * Turns adapter snapshots into output: each event once, in seq order, and a
 * status line whenever the delivery mode changes.
 */
export class FollowPrinter {
  private lastSeq: number;
  private mode: StreamMode = 'idle';

  constructor(
    private readonly out: (event: VigilEvent) => void,
    private readonly status: (message: string) => void,
    startSeq = 0,
  ) {
    this.lastSeq = startSeq;
  }

  get cursor(): number {
    return this.lastSeq;
  }

  handle(state: StreamState): void {
    if (state.mode !== this.mode) {
      this.mode = state.mode;
      this.status(describeMode(state));
    }
    for (const event of state.events) {
      if (event.seq <= this.lastSeq) continue;
      this.lastSeq = event.seq;
      this.out(event);
    }
  }
}

function describeMode(state: StreamState): string {
  switch (state.mode) {
    case 'push':
      return chalk.green('live: push channel open');
    case 'poll':
      return chalk.yellow(`polling: push unavailable${state.error ? ` (${state.error})` : ''}`);
    case 'idle':
      return chalk.dim('disconnected');
  }
}

export async function eventsCommand(options: EventsOptions): Promise<void> {
  if (options.follow) {
    await followEvents(options);
    return;
  }

  await withContext(options, ({ events }) => {
    let rows: VigilEvent[];
    if (options.job) {
      rows = events.forJob(options.job);
    } else if (options.sinceSeq !== undefined) {
      rows = events.since(options.sinceSeq, options.n ?? DEFAULT_TAIL);
    } else {
      rows = events.tail(options.n ?? DEFAULT_TAIL);
    }
    for (const row of rows) printJson(row);
  });
}

async function followEvents(options: EventsOptions): Promise<void> {
  const config = loadConfig({ projectDir: resolveProjectDir(options) });
  const logger = cliLogger(config, options);
  const baseUrl = options.url ?? `http://${config.gateway.host}:${config.gateway.port}`;

  const adapter = new EventStreamAdapter({
    baseUrl,
    apiKey: options.apiKey ?? config.gateway.auth.apiKey,
    pollIntervalMs: config.client.pollIntervalMs,
    pushRetryMs: config.client.pushRetryMs,
    bufferSize: config.client.bufferSize,
    replay: options.n,
    logger: logger.child('stream'),
  });

  const printer = new FollowPrinter(printJson, (message) => console.error(message), options.sinceSeq);
  adapter.on('change', (state) => printer.handle(state));

  console.error(chalk.dim(`Following ${baseUrl} ... (Ctrl+C to stop)`));
  await new Promise<void>((resolve) => {
    onShutdownSignal(() => {
      adapter.close();
      resolve();
    });
    adapter.start();
  });
}
