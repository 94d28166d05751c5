// packages/cli/src/commands/worker.ts — Run the worker loop against the project queue

import { CommandCheckRunner, CommandPrPublisher, WorkerLoop } from '@vigil/core';
import chalk from 'chalk';
import { resolve } from 'node:path';

import { type GlobalOptions, onShutdownSignal, printJson, withContext } from '../utils.js';

export interface WorkerOptions extends GlobalOptions {
  once?: boolean;
  pollMs?: number;
  workerId?: string;
}

export async function workerCommand(options: WorkerOptions): Promise<void> {
  await withContext(options, async ({ projectDir, config, logger, queue, events }) => {
    const reposRoot = resolve(projectDir, config.reposRoot);
    const loop = new WorkerLoop({
      queue,
      events,
      checks: new CommandCheckRunner(config.checks, reposRoot),
      publisher: new CommandPrPublisher(config.publisher, reposRoot),
      worker: {
        ...config.worker,
        id: options.workerId ?? config.worker.id,
        pollMs: options.pollMs ?? config.worker.pollMs,
      },
      repos: config.repos,
      logger: logger.child('worker'),
    });

    if (options.once) {
      const job = await loop.runOnce();
      if (!job) {
        console.error(chalk.dim('No jobs in queue. Exiting (--once mode).'));
        return;
      }
      printJson({ job: job.id, type: job.type, ...loop.counters });
      if (loop.counters.failed > 0) process.exitCode = 1;
      return;
    }

    console.error(
      chalk.cyan(`Worker ${loop.workerId} started (poll: ${options.pollMs ?? config.worker.pollMs}ms)`),
    );
    const dispose = onShutdownSignal((signal) => {
      console.error(chalk.dim(`\n${signal} received, worker shutting down...`));
      loop.stop(signal);
    });

    try {
      await loop.run();
    } finally {
      dispose();
    }

    const { processed, succeeded, failed } = loop.counters;
    console.error(chalk.dim(`Worker stopped. processed=${processed} succeeded=${succeeded} failed=${failed}`));
  });
}
