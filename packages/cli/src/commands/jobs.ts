// packages/cli/src/commands/jobs.ts — Job queue CLI commands

import chalk from 'chalk';

import { type GlobalOptions, printJson, withContext } from '../utils.js';

// ── vigil jobs submit ──

export interface SubmitOptions extends GlobalOptions {
  mode?: string;
  repo?: string;
  autoPr?: boolean;
}

export async function jobsSubmitCommand(type: string, options: SubmitOptions): Promise<void> {
  await withContext(options, ({ queue }) => {
    // The queue validates; unknown types and modes come back as ValidationError
    const id = queue.submit({
      type,
      mode: options.mode,
      repo: options.repo,
      auto_pr: options.autoPr,
    });
    printJson({ enqueued: true, job: id });
    console.error(chalk.green(`Queued ${type} as ${id}`));
  });
}

// ── vigil jobs list ──

export interface ListOptions extends GlobalOptions {
  limit?: number;
}

export async function jobsListCommand(options: ListOptions): Promise<void> {
  await withContext(options, ({ queue }) => {
    const snapshot = queue.snapshot();
    const items = options.limit !== undefined ? snapshot.items.slice(0, options.limit) : snapshot.items;
    printJson({ size: snapshot.size, items });
    if (snapshot.size === 0) {
      console.error(chalk.dim('Queue is empty.'));
    }
  });
}

// ── vigil jobs remove ──

export async function jobsRemoveCommand(jobId: string, options: GlobalOptions): Promise<void> {
  await withContext(options, ({ queue }) => {
    const { outcome, job } = queue.withdraw(jobId);
    printJson({ removed: outcome === 'removed', job: jobId });
    if (outcome === 'not_found') {
      console.error(chalk.yellow(`No pending job ${jobId}`));
      process.exitCode = 1;
    } else if (outcome === 'claimed') {
      console.error(chalk.red(`Job ${jobId} is being processed by ${job?.claimedBy ?? 'a worker'}`));
      process.exitCode = 1;
    }
  });
}
