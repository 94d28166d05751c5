// packages/cli/src/commands/watch.ts — Watch a working tree and queue a scan per burst of changes

import { resolve } from 'node:path';
import { REPO_PATTERN, ValidationError, errorMessage, repoDir, type JobQueue, type Logger } from '@vigil/core';
import chalk from 'chalk';
import { watch } from 'chokidar';

import { type GlobalOptions, onShutdownSignal, printJson, withContext } from '../utils.js';
import { type ChangeBatch, DEFAULT_DEBOUNCE, Debouncer } from '../watch/debouncer.js';

export interface WatchOptions extends GlobalOptions {
  path?: string;
  autoPr?: boolean;
  quietMs?: number;
  maxWaitMs?: number;
  cooldownMs?: number;
}

export interface WatchBatchEvent {
  type: 'watch_batch';
  batchId: string;
  repo: string;
  files: number;
  reason: ChangeBatch['reason'];
  /** Queued job id, or null when a scan for the repo was already waiting */
  jobId: string | null;
  ts: string;
}

const IGNORED = [
  '**/node_modules/**',
  '**/.git/**',
  '**/dist/**',
  '**/.vigil/**',
  '**/coverage/**',
  '**/*.db',
  '**/*.db-journal',
  '**/*.db-wal',
];

/** Submit one ScanChanged job per batch unless one is already pending for the repo. */
export function createBatchHandler(
  queue: JobQueue,
  repo: string,
  autoPr: boolean,
): (batch: ChangeBatch) => WatchBatchEvent {
  return (batch) => {
    const jobId = queue.hasPending('ScanChanged', repo)
      ? null
      : queue.submit({ type: 'ScanChanged', mode: 'changed', repo, auto_pr: autoPr });
    return {
      type: 'watch_batch',
      batchId: batch.batchId,
      repo,
      files: batch.paths.length,
      reason: batch.reason,
      jobId,
      ts: new Date().toISOString(),
    };
  };
}

/**
 * Debouncer flush callback. Runs on a timer, so a failed submission is logged
 * and the watcher keeps going; the next batch tries again.
 */
export function createFlushHandler(
  handle: (batch: ChangeBatch) => WatchBatchEvent,
  repo: string,
  logger: Logger,
): (batch: ChangeBatch) => void {
  return (batch) => {
    let event: WatchBatchEvent;
    try {
      event = handle(batch);
    } catch (err) {
      logger.error(`Could not queue batch ${batch.batchId} for ${repo}: ${errorMessage(err)}`);
      return;
    }
    printJson(event);
    if (!event.jobId) {
      console.error(chalk.yellow(`  Skipping batch ${batch.batchId} — a scan for ${repo} is already queued`));
    }
  };
}

export async function watchCommand(repo: string, options: WatchOptions): Promise<void> {
  if (!REPO_PATTERN.test(repo)) {
    throw new ValidationError(`Invalid repo "${repo}"`, [{ path: 'repo', message: 'must look like owner/name' }]);
  }

  await withContext(options, async ({ projectDir, config, logger, queue }) => {
    const root = options.path
      ? resolve(projectDir, options.path)
      : repoDir(resolve(projectDir, config.reposRoot), repo);
    const handle = createBatchHandler(queue, repo, options.autoPr ?? true);

    const debouncer = new Debouncer(
      createFlushHandler(handle, repo, logger.child('watch')),
      {
        quietMs: options.quietMs ?? DEFAULT_DEBOUNCE.quietMs,
        maxWaitMs: options.maxWaitMs ?? DEFAULT_DEBOUNCE.maxWaitMs,
        cooldownMs: options.cooldownMs ?? DEFAULT_DEBOUNCE.cooldownMs,
      },
    );

    const watcher = watch('.', {
      cwd: root,
      ignored: IGNORED,
      ignoreInitial: true,
      awaitWriteFinish: { stabilityThreshold: 200, pollInterval: 50 },
    });
    watcher.on('all', (event, path) => {
      if (event === 'add' || event === 'change' || event === 'unlink') {
        debouncer.push({ path, kind: event, ts: Date.now() });
      }
    });

    console.error(chalk.cyan(`Watching ${root} for ${repo}...`));

    await new Promise<void>((done) => {
      onShutdownSignal(() => {
        console.error(chalk.dim('\nShutting down watcher...'));
        debouncer.flushNow();
        debouncer.destroy();
        done();
      });
    });
    await watcher.close();
  });
}
