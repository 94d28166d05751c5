// packages/cli/src/commands/overview.ts — One-shot overview of worker, queue and recent events

import { OverviewService, SystemdStatusProbe, type WorkerStatusProbe } from '@vigil/core';
import chalk from 'chalk';

import { type GlobalOptions, printJson, withContext } from '../utils.js';

export interface OverviewOptions extends GlobalOptions {
  n?: number;
  repos?: boolean;
}

export async function overviewCommand(options: OverviewOptions, probe?: WorkerStatusProbe): Promise<void> {
  await withContext(options, async ({ config, logger, queue, events }) => {
    const overview = new OverviewService(
      queue,
      events,
      probe ?? new SystemdStatusProbe(config.worker.unit),
      config.repos,
      logger.child('overview'),
    );

    if (options.repos) {
      printJson(overview.repoStatus(options.n));
      return;
    }

    const snapshot = await overview.snapshot(options.n);
    printJson(snapshot);
    console.error(
      chalk.dim(
        `worker ${snapshot.worker.activeState}/${snapshot.worker.subState}, ` +
          `${snapshot.queue.size} queued, ${snapshot.events.length} event(s)`,
      ),
    );
  });
}
