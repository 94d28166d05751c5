// packages/server/src/server.ts — Node bootstrap for the gateway

import { mkdirSync } from 'node:fs';
import { serve } from '@hono/node-server';
import {
  EventLog,
  JobQueue,
  OverviewService,
  SystemdStatusProbe,
  openDatabase,
  resolveStatePaths,
  type Logger,
  type VigilConfig,
} from '@vigil/core';
import { createGateway } from './app.js';

export interface RunningGateway {
  url: string;
  close(): Promise<void>;
}

/** Open storage, build the gateway and listen. Resolves once the port is bound. */
export function startGateway(options: {
  config: VigilConfig;
  projectDir: string;
  logger: Logger;
}): Promise<RunningGateway> {
  const { config, projectDir, logger } = options;
  const { stateDir, dbPath } = resolveStatePaths(config, projectDir);
  mkdirSync(stateDir, { recursive: true });

  const db = openDatabase(dbPath);
  const events = new EventLog(db);
  const queue = new JobQueue(db, events);
  const overview = new OverviewService(
    queue,
    events,
    new SystemdStatusProbe(config.worker.unit),
    config.repos,
    logger.child('overview'),
  );
  const gateway = createGateway({ queue, events, overview, config: config.gateway, logger: logger.child('gateway') });

  if (config.gateway.auth.enabled && !config.gateway.auth.apiKey) {
    logger.warn('API key auth is enabled but VIGIL_API_KEY is not set; /api routes will answer 503');
  }

  return new Promise((resolve) => {
    const server = serve(
      { fetch: gateway.app.fetch, port: config.gateway.port, hostname: config.gateway.host },
      (info) => {
        const url = `http://${config.gateway.host}:${info.port}`;
        logger.info(`Gateway listening on ${url}`);
        resolve({
          url,
          close: () =>
            new Promise<void>((done, fail) => {
              gateway.close();
              server.close((err) => {
                db.close();
                if (err) fail(err);
                else done();
              });
            }),
        });
      },
    );
  });
}
