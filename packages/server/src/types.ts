// packages/server/src/types.ts

import type { HttpBindings } from '@hono/node-server';
import type { EventLog, GatewayConfig, JobQueue, Logger, OverviewService } from '@vigil/core';

export interface GatewayDeps {
  queue: JobQueue;
  events: EventLog;
  overview: OverviewService;
  config: GatewayConfig;
  logger: Logger;
}

export type AppEnv = {
  /** Absent when the app is driven through `app.request` rather than a socket */
  Bindings: Partial<HttpBindings>;
  Variables: {
    logger: Logger;
  };
};
