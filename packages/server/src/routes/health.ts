// packages/server/src/routes/health.ts — Liveness and readiness, outside auth

import { StorageError, errorMessage } from '@vigil/core';
import { Hono } from 'hono';
import type { AppEnv, GatewayDeps } from '../types.js';

export function healthRoutes(deps: Pick<GatewayDeps, 'queue' | 'events'>): Hono<AppEnv> {
  const router = new Hono<AppEnv>();

  router.get('/healthz', (c) => c.text('ok'));

  router.get('/readyz', (c) => {
    try {
      const size = deps.queue.size();
      const lastSeq = deps.events.lastSeq();
      return c.json({ status: 'ready', queue: size, lastSeq });
    } catch (err) {
      if (!(err instanceof StorageError)) throw err;
      c.get('logger').warn(`Not ready: ${errorMessage(err)}`);
      return c.json({ status: 'unavailable', error: err.message }, 503);
    }
  });

  return router;
}
