// packages/server/src/routes/overview.ts

import { EVENT_BUFFER_SIZE, MAX_RECENT_EVENTS } from '@vigil/core';
import { Hono } from 'hono';
import type { AppEnv, GatewayDeps } from '../types.js';
import { intParam } from './params.js';

export function overviewRoutes(deps: Pick<GatewayDeps, 'overview'>): Hono<AppEnv> {
  const router = new Hono<AppEnv>();

  router.get('/overview', async (c) => {
    const n = intParam(c.req.query('n'), 'n', EVENT_BUFFER_SIZE, 0, MAX_RECENT_EVENTS);
    return c.json(await deps.overview.snapshot(n));
  });

  router.get('/repos/status', (c) => {
    const n = intParam(c.req.query('n'), 'n', EVENT_BUFFER_SIZE, 1, MAX_RECENT_EVENTS);
    return c.json(deps.overview.repoStatus(n));
  });

  return router;
}
