// packages/server/src/routes/jobs.ts — Submission and queue management

import { ValidationError } from '@vigil/core';
import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { AppEnv, GatewayDeps } from '../types.js';

export function jobRoutes(deps: Pick<GatewayDeps, 'queue'>): Hono<AppEnv> {
  const router = new Hono<AppEnv>();

  router.post('/submit', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      throw new ValidationError('Request body must be JSON', [{ path: '', message: 'invalid JSON' }]);
    }
    const id = deps.queue.submit(body);
    const job = deps.queue.get(id);
    c.get('logger').info(`Enqueued ${id}`);
    return c.json({ enqueued: true, job }, 202);
  });

  router.get('/', (c) => c.json(deps.queue.snapshot()));

  router.delete('/:id', (c) => {
    const id = c.req.param('id');
    const { outcome } = deps.queue.withdraw(id);
    if (outcome === 'claimed') {
      throw new HTTPException(409, { message: `Job ${id} is already running` });
    }
    if (outcome === 'removed') c.get('logger').info(`Removed ${id}`);
    return c.body(null, 204);
  });

  return router;
}
