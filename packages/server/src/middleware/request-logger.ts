// packages/server/src/middleware/request-logger.ts

import type { Logger } from '@vigil/core';
import type { MiddlewareHandler } from 'hono';
import type { AppEnv } from '../types.js';

/** Injects the logger into the context and logs one line per request. */
export function requestLogger(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    c.set('logger', logger);
    const start = Date.now();
    await next();
    logger.debug(`${c.req.method} ${c.req.path} ${c.res.status} (${Date.now() - start}ms)`);
  };
}
