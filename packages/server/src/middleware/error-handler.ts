// packages/server/src/middleware/error-handler.ts

import { StorageError, ValidationError, type Logger } from '@vigil/core';
import type { ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';

export function errorHandler(logger: Logger): ErrorHandler {
  return (err, c) => {
    if (err instanceof ValidationError) {
      logger.warn(`${c.req.method} ${c.req.path}: ${err.message}`);
      return c.json({ error: 'validation_failed', message: err.message, issues: err.issues }, 400);
    }
    if (err instanceof HTTPException) {
      logger.warn(`${c.req.method} ${c.req.path}: ${err.status} ${err.message}`);
      return err.getResponse();
    }
    if (err instanceof StorageError) {
      logger.error(`${c.req.method} ${c.req.path}: storage unavailable: ${err.message}`);
      return c.json({ error: 'storage_unavailable' }, 503);
    }
    logger.error(`${c.req.method} ${c.req.path}: ${err.message}`, err.stack);
    return c.json({ error: 'internal_error' }, 500);
  };
}
