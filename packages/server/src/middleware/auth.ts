// packages/server/src/middleware/auth.ts — Shared API key check for /api routes

import { timingSafeEqual } from 'node:crypto';
import type { GatewayAuthConfig } from '@vigil/core';
import type { MiddlewareHandler } from 'hono';
import type { AppEnv } from '../types.js';

function sameKey(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** The one route that takes the key as `?api_key=`, for EventSource clients that cannot set headers */
const QUERY_KEY_PATH = '/api/events/stream';

/**
 * Requires `x-api-key` to match the configured key; the stream route also
 * takes `?api_key=`. Fails closed when auth is enabled but no key is configured.
 */
export function apiKeyAuth(auth: GatewayAuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (!auth.enabled) {
      await next();
      return;
    }

    const logger = c.get('logger');
    if (!auth.apiKey) {
      logger.error('API key auth is enabled but no key is configured');
      return c.json({ error: 'auth_not_configured' }, 503);
    }

    const given =
      c.req.header('x-api-key') ?? (c.req.path === QUERY_KEY_PATH ? c.req.query('api_key') : undefined);
    if (!given) {
      logger.warn(`Rejected ${c.req.method} ${c.req.path}: missing API key`);
      return c.json({ error: 'missing_api_key' }, 401);
    }
    if (!sameKey(given, auth.apiKey)) {
      logger.warn(`Rejected ${c.req.method} ${c.req.path}: invalid API key`);
      return c.json({ error: 'invalid_api_key' }, 401);
    }

    await next();
  };
}
