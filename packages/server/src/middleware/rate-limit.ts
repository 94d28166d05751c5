// packages/server/src/middleware/rate-limit.ts — Fixed-window request budget per client

import type { RateLimitConfig } from '@vigil/core';
import type { Context, MiddlewareHandler } from 'hono';
import type { AppEnv } from '../types.js';

interface Window {
  start: number;
  count: number;
}

/** Windows are swept once this many clients are tracked */
const SWEEP_THRESHOLD = 1000;

/** First `x-forwarded-for` hop, else the socket peer, else a shared bucket. */
export function clientAddress(c: Context<AppEnv>): string {
  const forwarded = c.req.header('x-forwarded-for')?.split(',')[0]?.trim();
  if (forwarded) return forwarded;
  return c.env?.incoming?.socket.remoteAddress ?? 'unknown';
}

/**
 * Answers 429 once a client has made `requests` calls in the current window.
 * A budget of 0 disables the limiter.
 */
export function rateLimit(
  config: RateLimitConfig,
  now: () => number = () => Date.now(),
): MiddlewareHandler<AppEnv> {
  const windows = new Map<string, Window>();
  const windowMs = config.windowSec * 1000;

  return async (c, next) => {
    if (config.requests === 0) {
      await next();
      return;
    }

    const time = now();
    if (windows.size >= SWEEP_THRESHOLD) {
      for (const [key, window] of windows) {
        if (time - window.start >= windowMs) windows.delete(key);
      }
    }

    const client = clientAddress(c);
    let window = windows.get(client);
    if (!window || time - window.start >= windowMs) {
      window = { start: time, count: 0 };
      windows.set(client, window);
    }

    if (window.count >= config.requests) {
      const retryAfter = Math.max(1, Math.ceil((window.start + windowMs - time) / 1000));
      c.get('logger').warn(`Rate limited ${client}: ${c.req.method} ${c.req.path}`);
      c.header('Retry-After', String(retryAfter));
      return c.json({ error: 'rate_limited' }, 429);
    }

    window.count++;
    await next();
  };
}
