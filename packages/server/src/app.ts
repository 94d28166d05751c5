// packages/server/src/app.ts — Gateway HTTP application

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { apiKeyAuth } from './middleware/auth.js';
import { errorHandler } from './middleware/error-handler.js';
import { rateLimit } from './middleware/rate-limit.js';
import { requestLogger } from './middleware/request-logger.js';
import { eventRoutes } from './routes/events.js';
import { healthRoutes } from './routes/health.js';
import { jobRoutes } from './routes/jobs.js';
import { overviewRoutes } from './routes/overview.js';
import type { StreamConnection } from './stream/connection.js';
import { EventFeed } from './stream/event-feed.js';
import type { AppEnv, GatewayDeps } from './types.js';

export interface Gateway {
  app: Hono<AppEnv>;
  feed: EventFeed;
  /** Number of open push connections */
  readonly connectionCount: number;
  /** Close every push connection and stop tailing the log. */
  close(): void;
}

export function createGateway(deps: GatewayDeps): Gateway {
  const { config, logger } = deps;
  const feed = new EventFeed(deps.events, config.feedPollMs, logger.child('feed'));
  const connections = new Set<StreamConnection>();

  const app = new Hono<AppEnv>();
  app.use('*', requestLogger(logger));
  app.use('*', cors({ origin: config.corsOrigins }));
  app.onError(errorHandler(logger));

  app.route('/', healthRoutes(deps));

  app.use('/api/*', rateLimit(config.rateLimit));
  app.use('/api/*', apiKeyAuth(config.auth));
  app.route('/api/jobs', jobRoutes(deps));
  app.route('/api/events', eventRoutes({ events: deps.events, config, feed, connections }));
  app.route('/api', overviewRoutes(deps));

  app.all('/api/*', (c) => c.json({ error: 'not_found' }, 404));

  feed.start();

  return {
    app,
    feed,
    get connectionCount() {
      return connections.size;
    },
    close() {
      for (const connection of connections) connection.close('server shutdown');
      connections.clear();
      feed.stop();
    },
  };
}
