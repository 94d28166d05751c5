// packages/server/src/routes/events.ts — Pull endpoint and the SSE push channel

import { EVENT_BUFFER_SIZE, MAX_RECENT_EVENTS } from '@vigil/core';
import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import { StreamConnection } from '../stream/connection.js';
import type { EventFeed } from '../stream/event-feed.js';
import type { AppEnv, GatewayDeps } from '../types.js';
import { intParam, secondsParam } from './params.js';

export interface EventRouteDeps extends Pick<GatewayDeps, 'events' | 'config'> {
  feed: EventFeed;
  /** Open connections, so shutdown can close them */
  connections: Set<StreamConnection>;
}

export function eventRoutes(deps: EventRouteDeps): Hono<AppEnv> {
  const router = new Hono<AppEnv>();
  const { events, config, feed, connections } = deps;

  router.get('/recent', (c) => {
    const n = intParam(c.req.query('n'), 'n', config.recentLimit, 0, MAX_RECENT_EVENTS);
    return c.json({ events: events.tail(n) });
  });

  router.get('/stream', (c) => {
    const replay = intParam(c.req.query('replay'), 'replay', config.replay, 0, EVENT_BUFFER_SIZE);
    const heartbeatSec = secondsParam(c.req.query('heartbeat'), 'heartbeat', config.heartbeatSec);
    const logger = c.get('logger');

    return streamSSE(c, async (stream) => {
      const connection = new StreamConnection({
        sink: (frame) => stream.writeSSE(frame),
        bufferSize: config.bufferSize,
        heartbeatMs: heartbeatSec * 1000,
        logger,
      });

      // Subscribe and snapshot in one synchronous step so no event falls between them.
      const unsubscribe = feed.subscribe((event) => connection.offer(event));
      const replayed = events.tail(replay);
      const cursor = replayed.at(-1)?.seq ?? events.lastSeq();
      connection.open(replayed, cursor);

      connections.add(connection);
      stream.onAbort(() => connection.close('client disconnected'));
      logger.debug(`Stream client connected (replay ${replayed.length}, cursor ${cursor})`);

      try {
        await connection.run();
      } finally {
        unsubscribe();
        connections.delete(connection);
      }
    });
  });

  return router;
}
