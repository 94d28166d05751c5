import {
  DEFAULT_CONFIG,
  EventLog,
  JobQueue,
  OverviewService,
  SseParser,
  createLogger,
  openDatabase,
  type GatewayConfig,
  type SseFrame,
  type WorkerStatusProbe,
} from '@vigil/core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createGateway, type Gateway } from '../src/app.js';

const API_KEY = 'test-key';
const auth = { 'x-api-key': API_KEY };

const probe: WorkerStatusProbe = {
  status: async () => {
    throw new Error('systemctl: command not found');
  },
};

function gatewayConfig(overrides: Partial<GatewayConfig> = {}): GatewayConfig {
  return {
    ...DEFAULT_CONFIG.gateway,
    feedPollMs: 20,
    auth: { enabled: true, apiKey: API_KEY },
    ...overrides,
  };
}

async function openStream(gateway: Gateway, path: string, headers: Record<string, string> = auth) {
  const res = await gateway.app.request(path, { headers });
  const body = res.body;
  if (!body) throw new Error('stream response has no body');
  const reader = body.getReader();
  const decoder = new TextDecoder();
  const parser = new SseParser();
  const pending: SseFrame[] = [];

  return {
    res,
    /** Read until `count` frames are available and return them. */
    async take(count: number): Promise<SseFrame[]> {
      while (pending.length < count) {
        const { done, value } = await reader.read();
        if (done) throw new Error(`stream ended after ${pending.length} frame(s)`);
        pending.push(...parser.push(decoder.decode(value, { stream: true })));
      }
      return pending.splice(0, count);
    },
    async ended(): Promise<boolean> {
      const { done } = await reader.read();
      return done;
    },
    cancel: () => reader.cancel(),
  };
}

describe('gateway', () => {
  let db: ReturnType<typeof openDatabase>;
  let events: EventLog;
  let queue: JobQueue;
  let gateway: Gateway;

  function build(config: GatewayConfig = gatewayConfig()): Gateway {
    gateway?.close();
    gateway = createGateway({
      queue,
      events,
      overview: new OverviewService(queue, events, probe, ['org/a']),
      config,
      logger: createLogger('error'),
    });
    return gateway;
  }

  beforeEach(() => {
    db = openDatabase(':memory:');
    events = new EventLog(db);
    queue = new JobQueue(db, events);
    build();
  });

  afterEach(() => {
    gateway.close();
    if (db.open) db.close();
  });

  describe('health', () => {
    it('answers liveness without a key', async () => {
      const res = await gateway.app.request('/healthz');
      expect(res.status).toBe(200);
      expect(await res.text()).toBe('ok');
    });

    it('reports readiness from storage', async () => {
      const res = await gateway.app.request('/readyz');
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ready', queue: 0, lastSeq: 0 });
    });

    it('is not ready once storage is gone', async () => {
      db.close();
      const res = await gateway.app.request('/readyz');
      expect(res.status).toBe(503);
    });
  });

  describe('auth', () => {
    it('rejects a missing key', async () => {
      const res = await gateway.app.request('/api/jobs');
      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: 'missing_api_key' });
    });

    it('rejects a wrong key', async () => {
      const res = await gateway.app.request('/api/jobs', { headers: { 'x-api-key': 'wrong-key' } });
      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: 'invalid_api_key' });
    });

    it('accepts the key as a query parameter on the stream only', async () => {
      const stream = await openStream(gateway, `/api/events/stream?replay=0&api_key=${API_KEY}`, {});
      expect(stream.res.status).toBe(200);
      const [ready] = await stream.take(1);
      expect(ready.event).toBe('ready');
      await stream.cancel();

      const res = await gateway.app.request(`/api/jobs?api_key=${API_KEY}`);
      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: 'missing_api_key' });
    });

    it('fails closed when enabled without a configured key', async () => {
      build(gatewayConfig({ auth: { enabled: true } }));
      const res = await gateway.app.request('/api/jobs', { headers: auth });
      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({ error: 'auth_not_configured' });
    });

    it('lets everything through when disabled', async () => {
      build(gatewayConfig({ auth: { enabled: false } }));
      const res = await gateway.app.request('/api/jobs');
      expect(res.status).toBe(200);
    });
  });

  describe('jobs', () => {
    it('accepts a submission with 202', async () => {
      const res = await gateway.app.request('/api/jobs/submit', {
        method: 'POST',
        headers: { ...auth, 'content-type': 'application/json' },
        body: JSON.stringify({ type: 'ScanChanged', mode: 'changed', repo: 'org/x' }),
      });
      expect(res.status).toBe(202);
      const body = await res.json();
      expect(body.enqueued).toBe(true);
      expect(body.job).toMatchObject({ type: 'ScanChanged', mode: 'changed', repo: 'org/x', autoPr: true });
      expect(queue.peekAll().map((j) => j.id)).toEqual([body.job.id]);
    });

    it('rejects an invalid submission with every issue', async () => {
      const res = await gateway.app.request('/api/jobs/submit', {
        method: 'POST',
        headers: { ...auth, 'content-type': 'application/json' },
        body: JSON.stringify({ type: 'Nope', repo: 'x' }),
      });
      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.error).toBe('validation_failed');
      expect(body.issues.map((i: { path: string }) => i.path).sort()).toEqual(['repo', 'type']);
      expect(queue.size()).toBe(0);
    });

    it('rejects a body that is not JSON', async () => {
      const res = await gateway.app.request('/api/jobs/submit', {
        method: 'POST',
        headers: { ...auth, 'content-type': 'application/json' },
        body: '{type:',
      });
      expect(res.status).toBe(400);
    });

    it('lists the queue', async () => {
      const id = queue.submit({ type: 'PRSweep' });
      const res = await gateway.app.request('/api/jobs', { headers: auth });
      const body = await res.json();
      expect(body.size).toBe(1);
      expect(body.items[0].id).toBe(id);
    });

    it('removes a pending job and records it', async () => {
      const id = queue.submit({ type: 'PRSweep' });
      const res = await gateway.app.request(`/api/jobs/${id}`, { method: 'DELETE', headers: auth });
      expect(res.status).toBe(204);
      expect(queue.size()).toBe(0);
      expect(events.tail(1)[0]).toMatchObject({ kind: 'job.removed', jobId: id });

      const again = await gateway.app.request(`/api/jobs/${id}`, { method: 'DELETE', headers: auth });
      expect(again.status).toBe(204);
    });

    it('refuses to remove a running job', async () => {
      const id = queue.submit({ type: 'PRSweep' });
      queue.claimNext('w1');
      const res = await gateway.app.request(`/api/jobs/${id}`, { method: 'DELETE', headers: auth });
      expect(res.status).toBe(409);
      expect(queue.size()).toBe(1);
    });
  });

  describe('rate limit', () => {
    it('answers 429 once a client spends its budget', async () => {
      build(gatewayConfig({ rateLimit: { requests: 2, windowSec: 60 } }));
      const from = (ip: string) => ({ ...auth, 'x-forwarded-for': ip });

      expect((await gateway.app.request('/api/jobs', { headers: from('10.0.0.1') })).status).toBe(200);
      expect((await gateway.app.request('/api/jobs', { headers: from('10.0.0.1') })).status).toBe(200);
      const limited = await gateway.app.request('/api/jobs', { headers: from('10.0.0.1') });
      expect(limited.status).toBe(429);
      expect(await limited.json()).toEqual({ error: 'rate_limited' });

      expect((await gateway.app.request('/api/jobs', { headers: from('10.0.0.2') })).status).toBe(200);
      expect((await gateway.app.request('/healthz', { headers: from('10.0.0.1') })).status).toBe(200);
    });

    it('is off with a budget of 0', async () => {
      build(gatewayConfig({ rateLimit: { requests: 0, windowSec: 60 } }));
      for (let i = 0; i < 5; i++) {
        expect((await gateway.app.request('/api/jobs', { headers: auth })).status).toBe(200);
      }
    });
  });

  describe('reads', () => {
    it('returns the newest events oldest first', async () => {
      for (let i = 1; i <= 4; i++) events.append({ kind: 'tick', line: String(i) });
      const res = await gateway.app.request('/api/events/recent?n=2', { headers: auth });
      const body = await res.json();
      expect(body.events.map((e: { line: string }) => e.line)).toEqual(['3', '4']);
    });

    it('returns no events for n=0', async () => {
      events.append({ kind: 'tick', line: '1' });
      const res = await gateway.app.request('/api/events/recent?n=0', { headers: auth });
      expect(await res.json()).toEqual({ events: [] });
    });

    it('rejects a non-numeric n', async () => {
      const res = await gateway.app.request('/api/events/recent?n=lots', { headers: auth });
      expect(res.status).toBe(400);
    });

    it('serves an overview even when the status probe fails', async () => {
      queue.submit({ type: 'ScanAll' });
      const res = await gateway.app.request('/api/overview', { headers: auth });
      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body.worker).toEqual({ activeState: 'unknown', subState: 'unknown' });
      expect(body.queue.size).toBe(1);
      expect(body.events).toHaveLength(1);
    });

    it('lists repository status', async () => {
      const res = await gateway.app.request('/api/repos/status', { headers: auth });
      expect(await res.json()).toEqual({ repos: [{ name: 'org/a' }] });
    });

    it('answers unknown api paths with 404', async () => {
      const res = await gateway.app.request('/api/nothing', { headers: auth });
      expect(res.status).toBe(404);
    });
  });

  describe('stream', () => {
    it('replays, then continues live with no gap or duplicate', async () => {
      for (let i = 1; i <= 3; i++) events.append({ kind: 'tick', line: String(i) });
      const stream = await openStream(gateway, '/api/events/stream?replay=2');
      expect(stream.res.headers.get('content-type')).toContain('text/event-stream');

      const [ready, ...replayed] = await stream.take(3);
      expect(ready.event).toBe('ready');
      expect(JSON.parse(ready.data)).toEqual({ lastSeq: 3, replayed: 2 });
      expect(replayed.map((f) => f.id)).toEqual(['2', '3']);

      events.append({ kind: 'tick', line: '4' });
      const [live] = await stream.take(1);
      expect(live.id).toBe('4');
      expect(live.event).toBe('tick');
      expect(JSON.parse(live.data)).toMatchObject({ seq: 4, kind: 'tick', line: '4' });

      await stream.cancel();
    });

    it('goes straight to live with replay=0', async () => {
      events.append({ kind: 'old' });
      const stream = await openStream(gateway, '/api/events/stream?replay=0');
      const [ready] = await stream.take(1);
      expect(JSON.parse(ready.data)).toEqual({ lastSeq: 1, replayed: 0 });

      events.append({ kind: 'new' });
      const [live] = await stream.take(1);
      expect(live.id).toBe('2');
      await stream.cancel();
    });

    it('delivers events written by another process', async () => {
      const stream = await openStream(gateway, '/api/events/stream?replay=0');
      await stream.take(1);

      new EventLog(db).append({ kind: 'job.started', jobId: 'j9' });
      const [live] = await stream.take(1);
      expect(live.event).toBe('job.started');
      expect(JSON.parse(live.data).jobId).toBe('j9');
      await stream.cancel();
    });

    it('sends heartbeats without writing them to the log', async () => {
      const stream = await openStream(gateway, '/api/events/stream?replay=0&heartbeat=0.05');
      const frames = await stream.take(2);
      expect(frames.map((f) => f.event)).toEqual(['ready', 'heartbeat']);
      expect(events.lastSeq()).toBe(0);
      await stream.cancel();
    });

    it('releases the connection when the client goes away', async () => {
      const stream = await openStream(gateway, '/api/events/stream?replay=0');
      await stream.take(1);
      expect(gateway.connectionCount).toBe(1);
      expect(gateway.feed.subscriberCount).toBe(1);

      await stream.cancel();
      await vi.waitFor(() => {
        expect(gateway.connectionCount).toBe(0);
        expect(gateway.feed.subscriberCount).toBe(0);
      });
    });

    it('ends open streams on shutdown', async () => {
      const stream = await openStream(gateway, '/api/events/stream?replay=0');
      await stream.take(1);
      gateway.close();
      expect(await stream.ended()).toBe(true);
    });

    it('requires the key', async () => {
      const res = await gateway.app.request('/api/events/stream');
      expect(res.status).toBe(401);
    });
  });
});
