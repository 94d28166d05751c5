import { afterEach, describe, expect, it, vi } from 'vitest';
import { EventStreamAdapter } from '../../../src/stream/adapter.js';
import { PushEventSource } from '../../../src/stream/push-source.js';
import type {
  EventSourceHandlers,
  EventSourceStrategy,
  FetchFn,
  StreamClientOptions,
  StreamState,
} from '../../../src/stream/types.js';
import type { VigilEvent } from '../../../src/types/events.js';
import { TransportError } from '../../../src/utils/errors.js';

class FakeSource implements EventSourceStrategy {
  handlers: EventSourceHandlers | null = null;
  stopped = false;

  constructor(readonly kind: 'push' | 'poll') {}

  start(handlers: EventSourceHandlers): void {
    this.handlers = handlers;
  }

  stop(): void {
    this.stopped = true;
  }
}

function ev(seq: number): VigilEvent {
  return { seq, ts: '2024-06-03T10:00:00.000Z', kind: 'tick' };
}

const baseOptions: StreamClientOptions = {
  baseUrl: 'http://gateway.test',
  apiKey: 'test-key',
  pollIntervalMs: 1000,
  pushRetryMs: 5000,
  bufferSize: 3,
};

function setup() {
  const pushes: FakeSource[] = [];
  const polls: FakeSource[] = [];
  const adapter = new EventStreamAdapter(baseOptions, {
    createPush: () => {
      const source = new FakeSource('push');
      pushes.push(source);
      return source;
    },
    createPoll: () => {
      const source = new FakeSource('poll');
      polls.push(source);
      return source;
    },
  });
  return { adapter, pushes, polls };
}

describe('EventStreamAdapter', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('starts idle and disconnected', () => {
    const { adapter } = setup();
    expect(adapter.observe()).toEqual({ connected: false, mode: 'idle', events: [], error: null });
  });

  it('goes live on push open and appends pushed events', () => {
    const { adapter, pushes } = setup();
    adapter.start();
    pushes[0].handlers?.onOpen();
    pushes[0].handlers?.onEvents([ev(1), ev(2)], false);

    const state = adapter.observe();
    expect(state.connected).toBe(true);
    expect(state.mode).toBe('push');
    expect(state.events.map((e) => e.seq)).toEqual([1, 2]);
  });

  it('treats a replace batch from either source as the whole window', () => {
    const { adapter, pushes, polls } = setup();
    adapter.start();
    pushes[0].handlers?.onOpen();
    pushes[0].handlers?.onEvents([ev(4), ev(5)], false);
    pushes[0].handlers?.onEvents([ev(1), ev(2)], true);
    expect(adapter.observe().events.map((e) => e.seq)).toEqual([1, 2]);

    pushes[0].handlers?.onError(new TransportError('Stream closed by gateway'));
    polls[0].handlers?.onEvents([ev(7)], false);
    expect(adapter.observe().events.map((e) => e.seq)).toEqual([1, 2, 7]);
    expect(adapter.observe().error).toBeNull();
    adapter.close();
  });

  it('caps the buffer, dropping the oldest', () => {
    const { adapter, pushes } = setup();
    adapter.start();
    pushes[0].handlers?.onOpen();
    pushes[0].handlers?.onEvents([ev(1), ev(2), ev(3), ev(4), ev(5)], false);
    expect(adapter.observe().events.map((e) => e.seq)).toEqual([3, 4, 5]);
  });

  it('falls back to polling when push fails and lets poll results replace the buffer', () => {
    const { adapter, pushes, polls } = setup();
    adapter.start();
    pushes[0].handlers?.onOpen();
    pushes[0].handlers?.onEvents([ev(1)], false);
    pushes[0].handlers?.onError(new TransportError('Stream closed by gateway'));

    expect(pushes[0].stopped).toBe(true);
    expect(polls).toHaveLength(1);
    expect(adapter.observe()).toMatchObject({ connected: false, mode: 'poll', error: 'Stream closed by gateway' });

    polls[0].handlers?.onEvents([ev(7), ev(8)], true);
    expect(adapter.observe().events.map((e) => e.seq)).toEqual([7, 8]);
    expect(adapter.observe().error).toBeNull();
  });

  it('retries push on a timer and stops polling once it reopens', () => {
    vi.useFakeTimers();
    const { adapter, pushes, polls } = setup();
    adapter.start();
    pushes[0].handlers?.onError(new TransportError('HTTP 502', 502));
    polls[0].handlers?.onEvents([ev(4), ev(5)], true);

    vi.advanceTimersByTime(4999);
    expect(pushes).toHaveLength(1);
    vi.advanceTimersByTime(1);
    expect(pushes).toHaveLength(2);

    pushes[1].handlers?.onOpen();
    expect(polls[0].stopped).toBe(true);
    expect(adapter.observe().mode).toBe('push');

    pushes[1].handlers?.onEvents([ev(4), ev(5), ev(6)], false);
    expect(adapter.observe().events.map((e) => e.seq)).toEqual([4, 5, 6]);
  });

  it('keeps polling and retrying while push keeps failing', () => {
    vi.useFakeTimers();
    const { adapter, pushes, polls } = setup();
    adapter.start();
    pushes[0].handlers?.onError(new TransportError('refused'));
    vi.advanceTimersByTime(5000);
    pushes[1].handlers?.onError(new TransportError('refused again'));

    expect(polls).toHaveLength(1);
    expect(polls[0].stopped).toBe(false);
    expect(adapter.observe().error).toBe('refused again');
    vi.advanceTimersByTime(5000);
    expect(pushes).toHaveLength(3);
  });

  it('records poll errors without leaving poll mode', () => {
    const { adapter, pushes, polls } = setup();
    adapter.start();
    pushes[0].handlers?.onError(new TransportError('down'));
    polls[0].handlers?.onError(new TransportError('Poll request failed: HTTP 401', 401));
    expect(adapter.observe()).toMatchObject({ mode: 'poll', error: 'Poll request failed: HTTP 401' });
  });

  it('notifies change listeners', () => {
    const { adapter, pushes } = setup();
    const seen: StreamState[] = [];
    adapter.on('change', (state) => seen.push(state));
    adapter.start();
    pushes[0].handlers?.onOpen();
    expect(seen.map((s) => s.mode)).toEqual(['push']);
  });

  it('releases everything on close and ignores late callbacks', () => {
    vi.useFakeTimers();
    const { adapter, pushes, polls } = setup();
    adapter.start();
    const first = pushes[0];
    first.handlers?.onError(new TransportError('down'));
    adapter.close();

    expect(polls[0].stopped).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
    expect(adapter.observe()).toMatchObject({ connected: false, mode: 'idle' });

    polls[0].handlers?.onEvents([ev(1)], true);
    expect(adapter.observe().events).toEqual([]);
    adapter.start();
    expect(pushes).toHaveLength(1);
  });
});

describe('EventStreamAdapter with the SSE source', () => {
  function sseResponse(chunks: string[]): { response: Response; end: () => void } {
    const encoder = new TextEncoder();
    let controller: ReadableStreamDefaultController<Uint8Array> | null = null;
    const body = new ReadableStream<Uint8Array>({
      start(c) {
        controller = c;
        for (const chunk of chunks) c.enqueue(encoder.encode(chunk));
      },
    });
    return {
      response: new Response(body, { status: 200, headers: { 'content-type': 'text/event-stream' } }),
      end: () => controller?.close(),
    };
  }

  it('parses pushed frames and falls back to polling within one interval when the stream ends', async () => {
    const stream = sseResponse([
      'event: ready\ndata: {"lastSeq":1}\n\n',
      'id: 1\nevent: job.started\ndata: {"seq":1,"ts":"2024-06-03T10:00:00.000Z","kind":"job.started","jobId":"j1"}\n\n',
      'event: heartbeat\ndata: {}\n\n',
    ]);
    const fetchFn = vi.fn<FetchFn>(async (url) => {
      if (url.includes('/api/events/stream')) return stream.response;
      return Response.json({ events: [ev(1), ev(2)] });
    });

    const adapter = new EventStreamAdapter({ ...baseOptions, pollIntervalMs: 200, fetch: fetchFn }, {
      createPush: (options) => new PushEventSource(options),
    });
    adapter.start();

    await vi.waitFor(() => expect(adapter.observe().events.map((e) => e.jobId)).toEqual(['j1']));
    expect(adapter.observe().connected).toBe(true);
    expect(fetchFn.mock.calls[0][0]).toBe('http://gateway.test/api/events/stream');
    expect(fetchFn.mock.calls[0][1]?.headers).toMatchObject({ 'x-api-key': 'test-key' });

    stream.end();
    await vi.waitFor(
      () => {
        const state = adapter.observe();
        expect(state.connected).toBe(false);
        expect(state.mode).toBe('poll');
        expect(state.events.map((e) => e.seq)).toEqual([1, 2]);
      },
      { timeout: 200, interval: 10 },
    );
    expect(fetchFn.mock.calls[1][0]).toBe('http://gateway.test/api/events/recent?n=3');

    adapter.close();
  });

  it('treats a rejected stream request as a transport failure', async () => {
    const fetchFn = vi.fn<FetchFn>(async (url) =>
      url.includes('/stream') ? new Response('nope', { status: 401 }) : Response.json({ events: [] }),
    );
    const adapter = new EventStreamAdapter({ ...baseOptions, fetch: fetchFn });
    adapter.start();

    await vi.waitFor(() => expect(adapter.observe().mode).toBe('poll'));
    expect(adapter.observe().connected).toBe(false);
    adapter.close();
  });
});
