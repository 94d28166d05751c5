import type { VigilEvent } from '@vigil/core';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { StreamConnection, type StreamFrame } from '../src/stream/connection.js';

function ev(seq: number): VigilEvent {
  return { seq, ts: '2024-06-03T10:00:00.000Z', kind: 'job.progress', jobId: 'j1' };
}

function recordingSink() {
  const frames: StreamFrame[] = [];
  const sink = vi.fn(async (frame: StreamFrame) => {
    frames.push(frame);
  });
  return { frames, sink };
}

describe('StreamConnection', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('sends ready, then the replay, then live events past the cursor', async () => {
    const { frames, sink } = recordingSink();
    const connection = new StreamConnection({ sink, bufferSize: 10, heartbeatMs: 60_000 });
    connection.open([ev(4), ev(5)], 5);
    const done = connection.run();

    connection.offer(ev(5));
    connection.offer(ev(6));
    await vi.waitFor(() => expect(frames).toHaveLength(4));
    connection.close();
    await done;

    expect(frames[0]).toEqual({ event: 'ready', data: '{"lastSeq":5,"replayed":2}' });
    expect(frames.slice(1).map((f) => f.id)).toEqual(['4', '5', '6']);
    expect(frames[3].event).toBe('job.progress');
    expect(JSON.parse(frames[3].data)).toEqual(ev(6));
  });

  it('ignores events offered before it goes live', () => {
    const { sink } = recordingSink();
    const connection = new StreamConnection({ sink, bufferSize: 10, heartbeatMs: 60_000 });
    connection.offer(ev(1));
    expect(connection.lastSeq).toBe(0);
    expect(connection.phase).toBe('replaying');
  });

  it('drops the oldest queued events for a slow client and reports the count', async () => {
    const frames: StreamFrame[] = [];
    let release: () => void = () => {};
    const sink = vi.fn(async (frame: StreamFrame) => {
      frames.push(frame);
      if (frame.event === 'ready') {
        await new Promise<void>((resolve) => {
          release = resolve;
        });
      }
    });
    const connection = new StreamConnection({ sink, bufferSize: 2, heartbeatMs: 60_000 });
    connection.open([], 0);
    const done = connection.run();
    await vi.waitFor(() => expect(frames).toHaveLength(1));

    for (let seq = 1; seq <= 5; seq++) connection.offer(ev(seq));
    expect(connection.dropped).toBe(3);

    release();
    await vi.waitFor(() => expect(frames).toHaveLength(3));
    connection.close();
    await done;

    expect(frames.slice(1).map((f) => f.id)).toEqual(['4', '5']);
    expect(JSON.parse(frames[1].data)).toEqual({ ...ev(4), dropped: 3 });
    expect(JSON.parse(frames[2].data)).toEqual(ev(5));
  });

  it('sends a heartbeat after a quiet period', async () => {
    vi.useFakeTimers();
    const { frames, sink } = recordingSink();
    const connection = new StreamConnection({ sink, bufferSize: 10, heartbeatMs: 1000 });
    connection.open([], 0);
    const done = connection.run();

    await vi.advanceTimersByTimeAsync(999);
    expect(frames.map((f) => f.event)).toEqual(['ready']);
    await vi.advanceTimersByTimeAsync(1);
    await vi.waitFor(() => expect(frames.map((f) => f.event)).toEqual(['ready', 'heartbeat']));

    connection.close();
    await done;
    expect(connection.phase).toBe('closed');
  });

  it('closes when a write fails', async () => {
    const sink = vi.fn(async () => {
      throw new Error('socket hang up');
    });
    const connection = new StreamConnection({ sink, bufferSize: 10, heartbeatMs: 60_000 });
    connection.open([], 0);
    await connection.run();
    expect(connection.phase).toBe('closed');
    connection.offer(ev(1));
    expect(sink).toHaveBeenCalledTimes(1);
  });
});
