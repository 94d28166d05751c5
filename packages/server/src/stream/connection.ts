// packages/server/src/stream/connection.ts — Per-client push queue with heartbeats and drop-oldest overflow

import type { Logger, VigilEvent } from '@vigil/core';
import { errorMessage } from '@vigil/core';

export interface StreamFrame {
  event: string;
  data: string;
  id?: string;
}

export type FrameSink = (frame: StreamFrame) => Promise<void>;

export interface StreamConnectionOptions {
  sink: FrameSink;
  bufferSize: number;
  heartbeatMs: number;
  logger?: Logger;
}

type ConnectionState = 'replaying' | 'live' | 'closed';

/**
 * One open push channel. Producers call `offer`, which never waits; a single
 * pump writes frames to the sink in order. When the queue is full the oldest
 * queued events are discarded and the count rides on the next event frame.
 */
export class StreamConnection {
  private state: ConnectionState = 'replaying';
  private cursor = 0;
  private readonly queue: StreamFrame[] = [];
  private pendingDrops = 0;
  private totalDrops = 0;
  private wake: (() => void) | null = null;
  private heartbeatTimer: ReturnType<typeof setTimeout> | null = null;
  private closeReason: string | null = null;

  constructor(private readonly options: StreamConnectionOptions) {}

  get phase(): ConnectionState {
    return this.state;
  }

  get dropped(): number {
    return this.totalDrops;
  }

  get lastSeq(): number {
    return this.cursor;
  }

  /** Queue the handshake and replay, then switch to live delivery after `cursor`. */
  open(replay: VigilEvent[], cursor: number): void {
    this.enqueue({
      event: 'ready',
      data: JSON.stringify({ lastSeq: cursor, replayed: replay.length }),
    });
    for (const event of replay) this.enqueue(this.eventFrame(event));
    this.cursor = cursor;
    this.state = 'live';
  }

  /** Offer a live event. Events at or before the cursor were already sent. */
  offer(event: VigilEvent): void {
    if (this.state !== 'live' || event.seq <= this.cursor) return;
    this.cursor = event.seq;

    const queuedEvents = this.queue.filter((f) => f.event !== 'ready' && f.event !== 'heartbeat');
    if (queuedEvents.length >= this.options.bufferSize) {
      const oldest = this.queue.findIndex((f) => f.event !== 'ready' && f.event !== 'heartbeat');
      this.queue.splice(oldest, 1);
      this.pendingDrops++;
      this.totalDrops++;
    }
    this.enqueue(this.eventFrame(event));
  }

  /**
   * Write queued frames until the connection closes. Resolves on close,
   * including after a failed write.
   */
  async run(): Promise<void> {
    this.armHeartbeat();
    while (this.state !== 'closed') {
      const frame = this.queue.shift();
      if (!frame) {
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
        continue;
      }
      try {
        await this.options.sink(this.withDrops(frame));
      } catch (err) {
        this.close(`write failed: ${errorMessage(err)}`);
        break;
      }
      this.armHeartbeat();
    }
    this.options.logger?.debug(`Stream connection closed (${this.closeReason ?? 'closed'})`);
  }

  close(reason = 'closed'): void {
    if (this.state === 'closed') return;
    this.state = 'closed';
    this.closeReason = reason;
    this.queue.length = 0;
    if (this.heartbeatTimer) clearTimeout(this.heartbeatTimer);
    this.heartbeatTimer = null;
    this.signal();
  }

  private eventFrame(event: VigilEvent): StreamFrame {
    return { event: event.kind, data: JSON.stringify(event), id: String(event.seq) };
  }

  private withDrops(frame: StreamFrame): StreamFrame {
    if (this.pendingDrops === 0 || frame.id === undefined) return frame;
    const dropped = this.pendingDrops;
    this.pendingDrops = 0;
    this.options.logger?.warn(`Dropped ${dropped} event(s) for a slow stream client`);
    const payload: unknown = JSON.parse(frame.data);
    const data = typeof payload === 'object' && payload !== null ? { ...payload, dropped } : { dropped };
    return { ...frame, data: JSON.stringify(data) };
  }

  private enqueue(frame: StreamFrame): void {
    this.queue.push(frame);
    this.signal();
  }

  private signal(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private armHeartbeat(): void {
    if (this.heartbeatTimer) clearTimeout(this.heartbeatTimer);
    if (this.state === 'closed') return;
    this.heartbeatTimer = setTimeout(() => {
      this.heartbeatTimer = null;
      if (this.queue.length === 0) {
        this.enqueue({ event: 'heartbeat', data: JSON.stringify({ ts: new Date().toISOString() }) });
      } else {
        this.armHeartbeat();
      }
    }, this.options.heartbeatMs);
  }
}
