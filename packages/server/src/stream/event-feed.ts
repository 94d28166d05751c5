// packages/server/src/stream/event-feed.ts — One tail of the event log shared by every stream connection

import type { EventLog, Logger, VigilEvent } from '@vigil/core';
import { errorMessage } from '@vigil/core';
import { EventEmitter } from 'eventemitter3';

interface EventFeedEvents {
  event: (event: VigilEvent) => void;
}

/**
 * Follows the log from its current end. Rows written by this process wake the
 * feed at once; rows from other processes (the worker) arrive on the poll timer.
 * Every event is emitted exactly once, in sequence order.
 */
export class EventFeed {
  private readonly emitter = new EventEmitter<EventFeedEvents>();
  private cursor = 0;
  private timer: ReturnType<typeof setInterval> | null = null;
  private unsubscribeLog: (() => void) | null = null;

  constructor(
    private readonly events: EventLog,
    private readonly pollMs: number,
    private readonly logger?: Logger,
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  get position(): number {
    return this.cursor;
  }

  get subscriberCount(): number {
    return this.emitter.listenerCount('event');
  }

  start(): void {
    if (this.timer) return;
    this.cursor = this.events.lastSeq();
    this.unsubscribeLog = this.events.subscribe(() => this.pump());
    this.timer = setInterval(() => this.pump(), this.pollMs);
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    this.unsubscribeLog?.();
    this.unsubscribeLog = null;
    this.emitter.removeAllListeners();
  }

  subscribe(listener: (event: VigilEvent) => void): () => void {
    this.emitter.on('event', listener);
    return () => {
      this.emitter.off('event', listener);
    };
  }

  /** Read everything past the cursor and fan it out. */
  pump(): void {
    let batch: VigilEvent[];
    try {
      batch = this.events.since(this.cursor);
    } catch (err) {
      this.logger?.error(`Event feed read failed: ${errorMessage(err)}`);
      return;
    }
    for (const event of batch) {
      this.cursor = event.seq;
      this.emitter.emit('event', event);
    }
  }
}
