// packages/core/src/stream/adapter.ts — Push-first event stream with polling fallback

import { EventEmitter } from 'eventemitter3';
import type { VigilEvent } from '../types/events.js';
import type { TransportError } from '../utils/errors.js';
import { PollEventSource } from './poll-source.js';
import { PushEventSource } from './push-source.js';
import type { EventSourceStrategy, StreamClientOptions, StreamState } from './types.js';

interface AdapterEvents {
  change: (state: StreamState) => void;
}

export interface EventStreamAdapterDeps {
  /** Strategy factories; defaults build the SSE and polling sources */
  createPush?: (options: StreamClientOptions) => EventSourceStrategy;
  createPoll?: (options: StreamClientOptions) => EventSourceStrategy;
}

/**
 * Keeps a bounded window of gateway events. Prefers the push channel; while it
 * is down, polls the recent-events endpoint and retries push on a timer.
 */
export class EventStreamAdapter extends EventEmitter<AdapterEvents> {
  private state: StreamState = { connected: false, mode: 'idle', events: [], error: null };
  private push: EventSourceStrategy | null = null;
  private poll: EventSourceStrategy | null = null;
  private retryTimer: ReturnType<typeof setTimeout> | null = null;
  private started = false;
  private closed = false;

  constructor(
    private readonly options: StreamClientOptions,
    private readonly deps: EventStreamAdapterDeps = {},
  ) {
    super();
  }

  /** Current state. The events array is a copy. */
  observe(): StreamState {
    return { ...this.state, events: [...this.state.events] };
  }

  start(): void {
    if (this.started || this.closed) return;
    this.started = true;
    this.connectPush();
  }

  /** Release the push connection and every timer. The adapter cannot be restarted. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.push?.stop();
    this.push = null;
    this.stopPolling();
    this.clearRetry();
    this.update({ connected: false, mode: 'idle' });
    this.removeAllListeners();
  }

  private connectPush(): void {
    if (this.closed || this.push) return;
    const push = (this.deps.createPush ?? ((o) => new PushEventSource(o)))(this.options);
    this.push = push;
    push.start({
      onOpen: () => {
        if (this.push !== push) return;
        this.clearRetry();
        this.stopPolling();
        this.update({ connected: true, mode: 'push', error: null });
      },
      onEvents: (events, replace) => {
        if (this.push !== push) return;
        this.receive(events, replace);
      },
      onError: (err) => {
        if (this.push !== push) return;
        push.stop();
        this.push = null;
        this.fallBack(err);
      },
    });
  }

  private fallBack(err: TransportError): void {
    this.options.logger?.warn(`Push channel down, polling instead: ${err.message}`);
    this.update({ connected: false, mode: 'poll', error: err.message });
    this.startPolling();
    this.scheduleRetry();
  }

  private startPolling(): void {
    if (this.poll || this.closed) return;
    const poll = (this.deps.createPoll ?? ((o) => new PollEventSource(o)))(this.options);
    this.poll = poll;
    poll.start({
      onOpen: () => {},
      onEvents: (events, replace) => {
        if (this.poll !== poll) return;
        this.receive(events, replace, { error: null });
      },
      onError: (err) => {
        if (this.poll !== poll) return;
        this.update({ error: err.message });
      },
    });
  }

  private stopPolling(): void {
    this.poll?.stop();
    this.poll = null;
  }

  private scheduleRetry(): void {
    if (this.retryTimer || this.closed) return;
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      this.connectPush();
    }, this.options.pushRetryMs);
  }

  private clearRetry(): void {
    if (this.retryTimer) clearTimeout(this.retryTimer);
    this.retryTimer = null;
  }

  /**
   * A full window replaces the buffer; otherwise only events past the newest
   * one held are appended. Either way the newest `bufferSize` are kept.
   */
  private receive(incoming: VigilEvent[], replace: boolean, patch: Partial<StreamState> = {}): void {
    const { bufferSize } = this.options;
    if (replace) {
      this.update({ ...patch, events: incoming.slice(-bufferSize) });
      return;
    }
    const newest = this.state.events.at(-1)?.seq ?? 0;
    const fresh = incoming.filter((e) => e.seq > newest);
    if (fresh.length === 0 && Object.keys(patch).length === 0) return;
    this.update({ ...patch, events: [...this.state.events, ...fresh].slice(-bufferSize) });
  }

  private update(patch: Partial<StreamState>): void {
    this.state = { ...this.state, ...patch };
    this.emit('change', this.observe());
  }
}
