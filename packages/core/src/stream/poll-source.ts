// packages/core/src/stream/poll-source.ts — Timed pulls of the recent-events window

import { isVigilEvent } from '../types/events.js';
import { TransportError, errorMessage } from '../utils/errors.js';
import { gatewayRequest } from './push-source.js';
import type { EventSourceHandlers, EventSourceStrategy, FetchFn, StreamClientOptions } from './types.js';

export class PollEventSource implements EventSourceStrategy {
  readonly kind = 'poll';
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight = false;
  private generation = 0;

  constructor(private readonly options: StreamClientOptions) {}

  get active(): boolean {
    return this.timer !== null;
  }

  /** Fetch once right away, then every `pollIntervalMs`. */
  start(handlers: EventSourceHandlers): void {
    if (this.timer) return;
    const generation = ++this.generation;
    const tick = () => {
      if (this.inFlight) return;
      this.inFlight = true;
      void this.pull(handlers, generation).finally(() => {
        this.inFlight = false;
      });
    };
    this.timer = setInterval(tick, this.options.pollIntervalMs);
    tick();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    this.generation++;
  }

  /** Never rejects; failures are reported through `onError`. */
  private async pull(handlers: EventSourceHandlers, generation: number): Promise<void> {
    const fetchFn: FetchFn = this.options.fetch ?? ((input, init) => fetch(input, init));
    const { url, headers } = gatewayRequest(this.options, '/api/events/recent', {
      n: this.options.bufferSize,
    });
    try {
      const response = await fetchFn(url, { headers: { ...headers, Accept: 'application/json' } });
      if (!response.ok) {
        throw new TransportError(`Poll request failed: HTTP ${response.status}`, response.status);
      }
      const body: unknown = await response.json();
      const raw = typeof body === 'object' && body !== null && 'events' in body ? body.events : null;
      if (!Array.isArray(raw)) {
        throw new TransportError('Poll response has no events array');
      }
      if (generation === this.generation) {
        handlers.onEvents(raw.filter(isVigilEvent), true);
      }
    } catch (err) {
      if (generation !== this.generation) return;
      handlers.onError(err instanceof TransportError ? err : new TransportError(errorMessage(err)));
    }
  }
}
