// packages/core/src/stream/types.ts — Client stream adapter types

import type { VigilEvent } from '../types/events.js';
import type { TransportError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export type StreamMode = 'push' | 'poll' | 'idle';

export interface StreamState {
  /** True only while the push channel is open */
  connected: boolean;
  mode: StreamMode;
  events: VigilEvent[];
  error: string | null;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface StreamClientOptions {
  /** Gateway origin, e.g. http://127.0.0.1:8787 */
  baseUrl: string;
  apiKey?: string;
  pollIntervalMs: number;
  pushRetryMs: number;
  bufferSize: number;
  /** Events the gateway replays on connect; defaults to its own setting */
  replay?: number;
  fetch?: FetchFn;
  logger?: Logger;
}

export interface EventSourceHandlers {
  onOpen(): void;
  /** `replace` is true when the batch is a full window rather than new events */
  onEvents(events: VigilEvent[], replace: boolean): void;
  onError(error: TransportError): void;
}

/** One way of getting events from the gateway. */
export interface EventSourceStrategy {
  readonly kind: 'push' | 'poll';
  start(handlers: EventSourceHandlers): void;
  stop(): void;
}
