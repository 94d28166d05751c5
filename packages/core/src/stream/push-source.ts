// packages/core/src/stream/push-source.ts — Server-Sent Events over fetch with manual frame parsing

import { isVigilEvent, type VigilEvent } from '../types/events.js';
import { TransportError, errorMessage } from '../utils/errors.js';
import { SseParser, type SseFrame } from './sse-parser.js';
import type { EventSourceHandlers, EventSourceStrategy, FetchFn, StreamClientOptions } from './types.js';

/** Builds the stream URL and request headers shared by both strategies. */
export function gatewayRequest(
  options: Pick<StreamClientOptions, 'baseUrl' | 'apiKey'>,
  path: string,
  query: Record<string, string | number | undefined> = {},
): { url: string; headers: Record<string, string> } {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) params.set(key, String(value));
  }
  const qs = params.toString();
  const headers: Record<string, string> = {};
  if (options.apiKey) headers['x-api-key'] = options.apiKey;
  return { url: `${options.baseUrl.replace(/\/+$/, '')}${path}${qs ? `?${qs}` : ''}`, headers };
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

export class PushEventSource implements EventSourceStrategy {
  readonly kind = 'push';
  private controller: AbortController | null = null;

  constructor(private readonly options: StreamClientOptions) {}

  start(handlers: EventSourceHandlers): void {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;
    this.connect(controller, handlers).catch((err: unknown) => {
      if (controller.signal.aborted || isAbort(err)) return;
      handlers.onError(err instanceof TransportError ? err : new TransportError(errorMessage(err)));
    });
  }

  stop(): void {
    this.controller?.abort();
    this.controller = null;
  }

  private async connect(controller: AbortController, handlers: EventSourceHandlers): Promise<void> {
    const fetchFn: FetchFn = this.options.fetch ?? ((input, init) => fetch(input, init));
    const { url, headers } = gatewayRequest(this.options, '/api/events/stream', {
      replay: this.options.replay,
    });

    const response = await fetchFn(url, {
      headers: { ...headers, Accept: 'text/event-stream' },
      signal: controller.signal,
    });
    if (!response.ok) {
      await response.body?.cancel();
      throw new TransportError(`Stream request failed: HTTP ${response.status}`, response.status);
    }
    if (!response.body) {
      throw new TransportError('Stream response has no body');
    }

    this.options.logger?.debug(`Push channel open: ${url}`);
    handlers.onOpen();

    const reader = response.body.getReader();
    const onAbort = () => {
      reader.cancel().catch(() => undefined);
    };
    controller.signal.addEventListener('abort', onAbort, { once: true });

    const decoder = new TextDecoder();
    const parser = new SseParser();
    try {
      while (!controller.signal.aborted) {
        const { done, value } = await reader.read();
        if (done) break;
        for (const frame of parser.push(decoder.decode(value, { stream: true }))) {
          const event = this.toEvent(frame);
          if (event && !controller.signal.aborted) handlers.onEvents([event], false);
        }
      }
    } finally {
      controller.signal.removeEventListener('abort', onAbort);
    }

    if (!controller.signal.aborted) {
      throw new TransportError('Stream closed by gateway');
    }
  }

  private toEvent(frame: SseFrame): VigilEvent | null {
    if (frame.event === 'heartbeat' || frame.event === 'ready') return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(frame.data);
    } catch {
      this.options.logger?.warn(`Ignoring unparseable ${frame.event} frame`);
      return null;
    }
    if (!isVigilEvent(parsed)) return null;

    if (!('dropped' in parsed)) return parsed;
    const { dropped, ...event } = parsed;
    if (typeof dropped === 'number' && dropped > 0) {
      this.options.logger?.warn(`Gateway dropped ${dropped} event(s) for this client`);
    }
    return event;
  }
}
