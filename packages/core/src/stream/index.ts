// packages/core/src/stream/index.ts -- barrel re-export

export { EventStreamAdapter } from './adapter.js';
export type { EventStreamAdapterDeps } from './adapter.js';
export { PushEventSource, gatewayRequest } from './push-source.js';
export { PollEventSource } from './poll-source.js';
export { SseParser } from './sse-parser.js';
export type { SseFrame } from './sse-parser.js';
export type {
  EventSourceHandlers,
  EventSourceStrategy,
  FetchFn,
  StreamClientOptions,
  StreamMode,
  StreamState,
} from './types.js';
