// @vigil/server - live distribution gateway

export { createGateway } from './app.js';
export type { Gateway } from './app.js';
export { startGateway } from './server.js';
export type { RunningGateway } from './server.js';
export { EventFeed } from './stream/event-feed.js';
export { StreamConnection } from './stream/connection.js';
export type { FrameSink, StreamConnectionOptions, StreamFrame } from './stream/connection.js';
export type { AppEnv, GatewayDeps } from './types.js';
