// packages/core/src/engine -- job execution

export { CancellationToken } from './cancellation.js';
export { WorkerLoop } from './worker-loop.js';
export type { WorkerLoopOptions, WorkerStats } from './worker-loop.js';
