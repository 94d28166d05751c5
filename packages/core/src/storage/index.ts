// packages/core/src/storage/index.ts -- barrel re-export

export { openDatabase, runMigrations, getSchemaVersion } from './database.js';
export { EventLog } from './event-log.js';
export type { EventListener } from './event-log.js';
export { JobQueue } from './job-queue.js';
export type { WithdrawResult } from './job-queue.js';
