// packages/core/src/utils/index.ts -- barrel re-export

export { generateJobId, generateId } from './id.js';
export {
  ConfigError,
  ValidationError,
  CollaboratorError,
  TransportError,
  StorageError,
  errorMessage,
} from './errors.js';
export type { ValidationIssue } from './errors.js';
export { createLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
