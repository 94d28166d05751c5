// packages/core/src/config/index.ts -- barrel re-export

export { DEFAULT_CONFIG } from './defaults.js';
export { configSchema, validateConfig } from './schema.js';
export type { VigilConfigInput } from './schema.js';
export { CONFIG_FILENAME, loadConfig, resolveStatePaths, writeConfig } from './loader.js';
export type { DeepPartial } from './loader.js';
