// packages/core/src/config/loader.ts

import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { VigilConfig } from '../types/config.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { validateConfig } from './schema.js';

export const CONFIG_FILENAME = 'vigil.yml';
const DB_FILENAME = 'vigil.db';

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends unknown[] ? T[K] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

type PlainObject = Record<string, unknown>;

function toPlain(value: object): PlainObject {
  return Object.fromEntries(Object.entries(value));
}

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged. `undefined` in source leaves the target alone.
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };
  for (const [key, srcVal] of Object.entries(source)) {
    if (srcVal === undefined) continue;
    const tgtVal = result[key];
    result[key] = isPlainObject(srcVal) && isPlainObject(tgtVal) ? deepMerge(tgtVal, srcVal) : srcVal;
  }
  return result;
}

/** Read the environment variables that override file settings. */
function envLayer(env: NodeJS.ProcessEnv): PlainObject {
  const layer: PlainObject = {};
  if (env.VIGIL_STATE_DIR) layer.stateDir = env.VIGIL_STATE_DIR;

  const gateway: PlainObject = {};
  if (env.VIGIL_PORT) {
    const port = Number.parseInt(env.VIGIL_PORT, 10);
    if (!Number.isInteger(port)) {
      throw new ConfigError(`VIGIL_PORT must be an integer, got "${env.VIGIL_PORT}"`, 'gateway.port');
    }
    gateway.port = port;
  }
  if (env.VIGIL_RATE_LIMIT) {
    const requests = Number.parseInt(env.VIGIL_RATE_LIMIT, 10);
    if (!Number.isInteger(requests)) {
      throw new ConfigError(
        `VIGIL_RATE_LIMIT must be an integer, got "${env.VIGIL_RATE_LIMIT}"`,
        'gateway.rateLimit.requests',
      );
    }
    gateway.rateLimit = { requests };
  }
  if (env.VIGIL_API_KEY) gateway.auth = { apiKey: env.VIGIL_API_KEY };
  if (Object.keys(gateway).length > 0) layer.gateway = gateway;

  return layer;
}

/**
 * Load config with precedence: overrides > environment > vigil.yml > defaults.
 */
export function loadConfig(options?: {
  projectDir?: string;
  overrides?: DeepPartial<VigilConfig>;
  skipFile?: boolean;
  env?: NodeJS.ProcessEnv;
}): VigilConfig {
  const projectDir = options?.projectDir ?? process.cwd();
  let merged: PlainObject = toPlain(structuredClone(DEFAULT_CONFIG));

  const configPath = join(projectDir, CONFIG_FILENAME);
  if (!options?.skipFile && existsSync(configPath)) {
    let fileConfig: unknown;
    try {
      fileConfig = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${CONFIG_FILENAME}: ${errorMessage(err)}`);
    }
    if (isPlainObject(fileConfig)) {
      merged = deepMerge(merged, fileConfig);
    }
  }

  merged = deepMerge(merged, envLayer(options?.env ?? process.env));

  if (options?.overrides) {
    merged = deepMerge(merged, toPlain(options.overrides));
  }

  return validateConfig(merged);
}

/** Absolute state directory and database path for a config. */
export function resolveStatePaths(
  config: VigilConfig,
  projectDir: string = process.cwd(),
): { stateDir: string; dbPath: string } {
  const stateDir = isAbsolute(config.stateDir) ? config.stateDir : resolve(projectDir, config.stateDir);
  return { stateDir, dbPath: join(stateDir, DB_FILENAME) };
}

/**
 * Write a config to vigil.yml in the given directory, create the state
 * directory and keep it out of git.
 */
export function writeConfig(config: VigilConfig, dir: string): void {
  writeFileSync(join(dir, CONFIG_FILENAME), stringifyYaml(config, { lineWidth: 100 }), 'utf-8');

  const { stateDir } = resolveStatePaths(config, dir);
  mkdirSync(stateDir, { recursive: true });

  const ignoreLine = `${config.stateDir.replace(/\/$/, '')}/`;
  const gitignorePath = join(dir, '.gitignore');
  if (existsSync(gitignorePath)) {
    const content = readFileSync(gitignorePath, 'utf-8');
    if (!content.split('\n').includes(ignoreLine)) {
      appendFileSync(gitignorePath, `\n${ignoreLine}\n`);
    }
  } else {
    writeFileSync(gitignorePath, `${ignoreLine}\n`, 'utf-8');
  }
}

