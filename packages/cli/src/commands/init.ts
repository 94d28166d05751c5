// packages/cli/src/commands/init.ts — Write a default vigil.yml and the state directory

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { CONFIG_FILENAME, ConfigError, loadConfig, resolveStatePaths, writeConfig } from '@vigil/core';
import chalk from 'chalk';

import { type GlobalOptions, resolveProjectDir } from '../utils.js';

export interface InitOptions extends GlobalOptions {
  force?: boolean;
}

export async function initCommand(options: InitOptions): Promise<void> {
  const projectDir = resolveProjectDir(options);
  const configPath = join(projectDir, CONFIG_FILENAME);

  if (existsSync(configPath) && !options.force) {
    throw new ConfigError(`${CONFIG_FILENAME} already exists. Use --force to overwrite.`);
  }

  // Defaults only: an API key from the environment must not land in the file
  const config = loadConfig({ projectDir, skipFile: true, env: {} });
  writeConfig(config, projectDir);

  const { stateDir } = resolveStatePaths(config, projectDir);
  console.error(chalk.green(`Wrote ${configPath}`));
  console.error(chalk.gray(`  state: ${stateDir}`));
  console.error(chalk.gray(`  gateway: http://${config.gateway.host}:${config.gateway.port}`));
  console.error(chalk.gray('\nNext: add repos and checks to the file, then run: vigil worker'));
}
