// packages/cli/src/commands/serve.ts — Start the live distribution gateway

import { loadConfig } from '@vigil/core';
import { startGateway } from '@vigil/server';
import chalk from 'chalk';

import { type GlobalOptions, cliLogger, onShutdownSignal, resolveProjectDir } from '../utils.js';

export interface ServeOptions extends GlobalOptions {
  port?: number;
  host?: string;
}

export async function serveCommand(options: ServeOptions): Promise<void> {
  const projectDir = resolveProjectDir(options);
  const config = loadConfig({
    projectDir,
    overrides: { gateway: { port: options.port, host: options.host } },
  });
  const logger = cliLogger(config, options);

  const gateway = await startGateway({ config, projectDir, logger });
  console.error(chalk.cyan(`Gateway ready at ${gateway.url} (Ctrl+C to stop)`));

  await new Promise<void>((resolve, reject) => {
    onShutdownSignal((signal) => {
      console.error(chalk.dim(`\n${signal} received, closing gateway...`));
      gateway.close().then(resolve, reject);
    });
  });
}
