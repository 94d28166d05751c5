// packages/cli/src/index.ts — vigil entry point

import { ConfigError, ValidationError, errorMessage } from '@vigil/core';
import chalk from 'chalk';

import { createProgram } from './program.js';

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    console.error(chalk.red(`Error: ${errorMessage(err)}`));
    if (err instanceof ValidationError) {
      for (const issue of err.issues) console.error(chalk.dim(`  ${issue.path || '(root)'}: ${issue.message}`));
    } else if (err instanceof ConfigError && err.field) {
      console.error(chalk.dim(`  field: ${err.field}`));
    }
    process.exit(1);
  });
