// packages/core/src/collaborators/check-runner.ts

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type { CheckRunner, CollaboratorResult } from '../types/collaborators.js';
import type { CheckConfig } from '../types/config.js';
import type { JobMode } from '../types/jobs.js';
import { type ExecFn, runCommand } from './command.js';

/** Local checkout of `owner/name` under the repos root. */
export function repoDir(reposRoot: string, repo: string): string {
  const name = repo.split('/').pop() ?? repo;
  return resolve(reposRoot, name);
}

/**
 * Runs every configured check command in the repository checkout, in order.
 * Succeeds only when all of them exit cleanly.
 */
export class CommandCheckRunner implements CheckRunner {
  constructor(
    private readonly checks: CheckConfig[],
    private readonly reposRoot: string,
    private readonly exec?: ExecFn,
  ) {}

  async run(repo: string, mode: JobMode): Promise<CollaboratorResult> {
    if (this.checks.length === 0) {
      return { success: true, output: 'no checks configured' };
    }

    const dir = repoDir(this.reposRoot, repo);
    const cwd = existsSync(dir) ? dir : undefined;
    const sections: string[] = [];
    const failed: string[] = [];

    for (const check of this.checks) {
      const result = await runCommand(check, { repo, mode, dir }, { cwd, exec: this.exec });
      sections.push(`== ${check.name} ==${result.output ? `\n${result.output}` : ''}`);
      if (!result.success) failed.push(check.name);
    }

    const output = sections.join('\n');
    return failed.length === 0
      ? { success: true, output }
      : { success: false, output, error: `${failed.join(', ')} failed for ${repo}` };
  }
}
