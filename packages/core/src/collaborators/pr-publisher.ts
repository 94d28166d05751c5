// packages/core/src/collaborators/pr-publisher.ts

import type { CollaboratorResult, PrPublisher } from '../types/collaborators.js';
import type { CommandConfig } from '../types/config.js';
import { repoDir } from './check-runner.js';
import { type ExecFn, runCommand } from './command.js';

/**
 * Publishes through a configured command. Arguments mentioning `{repo}` or
 * `{dir}` run once per repository; otherwise the command runs once with `{repos}`.
 * Without a command configured, publishing is skipped and reported as a success.
 */
export class CommandPrPublisher implements PrPublisher {
  constructor(
    private readonly command: CommandConfig | undefined,
    private readonly reposRoot: string,
    private readonly exec?: ExecFn,
  ) {}

  async publish(repos: string[]): Promise<CollaboratorResult> {
    const command = this.command;
    if (!command) {
      return { success: true, output: 'no publisher configured, skipped' };
    }

    const perRepo = command.args.some((arg) => arg.includes('{repo}') || arg.includes('{dir}'));
    if (!perRepo) {
      return runCommand(command, { repos }, { exec: this.exec });
    }

    const outputs: string[] = [];
    for (const repo of repos) {
      const dir = repoDir(this.reposRoot, repo);
      const result = await runCommand(command, { repo, repos, dir }, { exec: this.exec });
      outputs.push(result.output);
      if (!result.success) {
        return { success: false, output: outputs.filter(Boolean).join('\n'), error: result.error };
      }
    }
    return { success: true, output: outputs.filter(Boolean).join('\n') };
  }
}
