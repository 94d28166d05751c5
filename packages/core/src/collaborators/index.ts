// packages/core/src/collaborators/index.ts -- barrel re-export

export { execFileAsync, expandArgs, runCommand } from './command.js';
export type { CommandVars, ExecFn, ExecOptions } from './command.js';
export { CommandCheckRunner, repoDir } from './check-runner.js';
export { CommandPrPublisher } from './pr-publisher.js';
export { SystemdStatusProbe, parseSystemctlShow } from './status-probe.js';
