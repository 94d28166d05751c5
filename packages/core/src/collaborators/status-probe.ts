// packages/core/src/collaborators/status-probe.ts — Worker status from systemd

import type { WorkerStatus, WorkerStatusProbe } from '../types/collaborators.js';
import { CollaboratorError, errorMessage } from '../utils/errors.js';
import { type ExecFn, execFileAsync } from './command.js';

const PROPERTIES = ['ActiveState', 'SubState', 'MainPID', 'ActiveEnterTimestamp', 'ExecMainExitTimestamp'];

/** Parse `systemctl show` key=value output. */
export function parseSystemctlShow(stdout: string): WorkerStatus {
  const props = new Map<string, string>();
  for (const line of stdout.split('\n')) {
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    props.set(line.slice(0, eq).trim(), line.slice(eq + 1).trim());
  }

  const status: WorkerStatus = {
    activeState: props.get('ActiveState') || 'unknown',
    subState: props.get('SubState') || 'unknown',
  };
  const pid = Number.parseInt(props.get('MainPID') ?? '', 10);
  if (Number.isInteger(pid) && pid > 0) status.mainPID = pid;
  const since = props.get('ActiveEnterTimestamp');
  if (since) status.since = since;
  const lastExit = props.get('ExecMainExitTimestamp');
  if (lastExit) status.lastExit = lastExit;
  return status;
}

export class SystemdStatusProbe implements WorkerStatusProbe {
  constructor(
    private readonly unit: string,
    private readonly exec: ExecFn = execFileAsync,
  ) {}

  async status(): Promise<WorkerStatus> {
    try {
      const { stdout } = await this.exec(
        'systemctl',
        ['--user', 'show', this.unit, `--property=${PROPERTIES.join(',')}`],
        { timeout: 5000, maxBuffer: 64 * 1024 },
      );
      return parseSystemctlShow(stdout);
    } catch (err) {
      throw new CollaboratorError(`systemctl show ${this.unit} failed: ${errorMessage(err)}`, 'status-probe');
    }
  }
}
