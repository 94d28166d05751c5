// packages/cli/src/program.ts — Command tree for the vigil CLI

import { Command, InvalidArgumentError, Option } from 'commander';

import { JOB_MODES, JOB_TYPES, VERSION } from '@vigil/core';

import { doctorCommand, type DoctorOptions } from './commands/doctor.js';
import { eventsCommand, type EventsOptions } from './commands/events.js';
import { initCommand, type InitOptions } from './commands/init.js';
import {
  jobsListCommand,
  jobsRemoveCommand,
  jobsSubmitCommand,
  type ListOptions,
  type SubmitOptions,
} from './commands/jobs.js';
import { overviewCommand, type OverviewOptions } from './commands/overview.js';
import { serveCommand, type ServeOptions } from './commands/serve.js';
import { watchCommand, type WatchOptions } from './commands/watch.js';
import { workerCommand, type WorkerOptions } from './commands/worker.js';
import type { GlobalOptions } from './utils.js';

function parseIntOption(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

/** Program-level options, merged into every command's own. */
function globals(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals();
  return {
    dir: typeof opts.dir === 'string' ? opts.dir : undefined,
    verbose: opts.verbose === true,
  };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('vigil')
    .description('Background analysis job queue with a live event feed')
    .version(VERSION)
    .option('-C, --dir <path>', 'Project directory (default: cwd)')
    .option('--verbose', 'Enable debug logging');

  program
    .command('init')
    .description('Write a default vigil.yml and create the state directory')
    .option('--force', 'Overwrite an existing vigil.yml', false)
    .action((opts: InitOptions, cmd: Command) => initCommand({ ...opts, ...globals(cmd) }));

  program
    .command('doctor')
    .description('Check config, storage, auth and the worker unit')
    .option('--json', 'Machine-readable output', false)
    .action((opts: DoctorOptions, cmd: Command) => doctorCommand({ ...opts, ...globals(cmd) }));

  program
    .command('serve')
    .description('Run the gateway: REST reads, submissions and the live event stream')
    .option('--port <port>', 'Listen port', parseIntOption)
    .option('--host <host>', 'Listen address')
    .action((opts: ServeOptions, cmd: Command) => serveCommand({ ...opts, ...globals(cmd) }));

  program
    .command('worker')
    .description('Process queued jobs one at a time')
    .option('--once', 'Process at most one job and exit', false)
    .option('--poll-ms <ms>', 'Idle poll interval', parseIntOption)
    .option('--worker-id <id>', 'Worker identifier')
    .action((opts: WorkerOptions, cmd: Command) => workerCommand({ ...opts, ...globals(cmd) }));

  // ── Jobs ──

  const jobs = program.command('jobs').description('Submit, list and remove queued jobs');

  jobs
    .command('submit')
    .description('Queue a job')
    .addArgument(program.createArgument('<type>', 'Job type').choices(JOB_TYPES))
    .addOption(new Option('--mode <mode>', 'Scan mode').choices(JOB_MODES))
    .option('--repo <owner/name>', 'Repository; sweeps every configured repo when omitted')
    .option('--no-auto-pr', 'Do not open pull requests after a successful scan')
    .action((type: string, opts: SubmitOptions, cmd: Command) =>
      jobsSubmitCommand(type, { ...opts, ...globals(cmd) }),
    );

  jobs
    .command('list')
    .description('Print the queue, oldest first')
    .option('--limit <n>', 'Max items', parseIntOption)
    .action((opts: ListOptions, cmd: Command) => jobsListCommand({ ...opts, ...globals(cmd) }));

  jobs
    .command('remove')
    .description('Remove a job that has not started')
    .argument('<job-id>', 'Job ID')
    .action((jobId: string, _opts: GlobalOptions, cmd: Command) => jobsRemoveCommand(jobId, globals(cmd)));

  // ── Events ──

  program
    .command('events')
    .description('Print events as JSONL')
    .option('--follow', 'Stay attached to the gateway (push, falling back to polling)', false)
    .option('-n, --n <count>', 'Number of recent events', parseIntOption)
    .option('--since-seq <seq>', 'Only events after this sequence number', parseIntOption)
    .option('--job <id>', 'Only events of one job')
    .option('--url <url>', 'Gateway URL for --follow')
    .option('--api-key <key>', 'Gateway API key for --follow (default: VIGIL_API_KEY)')
    .action((opts: EventsOptions, cmd: Command) => eventsCommand({ ...opts, ...globals(cmd) }));

  program
    .command('overview')
    .description('Print worker status, the queue and recent events as JSON')
    .option('-n, --n <count>', 'Number of recent events', parseIntOption)
    .option('--repos', 'Per-repository latest event instead', false)
    .action((opts: OverviewOptions, cmd: Command) => overviewCommand({ ...opts, ...globals(cmd) }));

  // ── Watch ──

  program
    .command('watch')
    .description('Watch a working tree and queue a ScanChanged job per burst of changes')
    .argument('<repo>', 'Repository (owner/name)')
    .option('--path <dir>', 'Directory to watch (default: <reposRoot>/<name>)')
    .option('--no-auto-pr', 'Queue scans without opening pull requests')
    .option('--quiet-ms <ms>', 'Quiet period before a batch closes', parseIntOption)
    .option('--max-wait-ms <ms>', 'Max time a batch stays open', parseIntOption)
    .option('--cooldown-ms <ms>', 'Cooldown after a batch', parseIntOption)
    .action((repo: string, opts: WatchOptions, cmd: Command) => watchCommand(repo, { ...opts, ...globals(cmd) }));

  return program;
}
