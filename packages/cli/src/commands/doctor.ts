// packages/cli/src/commands/doctor.ts — Preflight diagnostics for a Vigil project

import { accessSync, constants, existsSync } from 'node:fs';
import { join } from 'node:path';
import {
  CONFIG_FILENAME,
  SystemdStatusProbe,
  VERSION,
  errorMessage,
  getSchemaVersion,
  loadConfig,
  openDatabase,
  resolveStatePaths,
  type VigilConfig,
  type WorkerStatusProbe,
} from '@vigil/core';
import chalk from 'chalk';

import { type GlobalOptions, resolveProjectDir } from '../utils.js';

export interface DoctorCheck {
  name: string;
  status: 'pass' | 'warn' | 'fail';
  message: string;
  fix?: string;
}

export interface DoctorOptions extends GlobalOptions {
  json?: boolean;
}

const MIN_NODE_MAJOR = 20;

/** Collect every check. Never throws; a failing probe becomes a failed check. */
export async function runDoctorChecks(
  projectDir: string,
  probe?: WorkerStatusProbe,
): Promise<DoctorCheck[]> {
  const checks: DoctorCheck[] = [];

  // 1. Config file
  let config: VigilConfig | null = null;
  const configPath = join(projectDir, CONFIG_FILENAME);
  try {
    config = loadConfig({ projectDir });
    checks.push(
      existsSync(configPath)
        ? { name: 'config', status: 'pass', message: `${CONFIG_FILENAME} is valid` }
        : { name: 'config', status: 'warn', message: `${CONFIG_FILENAME} not found, using defaults`, fix: 'vigil init' },
    );
  } catch (err) {
    checks.push({ name: 'config', status: 'fail', message: errorMessage(err), fix: `Edit ${CONFIG_FILENAME}` });
  }

  // 2. Node version
  const major = Number.parseInt(process.versions.node.split('.')[0] ?? '0', 10);
  checks.push(
    major >= MIN_NODE_MAJOR
      ? { name: 'node', status: 'pass', message: `Node.js ${process.version}` }
      : {
          name: 'node',
          status: 'fail',
          message: `Node.js ${process.version} — requires >= ${MIN_NODE_MAJOR}`,
          fix: `Install Node.js ${MIN_NODE_MAJOR}+`,
        },
  );

  if (!config) return checks;

  // 3. State directory and database
  const { stateDir, dbPath } = resolveStatePaths(config, projectDir);
  if (!existsSync(stateDir)) {
    checks.push({
      name: 'database',
      status: 'warn',
      message: `${stateDir} not found — it is created on first use`,
      fix: 'vigil init',
    });
  } else {
    try {
      accessSync(stateDir, constants.W_OK);
      if (existsSync(dbPath)) {
        const db = openDatabase(dbPath);
        try {
          checks.push({ name: 'database', status: 'pass', message: `Schema version ${getSchemaVersion(db) ?? '?'}` });
        } finally {
          db.close();
        }
      } else {
        checks.push({ name: 'database', status: 'pass', message: 'State directory writable, database created on first use' });
      }
    } catch (err) {
      checks.push({ name: 'database', status: 'fail', message: errorMessage(err), fix: `Check permissions on ${stateDir}` });
    }
  }

  // 4. Work to do
  checks.push(
    config.repos.length > 0
      ? { name: 'repos', status: 'pass', message: `${config.repos.length} repo(s) configured` }
      : { name: 'repos', status: 'warn', message: 'No repos configured; ScanAll and PRSweep jobs need one', fix: `Add repos to ${CONFIG_FILENAME}` },
  );
  checks.push(
    config.checks.length > 0
      ? { name: 'checks', status: 'pass', message: config.checks.map((c) => c.name).join(', ') }
      : { name: 'checks', status: 'warn', message: 'No checks configured; scans succeed without doing anything' },
  );

  // 5. Gateway auth
  const { auth } = config.gateway;
  if (!auth.enabled) {
    checks.push({ name: 'auth', status: 'warn', message: 'API key auth disabled' });
  } else if (!auth.apiKey) {
    checks.push({ name: 'auth', status: 'fail', message: 'API key auth enabled but no key set', fix: 'export VIGIL_API_KEY=...' });
  } else {
    checks.push({ name: 'auth', status: 'pass', message: 'API key configured' });
  }

  // 6. Worker unit
  try {
    const status = await (probe ?? new SystemdStatusProbe(config.worker.unit)).status();
    checks.push({
      name: 'worker',
      status: status.activeState === 'active' ? 'pass' : 'warn',
      message: `${config.worker.unit}: ${status.activeState} (${status.subState})`,
    });
  } catch (err) {
    checks.push({ name: 'worker', status: 'warn', message: errorMessage(err) });
  }

  return checks;
}

export async function doctorCommand(options: DoctorOptions): Promise<void> {
  const checks = await runDoctorChecks(resolveProjectDir(options));

  if (options.json) {
    console.log(JSON.stringify({ version: VERSION, checks }, null, 2));
  } else {
    console.error(chalk.cyan(`\n  Vigil Doctor v${VERSION}\n`));
    for (const check of checks) {
      const icon =
        check.status === 'pass' ? chalk.green('PASS') : check.status === 'warn' ? chalk.yellow('WARN') : chalk.red('FAIL');
      console.error(`  ${icon}  ${check.name}: ${check.message}`);
      if (check.fix) console.error(chalk.dim(`         fix: ${check.fix}`));
    }
    console.error('');
  }

  if (checks.some((c) => c.status === 'fail')) {
    process.exitCode = 1;
  }
}
