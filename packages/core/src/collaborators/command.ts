// packages/core/src/collaborators/command.ts — Run a configured command and capture its result

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { CollaboratorResult } from '../types/collaborators.js';
import type { CommandConfig } from '../types/config.js';
import { OUTPUT_MAX_CHARS } from '../utils/constants.js';
import { errorMessage } from '../utils/errors.js';

export interface ExecOptions {
  cwd?: string;
  timeout: number;
  maxBuffer: number;
}

/** Signature of promisified `execFile`; swapped for a fake in tests. */
export type ExecFn = (
  command: string,
  args: string[],
  options: ExecOptions,
) => Promise<{ stdout: string; stderr: string }>;

export const execFileAsync: ExecFn = promisify(execFile);

/** Placeholder values; a list value expands into one argument per entry when it fills a whole argument. */
export type CommandVars = Record<string, string | string[]>;

/**
 * Replace `{name}` placeholders in each argument.
 * An argument that is exactly `{name}` with a list value becomes several arguments.
 */
export function expandArgs(args: string[], vars: CommandVars): string[] {
  const out: string[] = [];
  for (const arg of args) {
    const whole = /^\{(\w+)\}$/.exec(arg);
    const wholeValue = whole ? vars[whole[1]] : undefined;
    if (Array.isArray(wholeValue)) {
      out.push(...wholeValue);
      continue;
    }
    out.push(
      arg.replace(/\{(\w+)\}/g, (match, name: string) => {
        const value = vars[name];
        if (value === undefined) return match;
        return Array.isArray(value) ? value.join(' ') : value;
      }),
    );
  }
  return out;
}

function streamsOf(err: unknown): string {
  if (typeof err !== 'object' || err === null) return '';
  const parts: string[] = [];
  if ('stdout' in err && typeof err.stdout === 'string') parts.push(err.stdout);
  if ('stderr' in err && typeof err.stderr === 'string') parts.push(err.stderr);
  return parts.filter(Boolean).join('\n');
}

function clip(text: string): string {
  return text.length > OUTPUT_MAX_CHARS ? text.slice(-OUTPUT_MAX_CHARS) : text;
}

/**
 * Run a command once. Non-zero exit, timeout and spawn failures come back
 * as `success: false`; this never rejects.
 */
export async function runCommand(
  spec: CommandConfig,
  vars: CommandVars,
  options: { cwd?: string; exec?: ExecFn } = {},
): Promise<CollaboratorResult> {
  const exec = options.exec ?? execFileAsync;
  const args = expandArgs(spec.args, vars);
  try {
    const { stdout, stderr } = await exec(spec.command, args, {
      cwd: options.cwd,
      timeout: spec.timeoutSec * 1000,
      maxBuffer: 16 * 1024 * 1024,
    });
    return { success: true, output: clip([stdout, stderr].filter(Boolean).join('\n').trim()) };
  } catch (err) {
    return {
      success: false,
      output: clip(streamsOf(err).trim()),
      error: `${spec.command} failed: ${errorMessage(err).split('\n')[0]}`,
    };
  }
}
