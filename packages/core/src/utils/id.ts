// packages/core/src/utils/id.ts

import { nanoid } from 'nanoid';

let lastStamp = 0;

/**
 * Generate a job ID that sorts by creation time.
 * The millisecond stamp never repeats or goes backwards within a process.
 */
export function generateJobId(now: number = Date.now()): string {
  const stamp = now > lastStamp ? now : lastStamp + 1;
  lastStamp = stamp;
  return `${String(stamp).padStart(13, '0')}-${nanoid(10)}`;
}

/** Generate a generic unique ID. */
export function generateId(prefix?: string): string {
  const id = nanoid(16);
  return prefix ? `${prefix}_${id}` : id;
}
