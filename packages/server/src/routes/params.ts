// packages/server/src/routes/params.ts — Query parameter parsing

import { ValidationError } from '@vigil/core';

/** Integer query parameter within [min, max], `fallback` when absent. */
export function intParam(raw: string | undefined, name: string, fallback: number, min: number, max: number): number {
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ValidationError(`${name} must be an integer`, [{ path: name, message: 'must be an integer' }]);
  }
  return Math.min(Math.max(value, min), max);
}

/** Positive number of seconds, `fallback` when absent. */
export function secondsParam(raw: string | undefined, name: string, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive number`, [{ path: name, message: 'must be a positive number' }]);
  }
  return value;
}
