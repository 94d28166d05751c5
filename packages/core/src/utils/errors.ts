// packages/core/src/utils/errors.ts

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Malformed job submission. Raised before anything reaches the queue. */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = [],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** A check runner or PR publisher call failed. Scoped to a single job. */
export class CollaboratorError extends Error {
  constructor(
    message: string,
    public readonly collaborator: 'check-runner' | 'pr-publisher' | 'status-probe',
    public readonly output?: string,
    /** Repositories the failure covers, when more than one was attempted */
    public readonly repos?: string[],
  ) {
    super(message);
    this.name = 'CollaboratorError';
  }
}

/** Push channel failure. Drives client fallback, never a job failure. */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

/** Queue or log storage unavailable. Fatal to the worker loop. */
export class StorageError extends Error {
  constructor(
    message: string,
    public readonly operation?: string,
  ) {
    super(message);
    this.name = 'StorageError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
