// packages/core/src/types/jobs.ts — Job queue types and the submission schema

import { z } from 'zod';

export const JOB_TYPES = ['ScanChanged', 'ScanAll', 'PRSweep'] as const;
export const JOB_MODES = ['changed', 'all'] as const;

export type JobType = (typeof JOB_TYPES)[number];
export type JobMode = (typeof JOB_MODES)[number];

/** `owner/name`, as accepted by the git host CLI */
export const REPO_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

export interface Job {
  id: string;
  type: JobType;
  mode: JobMode;
  repo: string | null;
  autoPr: boolean;
  enqueuedAt: string;
}

/** A job as held by the queue, with its FIFO position and claim marker. */
export interface QueuedJob extends Job {
  seq: number;
  claimedBy: string | null;
  claimedAt: string | null;
}

// -- Submission payload (wire format) --
export const jobSpecSchema = z
  .object({
    type: z.enum(JOB_TYPES),
    mode: z.enum(JOB_MODES).default('changed'),
    repo: z
      .string()
      .regex(REPO_PATTERN, 'must look like owner/name')
      .optional(),
    auto_pr: z.boolean().default(true),
  });

export type JobSpec = z.input<typeof jobSpecSchema>;
export type ParsedJobSpec = z.output<typeof jobSpecSchema>;

export interface QueueSnapshot {
  size: number;
  items: QueuedJob[];
}
