// packages/cli/src/watch/debouncer.ts — Coalesce bursts of file changes into one batch

import { generateId } from '@vigil/core';

export type ChangeKind = 'add' | 'change' | 'unlink';

export interface FileChange {
  path: string;
  kind: ChangeKind;
  ts: number;
}

export interface DebounceConfig {
  /** Quiet time that ends a burst */
  quietMs: number;
  /** Upper bound on how long a burst is held */
  maxWaitMs: number;
  /** Changes arriving this soon after a flush are counted, not batched */
  cooldownMs: number;
  maxBatchSize: number;
}

export interface ChangeBatch {
  batchId: string;
  paths: string[];
  windowStart: number;
  windowEnd: number;
  reason: 'quiet' | 'maxWait' | 'maxBatch' | 'flush';
  /** Changes ignored during the cooldown before this batch */
  suppressed: number;
}

export const DEFAULT_DEBOUNCE: DebounceConfig = {
  quietMs: 800,
  maxWaitMs: 5000,
  cooldownMs: 1500,
  maxBatchSize: 50,
};

export class Debouncer {
  private readonly config: DebounceConfig;
  private readonly pending = new Map<string, FileChange>();
  private quietTimer: ReturnType<typeof setTimeout> | null = null;
  private maxWaitTimer: ReturnType<typeof setTimeout> | null = null;
  private cooldownUntil = 0;
  private windowStart = 0;
  private suppressed = 0;
  private destroyed = false;

  constructor(
    private readonly onFlush: (batch: ChangeBatch) => void,
    config?: Partial<DebounceConfig>,
  ) {
    this.config = { ...DEFAULT_DEBOUNCE, ...config };
  }

  /** Returns false when the change was dropped (cooldown or destroyed). */
  push(change: FileChange): boolean {
    if (this.destroyed) return false;
    if (change.ts < this.cooldownUntil) {
      this.suppressed++;
      return false;
    }

    if (this.pending.size === 0) {
      this.windowStart = change.ts;
      this.maxWaitTimer = setTimeout(() => this.flush('maxWait'), this.config.maxWaitMs);
    }

    // Latest kind per path wins
    this.pending.set(change.path, change);
    if (this.quietTimer) clearTimeout(this.quietTimer);
    this.quietTimer = setTimeout(() => this.flush('quiet'), this.config.quietMs);

    if (this.pending.size >= this.config.maxBatchSize) {
      this.flush('maxBatch');
    }
    return true;
  }

  flushNow(): void {
    this.flush('flush');
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  destroy(): void {
    this.clearTimers();
    this.pending.clear();
    this.destroyed = true;
  }

  private flush(reason: ChangeBatch['reason']): void {
    if (this.pending.size === 0) return;
    this.clearTimers();

    const now = Date.now();
    const batch: ChangeBatch = {
      batchId: generateId('batch'),
      paths: [...this.pending.keys()].sort(),
      windowStart: this.windowStart,
      windowEnd: now,
      reason,
      suppressed: this.suppressed,
    };

    this.pending.clear();
    this.suppressed = 0;
    this.cooldownUntil = now + this.config.cooldownMs;
    this.onFlush(batch);
  }

  private clearTimers(): void {
    if (this.quietTimer) clearTimeout(this.quietTimer);
    if (this.maxWaitTimer) clearTimeout(this.maxWaitTimer);
    this.quietTimer = null;
    this.maxWaitTimer = null;
  }
}
