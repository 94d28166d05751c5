import { mkdirSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { EventLog, JobQueue, StorageError, createLogger, openDatabase, type StreamState, type VigilEvent } from '@vigil/core';
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';

import { FollowPrinter, eventsCommand } from '../src/commands/events.js';
import { createBatchHandler, createFlushHandler } from '../src/commands/watch.js';
import { createProgram } from '../src/program.js';
import type { ChangeBatch } from '../src/watch/debouncer.js';

function event(seq: number, kind = 'job.progress'): VigilEvent {
  return { seq, ts: '2026-01-01T00:00:00.000Z', kind };
}

function state(patch: Partial<StreamState>): StreamState {
  return { connected: false, mode: 'idle', events: [], error: null, ...patch };
}

function batch(paths: string[]): ChangeBatch {
  return { batchId: 'batch_1', paths, windowStart: 0, windowEnd: 10, reason: 'quiet', suppressed: 0 };
}

describe('command registration', () => {
  it('registers watch with its repo argument and options', () => {
    const watch = createProgram().commands.find((c) => c.name() === 'watch');
    expect(watch?.registeredArguments.map((a) => a.name())).toEqual(['repo']);
    const opts = watch?.options.map((o) => o.long);
    expect(opts).toEqual(['--path', '--no-auto-pr', '--quiet-ms', '--max-wait-ms', '--cooldown-ms']);
  });

  it('registers events with follow and gateway options', () => {
    const events = createProgram().commands.find((c) => c.name() === 'events');
    const opts = events?.options.map((o) => o.long);
    expect(opts).toContain('--follow');
    expect(opts).toContain('--since-seq');
    expect(opts).toContain('--url');
    expect(opts).toContain('--api-key');
  });
});

describe('FollowPrinter', () => {
  it('prints each event once across pushes and poll windows', () => {
    const out: number[] = [];
    const printer = new FollowPrinter((e) => out.push(e.seq), () => {});

    printer.handle(state({ mode: 'push', connected: true, events: [event(1), event(2)] }));
    printer.handle(state({ mode: 'push', connected: true, events: [event(1), event(2), event(3)] }));
    // A poll window overlapping what was already printed
    printer.handle(state({ mode: 'poll', events: [event(2), event(3), event(4)] }));

    expect(out).toEqual([1, 2, 3, 4]);
    expect(printer.cursor).toBe(4);
  });

  it('reports mode changes only', () => {
    const status: string[] = [];
    const printer = new FollowPrinter(() => {}, (m) => status.push(m));

    printer.handle(state({ mode: 'push', connected: true }));
    printer.handle(state({ mode: 'push', connected: true, events: [event(1)] }));
    printer.handle(state({ mode: 'poll', error: 'Stream closed by gateway' }));
    printer.handle(state({ mode: 'push', connected: true }));

    expect(status).toHaveLength(3);
    expect(status[0]).toContain('push channel open');
    expect(status[1]).toContain('polling: push unavailable (Stream closed by gateway)');
    expect(status[2]).toContain('push channel open');
  });

  it('starts after a given sequence number', () => {
    const out: number[] = [];
    const printer = new FollowPrinter((e) => out.push(e.seq), () => {}, 5);
    printer.handle(state({ mode: 'poll', events: [event(4), event(5), event(6)] }));
    expect(out).toEqual([6]);
  });
});

describe('watch batches', () => {
  let db: ReturnType<typeof openDatabase>;
  let queue: JobQueue;

  beforeEach(() => {
    db = openDatabase(':memory:');
    queue = new JobQueue(db, new EventLog(db));
  });

  afterEach(() => {
    db.close();
  });

  it('queues one ScanChanged job per batch', () => {
    const handle = createBatchHandler(queue, 'org/app', false);
    const result = handle(batch(['a.ts', 'b.ts']));

    expect(result).toMatchObject({ type: 'watch_batch', repo: 'org/app', files: 2, reason: 'quiet' });
    expect(result.jobId).not.toBeNull();
    expect(queue.get(result.jobId ?? '')).toMatchObject({ type: 'ScanChanged', mode: 'changed', autoPr: false });
  });

  it('skips a batch while a scan for the repo is pending', () => {
    const handle = createBatchHandler(queue, 'org/app', true);
    handle(batch(['a.ts']));
    const second = handle(batch(['b.ts']));

    expect(second.jobId).toBeNull();
    expect(queue.size()).toBe(1);
  });

  it('queues again once the pending scan is claimed', () => {
    const handle = createBatchHandler(queue, 'org/app', true);
    handle(batch(['a.ts']));
    queue.claimNext('w1');

    expect(handle(batch(['a.ts'])).jobId).not.toBeNull();
    expect(queue.size()).toBe(2);
  });

  it('does not block other repositories', () => {
    createBatchHandler(queue, 'org/app', true)(batch(['a.ts']));
    expect(createBatchHandler(queue, 'org/lib', true)(batch(['a.ts'])).jobId).not.toBeNull();
  });

  describe('flush handler', () => {
    let log: MockInstance<typeof console.log>;
    let stderr: MockInstance<typeof console.error>;

    beforeEach(() => {
      log = vi.spyOn(console, 'log').mockImplementation(() => {});
      stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('prints the batch event for a queued scan', () => {
      const flush = createFlushHandler(createBatchHandler(queue, 'org/app', false), 'org/app', createLogger('error'));
      flush(batch(['a.ts']));

      expect(log).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(log.mock.calls[0][0]))).toMatchObject({ type: 'watch_batch', repo: 'org/app', files: 1 });
    });

    it('logs a storage failure instead of throwing from the timer', () => {
      const flush = createFlushHandler(createBatchHandler(queue, 'org/app', false), 'org/app', createLogger('error'));
      db.close();

      expect(() => flush(batch(['a.ts']))).not.toThrow();
      expect(log).not.toHaveBeenCalled();
      expect(stderr).toHaveBeenCalledTimes(1);
      expect(String(stderr.mock.calls[0][1])).toMatch(/^Could not queue batch batch_1 for org\/app: /);
      db = openDatabase(':memory:');
    });

    it('logs the message of a thrown submission error', () => {
      const failing = () => {
        throw new StorageError('database is locked', 'job.submit');
      };
      const flush = createFlushHandler(failing, 'org/app', createLogger('error'));
      flush(batch(['a.ts']));
      expect(stderr.mock.calls[0][1]).toBe('Could not queue batch batch_1 for org/app: database is locked');
    });
  });
});

describe('events command', () => {
  let dir: string;
  let log: MockInstance<typeof console.log>;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'vigil-cli-events-'));
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    mkdirSync(join(dir, '.vigil'));
    const db = openDatabase(join(dir, '.vigil', 'vigil.db'));
    const events = new EventLog(db);
    for (let i = 1; i <= 5; i++) events.append({ kind: 'tick', jobId: i % 2 === 0 ? 'job-even' : undefined, line: `t${i}` });
    db.close();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  function lines(): string[] {
    return log.mock.calls.map((call) => {
      const parsed: unknown = JSON.parse(String(call[0]));
      return typeof parsed === 'object' && parsed !== null && 'line' in parsed ? String(parsed.line) : '';
    });
  }

  it('prints the newest n events oldest first', async () => {
    await eventsCommand({ dir, n: 2 });
    expect(lines()).toEqual(['t4', 't5']);
  });

  it('prints events after a sequence number', async () => {
    await eventsCommand({ dir, sinceSeq: 3 });
    expect(lines()).toEqual(['t4', 't5']);
  });

  it('prints the events of one job', async () => {
    await eventsCommand({ dir, job: 'job-even' });
    expect(lines()).toEqual(['t2', 't4']);
  });
});
