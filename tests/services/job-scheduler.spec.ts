import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { JobScheduler } from '../../src/services/job-scheduler.js';
import type { SchedulerEvent } from '../../src/types/scheduler.js';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
}));

describe('JobScheduler', () => {
  let scheduler: JobScheduler;

  beforeEach(() => {
    scheduler = new JobScheduler();
  });

  afterEach(() => {
    scheduler.stopAll();
    vi.restoreAllMocks();
  });

  it('registers a job and surfaces it in listJobs()', () => {
    scheduler.register({
      id: 'poll',
      cronExpression: '*/5 * * * *',
      description: 'Every 5 minutes',
      handler: vi.fn(),
      autoStart: false,
    });

    expect(scheduler.listJobs()).toEqual([
      {
        id: 'poll',
        cronExpression: '*/5 * * * *',
        description: 'Every 5 minutes',
        status: 'idle',
        lastRunAt: null,
        lastError: null,
        runCount: 0,
        skippedCount: 0,
      },
    ]);
    expect(scheduler.has('poll')).toBe(true);
  });

  it('throws when registering a duplicate job ID', () => {
    scheduler.register({ id: 'dup', cronExpression: '0 * * * *', description: 'Hourly', handler: vi.fn(), autoStart: false });

    expect(() =>
      scheduler.register({ id: 'dup', cronExpression: '0 * * * *', description: 'Again', handler: vi.fn(), autoStart: false }),
    ).toThrow("[JobScheduler] Job 'dup' is already registered.");
  });

  it('throws when registering a job with an invalid cron expression', () => {
    expect(() =>
      scheduler.register({ id: 'bad', cronExpression: 'not-a-cron', description: 'Bad', handler: vi.fn(), autoStart: false }),
    ).toThrow("[JobScheduler] Invalid cron expression for job 'bad': not-a-cron");
    expect(scheduler.has('bad')).toBe(false);
  });

  it('unregisters known jobs only', () => {
    scheduler.register({ id: 'gone', cronExpression: '0 0 * * *', description: 'Daily', handler: vi.fn(), autoStart: false });

    expect(scheduler.unregister('gone')).toBe(true);
    expect(scheduler.unregister('gone')).toBe(false);
    expect(scheduler.getJob('gone')).toBeUndefined();
  });

  it('start, stop and runNow throw for unknown job IDs', async () => {
    expect(() => scheduler.start('ghost')).toThrow("[JobScheduler] Job 'ghost' is not registered.");
    expect(() => scheduler.stop('ghost')).toThrow("[JobScheduler] Job 'ghost' is not registered.");
    await expect(scheduler.runNow('ghost')).rejects.toThrow("[JobScheduler] Job 'ghost' is not registered.");
  });

  it('runs a job on demand and emits start and done', async () => {
    const seen: string[] = [];
    scheduler.on('job:start', (e) => seen.push(`${e.type}:${e.jobId}`));
    scheduler.on('job:done', (e) => seen.push(`${e.type}:${e.jobId}`));
    const handler = vi.fn();
    scheduler.register({ id: 'poll', cronExpression: '0 * * * *', description: 'Poll', handler, autoStart: false });

    await scheduler.runNow('poll');

    expect(handler).toHaveBeenCalledOnce();
    expect(seen).toEqual(['job:start:poll', 'job:done:poll']);
    const snap = scheduler.getJob('poll');
    expect(snap?.runCount).toBe(1);
    expect(snap?.lastRunAt).toBeInstanceOf(Date);
    expect(snap?.status).toBe('stopped');
  });

  it('records the error and emits job:error when the handler throws', async () => {
    const errors: SchedulerEvent[] = [];
    scheduler.on('job:error', (e) => errors.push(e));
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    scheduler.register({
      id: 'broken',
      cronExpression: '0 * * * *',
      description: 'Will fail',
      handler: async () => {
        throw new Error('intentional-failure');
      },
      autoStart: false,
    });

    await scheduler.runNow('broken');

    expect(errors).toHaveLength(1);
    expect(errors[0]?.error).toBe('intentional-failure');
    expect(scheduler.getJob('broken')).toMatchObject({ status: 'error', lastError: 'intentional-failure' });
  });

  it('joins the run in flight instead of starting a second one', async () => {
    let release!: () => void;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const handler = vi.fn(() => gate);
    scheduler.register({ id: 'slow', cronExpression: '0 * * * *', description: 'Slow', handler, autoStart: false });

    const first = scheduler.runNow('slow');
    const second = scheduler.runNow('slow');
    release();
    await Promise.all([first, second]);

    expect(handler).toHaveBeenCalledOnce();
    expect(scheduler.getJob('slow')?.runCount).toBe(1);
  });

  it('skips cron ticks while the previous run is still going', async () => {
    const skipped: string[] = [];
    scheduler.on('job:skipped', (e) => skipped.push(e.jobId));
    let release!: () => void;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const handler = vi.fn(() => gate);
    scheduler.register({ id: 'overlap', cronExpression: '* * * * * *', description: 'Every second', handler });

    await new Promise((res) => setTimeout(res, 2_200));
    scheduler.stop('overlap');
    release();

    expect(handler).toHaveBeenCalledOnce();
    expect(skipped.length).toBeGreaterThanOrEqual(1);
    expect(scheduler.getJob('overlap')?.skippedCount).toBe(skipped.length);
  }, 10_000);

  it('on() returns an unsubscribe function that removes the listener', async () => {
    const received: string[] = [];
    const unsubscribe = scheduler.on('job:done', (e) => received.push(e.jobId));
    scheduler.register({ id: 'quiet', cronExpression: '0 * * * *', description: 'Quiet', handler: vi.fn(), autoStart: false });

    unsubscribe();
    await scheduler.runNow('quiet');

    expect(received).toEqual([]);
  });

  it('keeps running when a listener throws', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    scheduler.on('job:start', () => {
      throw new Error('listener exploded');
    });
    const handler = vi.fn();
    scheduler.register({ id: 'sturdy', cronExpression: '0 * * * *', description: 'Sturdy', handler, autoStart: false });

    await scheduler.runNow('sturdy');

    expect(handler).toHaveBeenCalledOnce();
    expect(scheduler.getJob('sturdy')?.lastError).toBeNull();
  });

  it('stopAll marks started jobs stopped', () => {
    scheduler.register({ id: 'x', cronExpression: '0 * * * *', description: 'Hourly X', handler: vi.fn() });
    scheduler.register({ id: 'y', cronExpression: '0 * * * *', description: 'Hourly Y', handler: vi.fn() });

    scheduler.stopAll();

    expect(scheduler.listJobs().map((job) => job.status)).toEqual(['stopped', 'stopped']);
  });
});
