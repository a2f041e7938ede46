/**
 * Background Job Tests
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import { JobScheduler, schedulingJobs, type JobDefinition } from '../jobs';
import { createHarness } from './fixtures';

describe('JobScheduler', () => {
  const scheduler = new JobScheduler();

  afterEach(() => {
    scheduler.stopAll();
  });

  it('rejects an invalid cron expression', () => {
    expect(() => scheduler.schedule({ name: 'broken', cronExpression: 'every minute', run: async () => undefined })).toThrow(
      'Invalid cron expression for job broken: every minute'
    );
  });

  it('registers and stops jobs', () => {
    scheduler.schedule({ name: 'sweep', cronExpression: '*/15 * * * *', run: async () => undefined });

    expect(scheduler.jobNames).toEqual(['sweep']);

    scheduler.stopAll();
    expect(scheduler.jobNames).toEqual([]);
  });

  it('reports a failing run without throwing', async () => {
    const job: JobDefinition = {
      name: 'failing',
      cronExpression: '* * * * *',
      run: async () => {
        throw new Error('database unavailable');
      },
    };

    await expect(scheduler.execute(job)).resolves.toBe(false);
  });

  it('skips a tick while the previous run is still going', async () => {
    let finish: () => void = () => undefined;
    const run = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        })
    );
    const job: JobDefinition = { name: 'slow', cronExpression: '* * * * *', run };

    const first = scheduler.execute(job);
    expect(await scheduler.execute(job)).toBe(false);

    finish();
    expect(await first).toBe(true);
    expect(run).toHaveBeenCalledTimes(1);
  });
});

describe('schedulingJobs', () => {
  it('runs the outbox retry and the reminder sweep', async () => {
    const { services } = createHarness();
    const jobs = schedulingJobs(services);

    expect(jobs.map((job) => [job.name, job.cronExpression])).toEqual([
      ['outbox-retry', '* * * * *'],
      ['appointment-reminders', '*/15 * * * *'],
    ]);

    await expect(jobs[0].run()).resolves.toEqual({ processed: 0, succeeded: 0, failed: 0 });
    await expect(jobs[1].run()).resolves.toEqual({ found: 0, sent: 0 });
  });
});
