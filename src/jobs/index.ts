/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - BACKGROUND JOBS
 * ============================================================================
 *
 * Periodic reminder sweep and outbox retry. A job whose previous run is still
 * going skips its tick.
 */

import cron, { type ScheduledTask } from 'node-cron';
import { config } from '../config/config';
import logger, { errorMessage } from '../config/logger';
import type { OutboxService } from '../services/outboxService';
import type { ReminderService } from '../services/reminderService';

const log = logger.child('jobs');

export interface JobDefinition {
  name: string;
  cronExpression: string;
  run: () => Promise<unknown>;
}

export class JobScheduler {
  private readonly scheduledJobs = new Map<string, ScheduledTask>();
  private readonly running = new Set<string>();

  schedule(job: JobDefinition): void {
    if (!cron.validate(job.cronExpression)) {
      throw new Error(`Invalid cron expression for job ${job.name}: ${job.cronExpression}`);
    }

    this.scheduledJobs.get(job.name)?.stop();

    const task = cron.schedule(
      job.cronExpression,
      () => {
        void this.execute(job);
      },
      { scheduled: false, timezone: 'UTC' }
    );

    this.scheduledJobs.set(job.name, task);
    task.start();

    log.info('Job scheduled', { job: job.name, cronExpression: job.cronExpression });
  }

  /**
   * Run a job once; overlapping runs are skipped
   */
  async execute(job: JobDefinition): Promise<boolean> {
    if (this.running.has(job.name)) {
      log.debug('Job still running, skipping tick', { job: job.name });
      return false;
    }

    this.running.add(job.name);
    try {
      await job.run();
      return true;
    } catch (error) {
      log.error('Scheduled job failed', { job: job.name, error: errorMessage(error) });
      return false;
    } finally {
      this.running.delete(job.name);
    }
  }

  get jobNames(): string[] {
    return [...this.scheduledJobs.keys()];
  }

  stopAll(): void {
    for (const [name, task] of this.scheduledJobs) {
      task.stop();
      log.info('Job stopped', { job: name });
    }
    this.scheduledJobs.clear();
  }
}

export interface SchedulingJobs {
  reminders: ReminderService;
  outbox: OutboxService;
}

export function schedulingJobs({ reminders, outbox }: SchedulingJobs): JobDefinition[] {
  const jobs: JobDefinition[] = [
    {
      name: 'outbox-retry',
      cronExpression: config.scheduling.outbox.cron,
      run: () => outbox.processPending(),
    },
  ];

  if (config.scheduling.reminders.enabled) {
    jobs.push({
      name: 'appointment-reminders',
      cronExpression: config.scheduling.reminders.cron,
      run: () => reminders.runSweep(),
    });
  }

  return jobs;
}

export function startJobs(services: SchedulingJobs): JobScheduler {
  const scheduler = new JobScheduler();
  for (const job of schedulingJobs(services)) {
    scheduler.schedule(job);
  }
  return scheduler;
}
