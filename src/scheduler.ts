/**
 * Scheduler
 *
 * Runs the pipeline on a cron schedule
 */

import cron, { type ScheduledTask } from 'node-cron';
import { logger } from './utils/logger.js';

export interface SchedulerOptions {
  cronExpression: string;
  timezone: string;
}

/**
 * Scheduler state
 */
let scheduledTask: ScheduledTask | null = null;
let isRunning = false;

/**
 * Execute a run with a lock to prevent overlapping runs.
 * Returns false when a run was already in progress.
 */
export async function executeExclusive(run: () => Promise<unknown>): Promise<boolean> {
  if (isRunning) {
    logger.warn('Pipeline already running, skipping this execution');
    return false;
  }

  isRunning = true;
  const startTime = new Date();

  logger.info({ startTime: startTime.toISOString() }, 'Scheduled pipeline starting');

  try {
    await run();

    logger.info(
      { startTime: startTime.toISOString(), endTime: new Date().toISOString() },
      'Scheduled pipeline completed'
    );
  } catch (error) {
    logger.error({ error }, 'Scheduled pipeline failed');
  } finally {
    isRunning = false;
  }

  return true;
}

/**
 * Start the scheduler
 */
export function startScheduler(run: () => Promise<unknown>, options: SchedulerOptions): void {
  const { cronExpression, timezone } = options;

  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid cron expression: ${cronExpression}`);
  }

  logger.info({ cronExpression, timezone }, 'Starting scheduler');

  scheduledTask = cron.schedule(
    cronExpression,
    () => {
      executeExclusive(run).catch((error: unknown) => {
        logger.error({ error }, 'Pipeline execution failed');
      });
    },
    { timezone }
  );

  logger.info('Scheduler started');
}

/**
 * Stop the scheduler
 */
export function stopScheduler(): void {
  if (scheduledTask) {
    scheduledTask.stop();
    scheduledTask = null;
    logger.info('Scheduler stopped');
  }
}

/**
 * Check if scheduler is running
 */
export function isSchedulerRunning(): boolean {
  return scheduledTask !== null;
}
