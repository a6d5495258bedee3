/**
 * Scheduler
 *
 * Runs the digest on a cron schedule
 */

import cron from 'node-cron';
import { logger } from './utils/logger.js';

export interface SchedulerOptions {
  cronExpression: string;
  timezone: string;
}

/**
 * Wrap a task so that a trigger firing during a run is skipped
 */
export function withRunLock(task: () => Promise<void>): () => Promise<boolean> {
  let isRunning = false;

  return async () => {
    if (isRunning) {
      logger.warn('Digest already running, skipping this execution');
      return false;
    }

    isRunning = true;
    const startTime = new Date();
    logger.info({ startTime: startTime.toISOString() }, 'Scheduled digest starting');

    try {
      await task();
      logger.info(
        { startTime: startTime.toISOString(), endTime: new Date().toISOString() },
        'Scheduled digest completed'
      );
    } catch (error) {
      logger.error({ error }, 'Scheduled digest failed');
    } finally {
      isRunning = false;
    }
    return true;
  };
}

/**
 * Start the scheduler. Returns a function that stops it.
 */
export function startScheduler(task: () => Promise<void>, options: SchedulerOptions): () => void {
  const { cronExpression, timezone } = options;

  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid cron expression: ${cronExpression}`);
  }

  logger.info({ cronExpression, timezone }, 'Starting scheduler');

  const run = withRunLock(task);
  const scheduledTask = cron.schedule(
    cronExpression,
    () => {
      run().catch((error: unknown) => {
        logger.error({ error }, 'Digest execution failed');
      });
    },
    { timezone }
  );

  logger.info('Scheduler started');

  return () => {
    scheduledTask.stop();
    logger.info('Scheduler stopped');
  };
}
