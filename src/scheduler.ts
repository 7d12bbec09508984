/**
 * Scheduler
 *
 * Runs the pipeline on a cron schedule. Each trigger makes up to
 * `schedule.maxAttempts` runs spaced by `schedule.intervalSeconds`, stopping
 * at the first run that does not fail (the feed often publishes late).
 */

import cron from 'node-cron';
import type { PipelineContext } from './context.js';
import { runPipeline, type RunOptions } from './pipeline.js';
import type { RunSummary } from './types/index.js';
import { formatDate } from './utils/date.js';
import { ConfigError, toErrorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';
import { sleep } from './utils/retry.js';

/**
 * Scheduler state
 */
let scheduledTask: cron.ScheduledTask | null = null;
let isRunning = false;

export interface AttemptOptions extends RunOptions {
  maxAttempts?: number;
  intervalMs?: number;
  sleepFn?: (ms: number) => Promise<void>;
}

/**
 * Run the pipeline until a run does not fail or attempts run out; returns the last summary
 */
export async function runWithAttempts(ctx: PipelineContext, options: AttemptOptions = {}): Promise<RunSummary> {
  const schedule = ctx.profile.schedule;
  const maxAttempts = Math.max(1, options.maxAttempts ?? schedule.maxAttempts);
  const intervalMs = options.intervalMs ?? schedule.intervalSeconds * 1000;
  const { sleepFn = sleep, ...runOptions } = options;

  let summary: RunSummary | null = null;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    summary = await runPipeline(ctx, runOptions);
    logger.info({ attempt, maxAttempts, status: summary.status, date: summary.date }, summary.summary);

    if (summary.status !== 'failed') {
      if (summary.skipReason === 'no_updates_expected' && schedule.weekendReminder) {
        await sendWeekendReminder(ctx, options.targetDate ?? formatDate(options.now ?? new Date()));
      }
      return summary;
    }

    if (attempt < maxAttempts && !options.signal?.aborted) {
      logger.warn({ attempt, maxAttempts, nextAttemptInMs: intervalMs }, 'Run failed; retrying later');
      await sleepFn(intervalMs);
    }
  }

  if (!summary) {
    throw new ConfigError('maxAttempts must be at least 1');
  }
  logger.error({ maxAttempts, date: summary.date, errors: summary.errors }, 'All run attempts failed');
  return summary;
}

/**
 * Tell every channel that no papers are expected today
 */
export async function sendWeekendReminder(ctx: PipelineContext, day: string): Promise<number> {
  const text = `📅 ${day}: no new papers on weekends. Enjoy your break!`;
  let sent = 0;

  for (const notifier of ctx.notifiers()) {
    try {
      await notifier.sendText(text);
      sent += 1;
    } catch (error) {
      logger.warn({ channel: notifier.channel, error: toErrorMessage(error) }, 'Failed to send weekend reminder');
    }
  }

  logger.info({ day, sent }, 'Weekend reminder sent');
  return sent;
}

/**
 * Execute with lock to prevent overlapping runs; returns null when a run is already in progress
 */
export async function executeScheduledRun(
  ctx: PipelineContext,
  options: AttemptOptions = {}
): Promise<RunSummary | null> {
  if (isRunning) {
    logger.warn('Pipeline already running, skipping this execution');
    return null;
  }

  isRunning = true;
  const startTime = new Date();
  logger.info({ startTime: startTime.toISOString() }, 'Scheduled pipeline starting');

  try {
    const summary = await runWithAttempts(ctx, options);
    logger.info(
      { startTime: startTime.toISOString(), endTime: new Date().toISOString(), status: summary.status },
      'Scheduled pipeline finished'
    );
    return summary;
  } finally {
    isRunning = false;
  }
}

/**
 * Start the scheduler
 */
export function startScheduler(ctx: PipelineContext): void {
  const { cron: cronExpression, timezone } = ctx.profile.schedule;

  if (!cron.validate(cronExpression)) {
    throw new ConfigError(`Invalid cron expression: ${cronExpression}`);
  }

  logger.info({ cronExpression, timezone }, 'Starting scheduler');

  scheduledTask = cron.schedule(
    cronExpression,
    () => {
      executeScheduledRun(ctx).catch((error: unknown) => {
        logger.error({ error: toErrorMessage(error) }, 'Pipeline execution failed');
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
