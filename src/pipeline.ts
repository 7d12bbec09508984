/**
 * Main Pipeline
 *
 * Runs one logical date through three stages, each at most once to completion:
 * 1. fetch    - pull the day's papers from the source and archive them
 * 2. classify - label every archived paper that has no result yet
 * 3. notify   - build a digest per channel and deliver it
 *
 * Stage markers make re-runs resume where the previous run stopped.
 */

import crypto from 'crypto';
import { classifyBatch, ClassificationBatchError, type ItemOutcome } from './classifier/index.js';
import type { PipelineContext } from './context.js';
import {
  countClassified,
  countDocuments,
  getClassifiedDocuments,
  getUnclassifiedDocuments,
  recordClassificationFailures,
  saveClassifications,
  saveDocuments,
} from './db/queries.js';
import { buildDigest } from './digest/index.js';
import {
  STAGES,
  type Document,
  type RunStatus,
  type RunSummary,
  type SkipReason,
  type StageMarker,
  type StageMeta,
  type StageName,
  type StageReport,
} from './types/index.js';
import { formatDate, isWeekend, resolveTargetDate } from './utils/date.js';
import { AbortedError, NotifierError, SourceUnavailableError, StorageError, toErrorMessage } from './utils/errors.js';
import { createChildLogger, type Logger } from './utils/logger.js';

/**
 * Pipeline options
 */
export interface RunOptions {
  /** YYYY-MM-DD; defaults to the most recent weekday before today (UTC) */
  targetDate?: string;
  /** Run even when the calendar policy expects no upstream updates */
  force?: boolean;
  signal?: AbortSignal;
  now?: Date;
}

interface StageResult {
  attempted: number;
  succeeded: number;
  failed: number;
  meta: StageMeta;
  notes?: string[];
}

interface StageRun {
  runDate: string;
  ctx: PipelineContext;
  signal: AbortSignal | undefined;
  log: Logger;
}

type StageRunner = (run: StageRun) => Promise<StageResult>;

const RUNNERS: Record<StageName, StageRunner> = {
  fetch: runFetchStage,
  classify: runClassifyStage,
  notify: runNotifyStage,
};

/**
 * Run the full pipeline for one date
 */
export async function runPipeline(ctx: PipelineContext, options: RunOptions = {}): Promise<RunSummary> {
  const startTime = Date.now();
  const now = options.now ?? new Date();
  const runDate = resolveTargetDate(options.targetDate, now);
  const calendarDay = options.targetDate !== undefined ? runDate : formatDate(now);
  const log = createChildLogger({ runDate });
  const stages = emptyReports();
  const errors: string[] = [];
  const notes: string[] = [];

  const finish = (status: RunStatus, documentCount: number, skipReason?: SkipReason): RunSummary => {
    const summary: RunSummary = {
      status,
      date: runDate,
      stages,
      documentCount,
      summary: describeRun(status, runDate, calendarDay, stages, notes, skipReason),
      errors,
      durationMs: Date.now() - startTime,
    };
    if (skipReason) {
      summary.skipReason = skipReason;
    }
    return summary;
  };

  if (ctx.profile.schedule.mode === 'workday' && isWeekend(calendarDay) && !options.force) {
    log.info({ calendarDay }, 'Weekend, no upstream updates expected; skipping run');
    return finish('skipped', 0, 'no_updates_expected');
  }

  let markers: Record<StageName, StageMarker>;
  try {
    markers = await readMarkers(ctx, runDate);
  } catch (error) {
    log.error({ error: toErrorMessage(error) }, 'Failed to read stage markers');
    errors.push(toErrorMessage(error));
    return finish('failed', 0);
  }

  if (STAGES.every((stage) => markers[stage].status === 'done')) {
    for (const stage of STAGES) {
      stages[stage] = skippedReport(markers[stage]);
    }
    log.info('All stages already done; nothing to do');
    return finish('skipped', markers.fetch.itemCount, 'already_done');
  }

  log.info({ force: options.force ?? false }, 'Starting pipeline');
  let status: RunStatus = 'completed';

  for (const stage of STAGES) {
    const marker = markers[stage];
    const stageLog = log.child({ stage });

    if (marker.status === 'done') {
      stages[stage] = skippedReport(marker);
      stageLog.info({ itemCount: marker.itemCount }, 'Stage already done; skipping');
      continue;
    }

    try {
      if (options.signal?.aborted) {
        throw new AbortedError(`Run aborted before ${stage}`);
      }
      await ctx.store.markStarted(runDate, stage);
      stageLog.info('Stage started');

      const result = await RUNNERS[stage]({ runDate, ctx, signal: options.signal, log: stageLog });
      stages[stage] = {
        outcome: 'done',
        attempted: result.attempted,
        succeeded: result.succeeded,
        failed: result.failed,
      };
      notes.push(...(result.notes ?? []));
      stageLog.info(
        { attempted: result.attempted, succeeded: result.succeeded, failed: result.failed },
        'Stage completed'
      );

      try {
        await ctx.store.markDone(runDate, stage, result.meta);
      } catch (error) {
        // The stage's work is kept; the next run repeats only what is still missing.
        errors.push(`${stage}: ${toErrorMessage(error)}`);
        stageLog.error({ error: toErrorMessage(error) }, 'Failed to mark stage done');
      }
    } catch (error) {
      const reason = toErrorMessage(error);
      const counts = error instanceof ClassificationBatchError ? error.outcome : null;
      stages[stage] = {
        outcome: 'failed',
        attempted: counts ? counts.items.length : 0,
        succeeded: counts ? counts.succeeded : 0,
        failed: counts ? counts.failed : 0,
      };
      errors.push(`${stage}: ${reason}`);
      stageLog.error({ error: reason, code: errorCode(error) }, 'Stage failed');

      try {
        await ctx.store.markFailed(runDate, stage, reason);
      } catch (markError) {
        errors.push(`${stage}: ${toErrorMessage(markError)}`);
        stageLog.error({ error: toErrorMessage(markError) }, 'Failed to mark stage failed');
      }

      status = 'failed';
      break;
    }
  }

  const documentCount = safeCount(() => countDocuments(runDate), errors);
  const summary = finish(status, documentCount);

  try {
    await ctx.store.recordRun(runDate, status, summary.summary);
  } catch (error) {
    errors.push(`run record: ${toErrorMessage(error)}`);
    log.error({ error: toErrorMessage(error) }, 'Failed to record run');
  }

  log.info({ status, durationMs: summary.durationMs, errors: errors.length }, summary.summary);
  return summary;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Stages
// ═══════════════════════════════════════════════════════════════════════════════

async function runFetchStage({ runDate, ctx, signal, log }: StageRun): Promise<StageResult> {
  const categories = ctx.profile.subscriptions.categories;
  const fetched = await ctx.source.fetch(runDate, categories, { signal });

  const seen = new Set<string>();
  const batchId = crypto.randomUUID();
  const documents: Document[] = [];
  for (const doc of fetched) {
    if (seen.has(doc.id)) {
      continue;
    }
    seen.add(doc.id);
    documents.push({ ...doc, runDate, batchId, position: documents.length });
  }

  if (documents.length === 0) {
    throw new SourceUnavailableError(`No documents published for ${runDate} yet`);
  }

  storage(() => saveDocuments(documents), 'archive documents');
  log.info({ fetched: fetched.length, unique: documents.length, batchId }, 'Documents archived');

  return {
    attempted: fetched.length,
    succeeded: documents.length,
    failed: 0,
    meta: { itemCount: documents.length, batchId, categories },
  };
}

async function runClassifyStage({ runDate, ctx, signal, log }: StageRun): Promise<StageResult> {
  const pending = storage(() => getUnclassifiedDocuments(runDate), 'load unclassified documents');
  const archived = storage(() => countDocuments(runDate), 'count documents');

  if (archived > 0 && pending.length === 0) {
    log.info({ archived }, 'Every archived document already classified');
    return { attempted: 0, succeeded: 0, failed: 0, meta: { itemCount: archived, resumed: 0 } };
  }

  const classifier = ctx.classifier();
  const settings = ctx.profile.classifier;
  const outcome = await classifyBatch(pending, classifier, {
    concurrency: settings.maxConcurrency,
    timeoutMs: settings.timeoutMs,
    signal,
    expectNonEmpty: true,
    onProgress: (completed, total) => {
      if (completed === total || completed % 10 === 0) {
        log.debug({ completed, total }, 'Classification progress');
      }
    },
  }).catch((error: unknown) => {
    if (error instanceof ClassificationBatchError) {
      persistFailures(runDate, error.outcome.items);
    }
    throw error;
  });

  const classifiedAt = new Date();
  storage(
    () =>
      saveClassifications(
        outcome.items.flatMap((item) =>
          item.ok
            ? [{ documentId: item.documentId, runDate, result: item.result, model: classifier.model, classifiedAt }]
            : []
        )
      ),
    'save classifications'
  );
  persistFailures(runDate, outcome.items);

  if (outcome.aborted) {
    throw new AbortedError(`Classification aborted after ${outcome.succeeded} of ${pending.length} documents`);
  }

  const classified = storage(() => countClassified(runDate), 'count classifications');
  return {
    attempted: pending.length,
    succeeded: outcome.succeeded,
    failed: outcome.failed,
    meta: { itemCount: classified, failed: outcome.failed, resumed: archived - pending.length },
  };
}

async function runNotifyStage({ runDate, ctx, signal, log }: StageRun): Promise<StageResult> {
  const documents = storage(() => getClassifiedDocuments(runDate), 'load classified documents');
  const notifiers = ctx.notifiers();

  if (notifiers.length === 0) {
    log.warn('No notification channels configured');
    return {
      attempted: 0,
      succeeded: 0,
      failed: 0,
      meta: { itemCount: 0, channels: 0 },
      notes: ['no notification channels configured'],
    };
  }

  const result: StageResult = { attempted: 0, succeeded: 0, failed: 0, meta: { itemCount: 0 } };
  const channelErrors: string[] = [];

  for (const notifier of notifiers) {
    const digest = buildDigest(documents, { date: runDate, excludeTags: notifier.excludeTags });
    log.info(
      { channel: notifier.channel, total: digest.total, excluded: digest.excluded },
      'Delivering digest'
    );

    try {
      const receipt = await notifier.sendDigest(digest, { signal });
      result.attempted += receipt.attempted;
      result.succeeded += receipt.delivered;
      result.failed += receipt.failed;
    } catch (error) {
      if (error instanceof AbortedError) {
        throw error;
      }
      result.failed += 1;
      channelErrors.push(`${notifier.channel}: ${toErrorMessage(error)}`);
      log.error({ channel: notifier.channel, error: toErrorMessage(error) }, 'Channel delivery failed');
    }
  }

  if (channelErrors.length === notifiers.length) {
    throw new NotifierError('all', `Delivery failed on every channel (${channelErrors.join('; ')})`);
  }

  result.meta = { itemCount: result.succeeded, channels: notifiers.length, failedChannels: channelErrors.length };
  result.notes = channelErrors.map((error) => `channel ${error}`);
  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════════════════

async function readMarkers(ctx: PipelineContext, runDate: string): Promise<Record<StageName, StageMarker>> {
  const [fetch, classify, notify] = await Promise.all(
    STAGES.map((stage) => ctx.store.getStatus(runDate, stage))
  );
  if (!fetch || !classify || !notify) {
    throw new StorageError(`Incomplete stage markers for ${runDate}`);
  }
  return { fetch, classify, notify };
}

function persistFailures(runDate: string, items: ItemOutcome[]): void {
  const failedAt = new Date();
  const failures = items.flatMap((item) =>
    item.ok || !item.documentId ? [] : [{ documentId: item.documentId, runDate, reason: item.error, failedAt }]
  );
  if (failures.length > 0) {
    storage(() => recordClassificationFailures(failures), 'record classification failures');
  }
}

function storage<T>(fn: () => T, operation: string): T {
  try {
    return fn();
  } catch (error) {
    throw new StorageError(`Failed to ${operation}: ${toErrorMessage(error)}`, { cause: error });
  }
}

function safeCount(fn: () => number, errors: string[]): number {
  try {
    return fn();
  } catch (error) {
    errors.push(`document count: ${toErrorMessage(error)}`);
    return 0;
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function emptyReports(): Record<StageName, StageReport> {
  const notRun = (): StageReport => ({ outcome: 'not_run', attempted: 0, succeeded: 0, failed: 0 });
  return { fetch: notRun(), classify: notRun(), notify: notRun() };
}

function skippedReport(marker: StageMarker): StageReport {
  return { outcome: 'skipped', attempted: 0, succeeded: marker.itemCount, failed: 0 };
}

function describeStage(report: StageReport): string {
  switch (report.outcome) {
    case 'done':
      return report.failed > 0
        ? `${report.succeeded}/${report.attempted} (${report.failed} failed)`
        : `${report.succeeded}/${report.attempted}`;
    case 'skipped':
      return `skipped (${report.succeeded} done earlier)`;
    case 'failed':
      return 'failed';
    case 'not_run':
      return 'not run';
  }
}

export function describeRun(
  status: RunStatus,
  runDate: string,
  calendarDay: string,
  stages: Record<StageName, StageReport>,
  notes: string[],
  skipReason?: SkipReason
): string {
  if (skipReason === 'no_updates_expected') {
    return `No upstream updates expected on ${calendarDay}; run skipped`;
  }
  if (skipReason === 'already_done') {
    return `All stages already done for ${runDate}`;
  }

  const parts = STAGES.map((stage) => `${stage} ${describeStage(stages[stage])}`);
  const suffix = notes.length > 0 ? ` [${notes.join('; ')}]` : '';
  return `Run ${runDate} ${status}: ${parts.join(', ')}${suffix}`;
}
