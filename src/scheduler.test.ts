import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { defaultProfile, type Profile } from './config/index.js';
import { createPipelineContext, type ContextOverrides } from './context.js';
import { closeDatabase, initDatabase } from './db/index.js';
import {
  executeScheduledRun,
  isSchedulerRunning,
  runWithAttempts,
  sendWeekendReminder,
  startScheduler,
  stopScheduler,
} from './scheduler.js';
import type { Source } from './sources/types.js';
import { SqliteStageStore } from './state/stage-store.js';
import { FakeClassifier, FakeNotifier } from './testing/fakes.js';
import { makeSourceDocument } from './testing/fixtures.js';
import type { SourceDocument } from './types/index.js';
import { ConfigError, SourceUnavailableError } from './utils/errors.js';

/** Fails the first `failures` fetches, then returns one document */
class LateSource implements Source {
  readonly name = 'late';
  calls = 0;

  constructor(private readonly failures: number) {}

  async fetch(): Promise<SourceDocument[]> {
    this.calls += 1;
    if (this.calls <= this.failures) {
      throw new SourceUnavailableError('No documents published yet');
    }
    return [makeSourceDocument(0)];
  }
}

describe('scheduler', () => {
  let profile: Profile;

  beforeEach(() => {
    initDatabase(':memory:');
    profile = defaultProfile();
  });

  afterEach(() => {
    stopScheduler();
    closeDatabase();
  });

  function context(overrides: ContextOverrides = {}) {
    return createPipelineContext(profile, {
      store: new SqliteStageStore(initDatabase(':memory:')),
      classifier: new FakeClassifier(),
      notifiers: [new FakeNotifier()],
      ...overrides,
    });
  }

  describe('runWithAttempts', () => {
    it('retries failed runs on the configured interval until one succeeds', async () => {
      const source = new LateSource(2);
      const sleepFn = vi.fn(async () => {});

      const summary = await runWithAttempts(context({ source }), { targetDate: '2024-06-03', sleepFn });

      expect(summary.status).toBe('completed');
      expect(source.calls).toBe(3);
      expect(sleepFn.mock.calls).toEqual([[3_600_000], [3_600_000]]);
    });

    it('returns the last failed summary once attempts run out', async () => {
      const source = new LateSource(10);
      const sleepFn = vi.fn(async () => {});

      const summary = await runWithAttempts(context({ source }), {
        targetDate: '2024-06-03',
        maxAttempts: 3,
        intervalMs: 50,
        sleepFn,
      });

      expect(summary.status).toBe('failed');
      expect(source.calls).toBe(3);
      expect(sleepFn).toHaveBeenCalledTimes(2);
    });

    it('sends a weekend reminder when enabled', async () => {
      profile.schedule.weekendReminder = true;
      const notifier = new FakeNotifier();

      const summary = await runWithAttempts(context({ source: new LateSource(0), notifiers: [notifier] }), {
        targetDate: '2024-06-01',
      });

      expect(summary.skipReason).toBe('no_updates_expected');
      expect(notifier.texts).toEqual(['📅 2024-06-01: no new papers on weekends. Enjoy your break!']);
    });
  });

  it('counts only the reminders that were delivered', async () => {
    const ctx = context({ notifiers: [new FakeNotifier('a'), new FakeNotifier('b', [], true)] });

    await expect(sendWeekendReminder(ctx, '2024-06-01')).resolves.toBe(1);
  });

  it('refuses to start a second run while one is in progress', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const source: Source = {
      name: 'gated',
      fetch: async () => {
        await gate;
        return [makeSourceDocument(0)];
      },
    };
    const ctx = context({ source });

    const first = executeScheduledRun(ctx, { targetDate: '2024-06-03' });
    const second = await executeScheduledRun(ctx, { targetDate: '2024-06-03' });
    release();

    expect(second).toBeNull();
    expect((await first)?.status).toBe('completed');
  });

  it('validates the cron expression before scheduling', () => {
    profile.schedule.cron = 'every morning';

    expect(() => startScheduler(context())).toThrow(ConfigError);
    expect(isSchedulerRunning()).toBe(false);
  });

  it('starts and stops the cron task', () => {
    startScheduler(context());
    expect(isSchedulerRunning()).toBe(true);

    stopScheduler();
    expect(isSchedulerRunning()).toBe(false);
  });
});
