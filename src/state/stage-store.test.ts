import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { closeDatabase, initDatabase, type SqliteDatabase } from '../db/index.js';
import { StorageError } from '../utils/errors.js';
import { SqliteStageStore } from './stage-store.js';

describe('SqliteStageStore', () => {
  let db: SqliteDatabase;
  let store: SqliteStageStore;

  beforeEach(() => {
    db = initDatabase(':memory:');
    store = new SqliteStageStore(db, () => new Date('2024-06-04T09:00:00Z'));
  });

  afterEach(() => {
    closeDatabase();
  });

  it('reports pending for stages never started', async () => {
    await expect(store.getStatus('2024-06-03', 'fetch')).resolves.toEqual({
      runDate: '2024-06-03',
      stage: 'fetch',
      status: 'pending',
      itemCount: 0,
      updatedAt: null,
      meta: {},
    });
  });

  it('moves through started, failed and done', async () => {
    await store.markStarted('2024-06-03', 'fetch');
    expect((await store.getStatus('2024-06-03', 'fetch')).status).toBe('in_progress');

    await store.markFailed('2024-06-03', 'fetch', 'feed unreachable');
    const failed = await store.getStatus('2024-06-03', 'fetch');
    expect(failed.status).toBe('failed');
    expect(failed.error).toBe('feed unreachable');

    await store.markStarted('2024-06-03', 'fetch');
    const restarted = await store.getStatus('2024-06-03', 'fetch');
    expect(restarted.status).toBe('in_progress');
    expect(restarted.error).toBeUndefined();

    await store.markDone('2024-06-03', 'fetch', { itemCount: 42, batchId: 'b-1' });
    const done = await store.getStatus('2024-06-03', 'fetch');
    expect(done).toEqual({
      runDate: '2024-06-03',
      stage: 'fetch',
      status: 'done',
      itemCount: 42,
      updatedAt: new Date('2024-06-04T09:00:00Z'),
      meta: { itemCount: 42, batchId: 'b-1' },
    });
  });

  it('never regresses a done marker', async () => {
    await store.markDone('2024-06-03', 'classify', { itemCount: 10 });
    await store.markStarted('2024-06-03', 'classify');
    await store.markFailed('2024-06-03', 'classify', 'late failure');

    const marker = await store.getStatus('2024-06-03', 'classify');
    expect(marker.status).toBe('done');
    expect(marker.itemCount).toBe(10);
    expect(marker.error).toBeUndefined();
  });

  it('keeps markers of different dates and stages apart', async () => {
    await store.markDone('2024-06-03', 'fetch', { itemCount: 5 });
    await store.markFailed('2024-06-04', 'fetch', 'timeout');

    const history = await store.listHistory(['2024-06-04', '2024-06-03']);

    expect([...history.keys()]).toEqual(['2024-06-04', '2024-06-03']);
    expect(history.get('2024-06-03')?.fetch.status).toBe('done');
    expect(history.get('2024-06-03')?.classify.status).toBe('pending');
    expect(history.get('2024-06-04')?.fetch.error).toBe('timeout');
  });

  it('records the latest run outcome per date', async () => {
    await store.recordRun('2024-06-03', 'failed', 'first');
    await store.recordRun('2024-06-03', 'completed', 'second');

    const rows = db
      .prepare<[], { last_status: string; last_summary: string }>('SELECT last_status, last_summary FROM runs')
      .all();
    expect(rows).toEqual([{ last_status: 'completed', last_summary: 'second' }]);
  });

  it('raises StorageError when the backing database is unavailable', async () => {
    closeDatabase();

    await expect(store.getStatus('2024-06-03', 'fetch')).rejects.toThrow(StorageError);
    await expect(store.markDone('2024-06-03', 'fetch', { itemCount: 1 })).rejects.toThrow(
      /^Failed to mark fetch done for 2024-06-03: /
    );
  });
});
