import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { defaultProfile } from './config/index.js';
import { closeDatabase, initDatabase } from './db/index.js';
import { saveClassifications, saveDocuments } from './db/queries.js';
import { queryDocuments, queryStatus } from './reports.js';
import { SqliteStageStore } from './state/stage-store.js';
import { makeDocument, makeResult } from './testing/fixtures.js';

describe('reports', () => {
  let store: SqliteStageStore;

  beforeEach(() => {
    store = new SqliteStageStore(initDatabase(':memory:'));
  });

  afterEach(() => {
    closeDatabase();
  });

  it('lists stage markers for recent days, newest first', async () => {
    await store.markDone('2024-06-03', 'fetch', { itemCount: 7 });
    await store.markFailed('2024-06-03', 'classify', 'model offline');

    const report = await queryStatus(store, { days: 3, now: new Date('2024-06-04T12:00:00Z') });

    expect(report.days.map((day) => day.date)).toEqual(['2024-06-03']);
    expect(report.days[0]?.stages.fetch.itemCount).toBe(7);
    expect(report.days[0]?.stages.classify.error).toBe('model offline');
    expect(report.days[0]?.stages.notify.status).toBe('pending');
  });

  it('lists no days when nothing has run', async () => {
    const report = await queryStatus(store, { days: 3, now: new Date('2024-06-04T12:00:00Z') });

    expect(report.days).toEqual([]);
  });

  it('lists classified documents with their total', () => {
    saveDocuments([makeDocument(0), makeDocument(1, { title: 'Diffusion for proteins' })]);
    saveClassifications(
      [0, 1].map((index) => ({
        documentId: makeDocument(index).id,
        runDate: '2024-06-03',
        result: makeResult(),
        model: 'fake-model',
        classifiedAt: new Date('2024-06-04T09:00:00Z'),
      }))
    );

    const listing = queryDocuments({ keyword: 'diffusion' });

    expect(listing.date).toBe('2024-06-03');
    expect(listing.count).toBe(1);
    expect(listing.documents[0]?.title).toBe('Diffusion for proteins');
  });

  describe('describeConfig', () => {
    afterEach(() => {
      vi.unstubAllEnvs();
      vi.resetModules();
    });

    it('reports the classifier model and endpoint the runs actually use', async () => {
      vi.stubEnv('LLM_MODEL', 'env-model');
      vi.stubEnv('LLM_API_BASE', 'https://llm.invalid/v1');
      vi.resetModules();
      const reports = await import('./reports.js');

      const dump = reports.describeConfig(defaultProfile(), 'profiles/test.json');

      expect(dump.classifier.model).toBe('env-model');
      expect(dump.classifier.apiBase).toBe('https://llm.invalid/v1');
    });
  });
});
