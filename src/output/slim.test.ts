import { describe, expect, it } from 'vitest';
import { defaultProfile } from '../config/index.js';
import { describeConfig } from '../reports.js';
import { pendingMarker } from '../state/stage-store.js';
import { makeClassified } from '../testing/fixtures.js';
import type { RunSummary } from '../types/index.js';
import { MAX_LISTED_DOCUMENTS, slimResult } from './slim.js';

describe('slimResult', () => {
  it('caps a document list at ten title and label pairs', () => {
    const documents = Array.from({ length: 47 }, (_, index) =>
      makeClassified(index, { primaryLabel: index % 2 === 0 ? 'text_models' : 'video_models' })
    );

    const slim = slimResult('document-list', { date: '2024-06-03', count: 47, documents });

    expect(MAX_LISTED_DOCUMENTS).toBe(10);
    expect(slim.count).toBe(47);
    expect(slim.showing).toBe(10);
    expect(slim.documents).toHaveLength(10);
    expect(slim.documents[0]).toEqual({ title: 'Paper 0', primaryLabel: 'text_models' });
    expect(slim.documents[9]).toEqual({ title: 'Paper 9', primaryLabel: 'video_models' });
    expect(Object.keys(slim.documents[0] ?? {})).toEqual(['title', 'primaryLabel']);
  });

  it('strips interest tag descriptions, keywords and channel secrets from the config', () => {
    const profile = defaultProfile();
    profile.subscriptions.interestTags = [
      { label: 'agents', description: 'A very long description of tool-using agents', keywords: ['tools', 'planning'] },
    ];
    profile.channels = [
      {
        type: 'feishu',
        webhookUrl: 'https://feishu.invalid/hook/test-token',
        delaySeconds: 2,
        separatorText: '',
        excludeTags: ['legal_ai'],
        maxAttempts: 3,
      },
    ];

    const slim = slimResult('config', describeConfig(profile, 'profiles/test.json'));

    expect(slim).toEqual({
      categories: ['cs.CL', 'cs.AI', 'cs.LG', 'cs.CV'],
      interestTags: [{ label: 'agents' }],
      channels: [{ type: 'feishu', configured: true }],
      classifier: { model: 'gpt-4o-mini', apiBase: 'https://api.openai.com/v1' },
      language: 'en',
    });
  });

  it('keeps the first errors of a run summary, truncated', () => {
    const longError = `classify: ${'x'.repeat(300)}`;
    const summary: RunSummary = {
      status: 'failed',
      date: '2024-06-03',
      stages: {
        fetch: { outcome: 'done', attempted: 3, succeeded: 3, failed: 0 },
        classify: { outcome: 'failed', attempted: 3, succeeded: 0, failed: 3 },
        notify: { outcome: 'not_run', attempted: 0, succeeded: 0, failed: 0 },
      },
      documentCount: 3,
      summary: 'Run 2024-06-03 failed',
      errors: [longError, 'b', 'c', 'd', 'e'],
      durationMs: 1234,
    };

    const slim = slimResult('run-summary', summary);

    expect(slim.errorCount).toBe(5);
    expect(slim.errors).toHaveLength(3);
    expect(slim.errors[0]).toHaveLength(200);
    expect(slim.errors[0]?.endsWith('x…')).toBe(true);
    expect(slim).not.toHaveProperty('durationMs');
    expect(slim).not.toHaveProperty('skipReason');
  });

  it('keeps the skip reason of a skipped run', () => {
    const slim = slimResult('run-summary', {
      status: 'skipped',
      date: '2024-06-03',
      skipReason: 'already_done',
      stages: {
        fetch: { outcome: 'skipped', attempted: 0, succeeded: 4, failed: 0 },
        classify: { outcome: 'skipped', attempted: 0, succeeded: 4, failed: 0 },
        notify: { outcome: 'skipped', attempted: 0, succeeded: 1, failed: 0 },
      },
      documentCount: 4,
      summary: 'All stages already done for 2024-06-03',
      errors: [],
      durationMs: 3,
    });

    expect(slim.skipReason).toBe('already_done');
    expect(slim.errors).toEqual([]);
  });

  it('reduces stage history to status and item count', () => {
    const done = { ...pendingMarker('2024-06-03', 'fetch'), status: 'done' as const, itemCount: 12, meta: { batchId: 'b' } };

    const slim = slimResult('status-history', {
      days: [
        {
          date: '2024-06-03',
          stages: {
            fetch: done,
            classify: pendingMarker('2024-06-03', 'classify'),
            notify: pendingMarker('2024-06-03', 'notify'),
          },
        },
      ],
    });

    expect(slim).toEqual({
      days: [
        {
          date: '2024-06-03',
          stages: {
            fetch: { status: 'done', itemCount: 12 },
            classify: { status: 'pending', itemCount: 0 },
            notify: { status: 'pending', itemCount: 0 },
          },
        },
      ],
    });
  });
});
