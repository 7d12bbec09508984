import { describe, expect, it } from 'vitest';
import { makeDocument, makeResult } from '../testing/fixtures.js';
import type { ClassificationResult, Document } from '../types/index.js';
import { AbortedError, ClassificationError } from '../utils/errors.js';
import { classifyBatch, ClassificationBatchError, DEFAULT_CONCURRENCY } from './driver.js';
import type { Classifier, ClassifyOptions } from './types.js';

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function documents(count: number): Document[] {
  return Array.from({ length: count }, (_, index) => makeDocument(index));
}

function fakeClassifier(
  handler: (doc: Document, options: ClassifyOptions) => Promise<ClassificationResult>
): Classifier {
  return { model: 'fake-model', classify: (doc, options = {}) => handler(doc, options) };
}

describe('classifyBatch', () => {
  it('never exceeds the concurrency ceiling', async () => {
    let inFlight = 0;
    let peak = 0;
    const classifier = fakeClassifier(async (doc) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await delay(2);
      inFlight -= 1;
      return makeResult({ summary: doc.id });
    });

    const outcome = await classifyBatch(documents(20), classifier, { concurrency: 5 });

    expect(peak).toBe(5);
    expect(outcome.succeeded).toBe(20);
    expect(outcome.failed).toBe(0);
  });

  it('defaults to a ceiling of five', () => {
    expect(DEFAULT_CONCURRENCY).toBe(5);
  });

  it('returns results in input order regardless of completion order', async () => {
    const docs = documents(6);
    const classifier = fakeClassifier(async (doc) => {
      await delay((6 - doc.position) * 3);
      return makeResult({ summary: `summary ${doc.position}` });
    });

    const outcome = await classifyBatch(docs, classifier, { concurrency: 3 });

    expect(outcome.items.map((item) => item.documentId)).toEqual(docs.map((doc) => doc.id));
    expect(outcome.items.map((item) => (item.ok ? item.result.summary : null))).toEqual([
      'summary 0',
      'summary 1',
      'summary 2',
      'summary 3',
      'summary 4',
      'summary 5',
    ]);
  });

  it('records individual failures without failing the batch', async () => {
    const failing = new Set([3, 7, 11]);
    const classifier = fakeClassifier(async (doc) => {
      if (failing.has(doc.position)) {
        throw new ClassificationError(`bad reply for ${doc.position}`);
      }
      return makeResult();
    });

    const outcome = await classifyBatch(documents(20), classifier);

    expect(outcome.succeeded).toBe(17);
    expect(outcome.failed).toBe(3);
    expect(outcome.aborted).toBe(false);
    expect(outcome.items[7]).toEqual({ documentId: '2406.00007', ok: false, error: 'bad reply for 7' });
  });

  it('throws with the outcome attached when every item fails', async () => {
    const classifier = fakeClassifier(async () => {
      throw new Error('model offline');
    });

    const error = await classifyBatch(documents(4), classifier).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ClassificationBatchError);
    if (!(error instanceof ClassificationBatchError)) return;
    expect(error.message).toBe('All 4 classifications failed (first error: model offline)');
    expect(error.code).toBe('CLASSIFICATION_BATCH_FAILED');
    expect(error.outcome.failed).toBe(4);
  });

  it('returns an empty outcome for an empty batch unless one was expected', async () => {
    const classifier = fakeClassifier(async () => makeResult());

    await expect(classifyBatch([], classifier)).resolves.toEqual({
      items: [],
      succeeded: 0,
      failed: 0,
      aborted: false,
    });
    await expect(classifyBatch([], classifier, { expectNonEmpty: true })).rejects.toThrow(
      'No documents to classify'
    );
  });

  it('abandons calls that exceed the per-call timeout', async () => {
    const signals: AbortSignal[] = [];
    const classifier = fakeClassifier(async (doc, options) => {
      if (doc.position === 1) {
        const signal = options.signal;
        if (signal) signals.push(signal);
        return new Promise<never>((_, reject) => {
          signal?.addEventListener('abort', () => reject(new Error('stopped')), { once: true });
        });
      }
      return makeResult();
    });

    const outcome = await classifyBatch(documents(3), classifier, { timeoutMs: 20 });

    expect(outcome.succeeded).toBe(2);
    expect(outcome.items[1]).toEqual({
      documentId: '2406.00001',
      ok: false,
      error: 'Classification timed out after 20ms',
    });
    expect(signals[0]?.aborted).toBe(true);
  });

  it('keeps a timed-out slot busy until a call that ignores its signal settles', async () => {
    let inFlight = 0;
    let peak = 0;
    const classifier = fakeClassifier(async () => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await delay(50);
      inFlight -= 1;
      return makeResult();
    });

    const error = await classifyBatch(documents(20), classifier, { concurrency: 5, timeoutMs: 10 }).catch(
      (caught: unknown) => caught
    );

    expect(peak).toBe(5);
    expect(inFlight).toBe(0);
    expect(error).toBeInstanceOf(ClassificationBatchError);
    if (!(error instanceof ClassificationBatchError)) return;
    expect(error.outcome.failed).toBe(20);
    expect(
      error.outcome.items.every((item) => !item.ok && item.error === 'Classification timed out after 10ms')
    ).toBe(true);
  });

  it('stops dispatching once the signal fires', async () => {
    const controller = new AbortController();
    const classifier = fakeClassifier(async (doc) => {
      await delay(doc.position * 10);
      return makeResult();
    });

    const outcome = await classifyBatch(documents(10), classifier, {
      concurrency: 2,
      signal: controller.signal,
      onProgress: (completed) => {
        if (completed === 1) controller.abort();
      },
    });

    expect(outcome.aborted).toBe(true);
    expect(outcome.succeeded).toBe(1);
    expect(outcome.items[1]).toEqual({ documentId: '2406.00001', ok: false, error: 'Classification aborted' });
    expect(outcome.items.slice(2).every((item) => !item.ok && item.error === 'aborted before dispatch')).toBe(true);
  });

  it('raises AbortedError when the signal fires before anything succeeded', async () => {
    const controller = new AbortController();
    const classifier = fakeClassifier(async () => {
      await delay(50);
      return makeResult();
    });
    setTimeout(() => controller.abort(), 10);

    const error = await classifyBatch(documents(4), classifier, {
      concurrency: 2,
      signal: controller.signal,
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AbortedError);
    expect(error).not.toBeInstanceOf(ClassificationBatchError);
    if (!(error instanceof AbortedError)) return;
    expect(error.message).toBe('Classification aborted before any of 4 documents finished');
  });

  it('reports progress for every finished item', async () => {
    const progress: number[] = [];
    const classifier = fakeClassifier(async () => makeResult());

    await classifyBatch(documents(4), classifier, {
      concurrency: 2,
      onProgress: (completed, total) => progress.push(completed * 10 + total),
    });

    expect(progress).toEqual([14, 24, 34, 44]);
  });
});
