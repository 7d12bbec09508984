/**
 * Concurrency-bounded classification driver
 *
 * Runs one classifier call per document with at most `concurrency` calls in
 * flight. Results come back in input order. Individual failures are recorded
 * on their item; the batch only throws when nothing succeeded.
 */

import type { ClassificationResult, Document } from '../types/index.js';
import { AbortedError, ClassificationError, PipelineError, toErrorMessage } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import type { Classifier } from './types.js';

const log = createChildLogger({ module: 'classification-driver' });

export const DEFAULT_CONCURRENCY = 5;

export type ItemOutcome =
  | { documentId: string; ok: true; result: ClassificationResult }
  | { documentId: string; ok: false; error: string };

export interface BatchOutcome {
  items: ItemOutcome[];
  succeeded: number;
  failed: number;
  /** True when the signal fired before every item finished */
  aborted: boolean;
}

export interface ClassifyBatchOptions {
  concurrency?: number;
  /**
   * Per-call deadline. An overdue call is recorded as failed at once, but its
   * worker takes no new document until the call itself settles.
   */
  timeoutMs?: number;
  signal?: AbortSignal;
  onProgress?: (completed: number, total: number, item: ItemOutcome) => void;
  /** Treat an empty input as a failure */
  expectNonEmpty?: boolean;
}

export class ClassificationBatchError extends PipelineError {
  readonly outcome: BatchOutcome;

  constructor(message: string, outcome: BatchOutcome) {
    super(message, 'CLASSIFICATION_BATCH_FAILED');
    this.outcome = outcome;
  }
}

export async function classifyBatch(
  documents: Document[],
  classifier: Classifier,
  options: ClassifyBatchOptions = {}
): Promise<BatchOutcome> {
  const { timeoutMs, signal, onProgress, expectNonEmpty = false } = options;
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
  const total = documents.length;

  if (total === 0) {
    const empty: BatchOutcome = { items: [], succeeded: 0, failed: 0, aborted: false };
    if (expectNonEmpty) {
      throw new ClassificationBatchError('No documents to classify', empty);
    }
    return empty;
  }

  const slots: Array<ItemOutcome | undefined> = new Array<ItemOutcome | undefined>(total).fill(undefined);
  let nextIndex = 0;
  let completed = 0;

  const worker = async (): Promise<void> => {
    while (!signal?.aborted) {
      const current = nextIndex;
      nextIndex += 1;
      const doc = documents[current];
      if (doc === undefined) {
        break;
      }

      const call = classifyWithDeadline(doc, classifier, timeoutMs, signal);
      let item: ItemOutcome;
      try {
        item = { documentId: doc.id, ok: true, result: await call.result };
      } catch (error) {
        item = { documentId: doc.id, ok: false, error: toErrorMessage(error) };
        log.debug({ documentId: doc.id, error: item.error }, 'Document classification failed');
      }

      slots[current] = item;
      completed += 1;
      onProgress?.(completed, total, item);

      await untilSettledOrAborted(call.settled, signal);
    }
  };

  log.debug({ total, concurrency }, 'Starting classification batch');
  await Promise.all(Array.from({ length: Math.min(concurrency, total) }, () => worker()));

  const items = slots.map(
    (slot, index): ItemOutcome =>
      slot ?? { documentId: documents[index]?.id ?? '', ok: false, error: 'aborted before dispatch' }
  );
  const succeeded = items.filter((item) => item.ok).length;
  const outcome: BatchOutcome = {
    items,
    succeeded,
    failed: total - succeeded,
    aborted: signal?.aborted ?? false,
  };

  log.info(
    { total, succeeded: outcome.succeeded, failed: outcome.failed, aborted: outcome.aborted },
    'Classification batch finished'
  );

  if (succeeded === 0 && outcome.aborted) {
    throw new AbortedError(`Classification aborted before any of ${total} documents finished`);
  }

  if (succeeded === 0) {
    const firstError = items.find((item) => !item.ok);
    const reason = firstError && !firstError.ok ? firstError.error : 'unknown error';
    throw new ClassificationBatchError(
      `All ${total} classifications failed (first error: ${reason})`,
      outcome
    );
  }

  return outcome;
}

interface DeadlineCall {
  /** Settles with the classifier's result, or rejects once the deadline or the batch signal fires */
  result: Promise<ClassificationResult>;
  /** Resolves when the underlying classifier call has finished either way */
  settled: Promise<void>;
}

/**
 * One classifier call bounded by the per-call timeout and the batch signal.
 * The call is told to stop through its own signal; an adapter that ignores
 * it keeps running until `settled` resolves.
 */
function classifyWithDeadline(
  doc: Document,
  classifier: Classifier,
  timeoutMs: number | undefined,
  parent: AbortSignal | undefined
): DeadlineCall {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const abandoned = new Promise<never>((_, reject) => {
    const abandon = (error: Error): void => {
      controller.abort(error);
      reject(error);
    };

    if (timeoutMs !== undefined) {
      timer = setTimeout(
        () => abandon(new ClassificationError(`Classification timed out after ${timeoutMs}ms`)),
        timeoutMs
      );
    }
    if (parent) {
      onParentAbort = () => abandon(new AbortedError('Classification aborted'));
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  const call = classifier.classify(doc, { signal: controller.signal });
  const settled = call.then(
    () => undefined,
    () => undefined
  );

  const result = Promise.race([call, abandoned]).finally(() => {
    clearTimeout(timer);
    if (parent && onParentAbort) {
      parent.removeEventListener('abort', onParentAbort);
    }
  });

  return { result, settled };
}

/** Holds a worker until its call has settled; an aborted batch stops waiting */
function untilSettledOrAborted(settled: Promise<void>, signal: AbortSignal | undefined): Promise<void> {
  if (!signal) {
    return settled;
  }
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise<void>((resolve) => {
    const onAbort = (): void => resolve();
    signal.addEventListener('abort', onAbort, { once: true });
    void settled.then(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    });
  });
}
