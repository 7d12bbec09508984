/**
 * Exponential backoff retry utility
 */

import type { RetryConfig } from '../types/index.js';
import { AbortedError } from './errors.js';
import { logger } from './logger.js';

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  factor: 2,
};

export interface RetryOptions extends Partial<RetryConfig> {
  /** Label included in retry log lines */
  operation?: string;
  /** Return false to rethrow immediately without further attempts */
  shouldRetry?: (error: Error, attempt: number) => boolean;
  signal?: AbortSignal;
  sleepFn?: (ms: number) => Promise<void>;
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { maxAttempts, initialDelayMs, maxDelayMs, factor } = {
    ...DEFAULT_RETRY_CONFIG,
    ...definedOnly(options),
  };
  const { operation = 'operation', shouldRetry, signal, sleepFn = sleep } = options;

  let lastError: Error | undefined;
  let delay = initialDelayMs;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      throw new AbortedError(`${operation} aborted`);
    }

    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === maxAttempts || (shouldRetry && !shouldRetry(lastError, attempt))) {
        logger.debug({ operation, error: lastError.message, attempt, maxAttempts }, 'Giving up on retries');
        throw lastError;
      }

      logger.warn(
        { operation, error: lastError.message, attempt, maxAttempts, nextDelayMs: delay },
        'Retry attempt failed, waiting before next attempt'
      );

      await sleepFn(delay);
      delay = Math.min(delay * factor, maxDelayMs);
    }
  }

  throw lastError ?? new Error(`${operation} failed without attempts`);
}

function definedOnly(options: RetryOptions): Partial<RetryConfig> {
  const result: Partial<RetryConfig> = {};
  if (options.maxAttempts !== undefined) result.maxAttempts = options.maxAttempts;
  if (options.initialDelayMs !== undefined) result.initialDelayMs = options.initialDelayMs;
  if (options.maxDelayMs !== undefined) result.maxDelayMs = options.maxDelayMs;
  if (options.factor !== undefined) result.factor = options.factor;
  return result;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export { sleep };
