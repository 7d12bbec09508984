/**
 * Pipeline error taxonomy
 */

export type PipelineErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'CLASSIFICATION_FAILED'
  | 'CLASSIFICATION_BATCH_FAILED'
  | 'NOTIFIER_FAILED'
  | 'STORAGE_FAILED'
  | 'CONFIG_INVALID'
  | 'ABORTED';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(message: string, code: PipelineErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Network or parse failure while fetching from the upstream feed.
 * Retryable on the next invocation.
 */
export class SourceUnavailableError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'SOURCE_UNAVAILABLE', options);
  }
}

/**
 * A single document could not be classified. Recorded, never raised past the driver.
 */
export class ClassificationError extends PipelineError {
  readonly reason: string;

  constructor(reason: string, options?: { cause?: unknown }) {
    super(reason, 'CLASSIFICATION_FAILED', options);
    this.reason = reason;
  }
}

export class NotifierError extends PipelineError {
  readonly channel: string;

  constructor(channel: string, message: string, options?: { cause?: unknown }) {
    super(message, 'NOTIFIER_FAILED', options);
    this.channel = channel;
  }
}

export class StorageError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'STORAGE_FAILED', options);
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIG_INVALID', options);
  }
}

export class AbortedError extends PipelineError {
  constructor(message = 'Operation aborted') {
    super(message, 'ABORTED');
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
