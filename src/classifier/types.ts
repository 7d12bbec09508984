import type { ClassificationResult, Document } from '../types/index.js';

export interface ClassifyOptions {
  signal?: AbortSignal;
}

/**
 * Labels one document. Implementations throw ClassificationError on failure.
 */
export interface Classifier {
  /** Recorded beside stored results; null when not model-backed */
  readonly model: string | null;
  classify(document: Document, options?: ClassifyOptions): Promise<ClassificationResult>;
}
