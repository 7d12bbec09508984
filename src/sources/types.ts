import type { SourceDocument } from '../types/index.js';

export interface SourceFetchOptions {
  signal?: AbortSignal;
}

/**
 * Upstream feed of documents. Implementations throw SourceUnavailableError
 * when the feed cannot be reached or parsed.
 */
export interface Source {
  readonly name: string;
  fetch(runDate: string, categories: string[], options?: SourceFetchOptions): Promise<SourceDocument[]>;
}
