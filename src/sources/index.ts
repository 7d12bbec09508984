/**
 * Source module exports
 */

export { ArxivSource, type ArxivSourceOptions } from './arxiv.js';
export type { Source, SourceFetchOptions } from './types.js';
