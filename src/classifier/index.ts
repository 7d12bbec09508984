/**
 * Classifier module exports
 */

export {
  classifyBatch,
  ClassificationBatchError,
  DEFAULT_CONCURRENCY,
  type BatchOutcome,
  type ClassifyBatchOptions,
  type ItemOutcome,
} from './driver.js';
export { LlmClassifier, parseClassification, stripCodeFences, type LlmClassifierOptions } from './llm-classifier.js';
export { buildSystemPrompt, buildUserPrompt, formatInterestTags, type Language } from './prompts.js';
export type { Classifier, ClassifyOptions } from './types.js';
