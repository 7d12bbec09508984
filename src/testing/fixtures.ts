/**
 * Builders for documents and classification results used across the test suites
 */

import type { ClassificationResult, ClassifiedDocument, Document, SourceDocument } from '../types/index.js';

export function makeSourceDocument(index: number, overrides: Partial<SourceDocument> = {}): SourceDocument {
  return {
    id: `2406.${String(index).padStart(5, '0')}`,
    category: 'cs.CL',
    primaryCategory: 'cs.CL',
    title: `Paper ${index}`,
    content: `Abstract of paper ${index}.`,
    authors: ['Ada Author', 'Bo Writer'],
    url: `https://arxiv.org/abs/2406.${String(index).padStart(5, '0')}`,
    publishedAt: new Date('2024-06-03T17:00:00Z'),
    fetchedAt: new Date('2024-06-04T09:00:00Z'),
    ...overrides,
  };
}

export function makeDocument(index: number, overrides: Partial<Document> = {}): Document {
  return {
    ...makeSourceDocument(index),
    runDate: '2024-06-03',
    batchId: 'batch-1',
    position: index,
    ...overrides,
  };
}

export function makeResult(overrides: Partial<ClassificationResult> = {}): ClassificationResult {
  return {
    primaryLabel: 'text_models',
    secondaryLabel: 'reasoning',
    subLabel: 'general_purpose',
    summary: 'A short summary.',
    interestTags: [],
    ...overrides,
  };
}

export function makeClassified(
  index: number,
  result: Partial<ClassificationResult> = {},
  overrides: Partial<Document> = {}
): ClassifiedDocument {
  return {
    ...makeDocument(index, overrides),
    classification: makeResult(result),
    classifiedAt: new Date('2024-06-04T09:30:00Z'),
  };
}
