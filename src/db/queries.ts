/**
 * Database Queries and Operations
 */

import { getDatabase } from './index.js';
import type { ClassificationResult, ClassifiedDocument, Document } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// Document Operations
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Archive documents for a run (upsert by id), in a single transaction
 */
export function saveDocuments(documents: Document[]): number {
  const db = getDatabase();
  const stmt = db.prepare(`
    INSERT INTO documents (
      id, run_date, category, primary_category, batch_id, position,
      title, content, authors, url, published_at, fetched_at
    )
    VALUES (
      @id, @runDate, @category, @primaryCategory, @batchId, @position,
      @title, @content, @authors, @url, @publishedAt, @fetchedAt
    )
    ON CONFLICT(id) DO UPDATE SET
      run_date = excluded.run_date,
      category = excluded.category,
      primary_category = excluded.primary_category,
      batch_id = excluded.batch_id,
      position = excluded.position,
      title = excluded.title,
      content = excluded.content,
      authors = excluded.authors,
      url = excluded.url,
      published_at = excluded.published_at,
      fetched_at = excluded.fetched_at
  `);

  const insertAll = db.transaction((rows: Document[]) => {
    for (const doc of rows) {
      stmt.run({
        id: doc.id,
        runDate: doc.runDate,
        category: doc.category,
        primaryCategory: doc.primaryCategory,
        batchId: doc.batchId,
        position: doc.position,
        title: doc.title,
        content: doc.content,
        authors: JSON.stringify(doc.authors),
        url: doc.url,
        publishedAt: doc.publishedAt.toISOString(),
        fetchedAt: doc.fetchedAt.toISOString(),
      });
    }
    return rows.length;
  });

  return insertAll(documents);
}

/**
 * Get archived documents of a run date in fetch order
 */
export function getDocumentsForDate(runDate: string): Document[] {
  const db = getDatabase();
  const stmt = db.prepare<[string], DocumentRow>(`
    SELECT * FROM documents
    WHERE run_date = ?
    ORDER BY position ASC, id ASC
  `);
  return stmt.all(runDate).map(mapDocumentRow);
}

/**
 * Get documents of a run date that have no classification yet
 */
export function getUnclassifiedDocuments(runDate: string): Document[] {
  const db = getDatabase();
  const stmt = db.prepare<[string], DocumentRow>(`
    SELECT d.* FROM documents d
    LEFT JOIN classifications c ON c.document_id = d.id
    WHERE d.run_date = ? AND c.document_id IS NULL
    ORDER BY d.position ASC, d.id ASC
  `);
  return stmt.all(runDate).map(mapDocumentRow);
}

export function countDocuments(runDate: string): number {
  const db = getDatabase();
  const row = db
    .prepare<[string], CountRow>('SELECT COUNT(*) as count FROM documents WHERE run_date = ?')
    .get(runDate);
  return row?.count ?? 0;
}

/**
 * Most recent run date that has archived documents
 */
export function getLatestDocumentDate(): string | null {
  const db = getDatabase();
  const row = db
    .prepare<[], { run_date: string | null }>('SELECT MAX(run_date) as run_date FROM documents')
    .get();
  return row?.run_date ?? null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Classification Operations
// ═══════════════════════════════════════════════════════════════════════════════

export interface ClassificationRecord {
  documentId: string;
  runDate: string;
  result: ClassificationResult;
  model: string | null;
  classifiedAt: Date;
}

export interface ClassificationFailureRecord {
  documentId: string;
  runDate: string;
  reason: string;
  failedAt: Date;
}

/**
 * Persist classification results; a stored result clears any earlier failure
 */
export function saveClassifications(records: ClassificationRecord[]): number {
  const db = getDatabase();
  const upsert = db.prepare(`
    INSERT INTO classifications (
      document_id, run_date, primary_label, secondary_label, sub_label,
      summary, interest_tags, model, classified_at
    )
    VALUES (
      @documentId, @runDate, @primaryLabel, @secondaryLabel, @subLabel,
      @summary, @interestTags, @model, @classifiedAt
    )
    ON CONFLICT(document_id) DO UPDATE SET
      run_date = excluded.run_date,
      primary_label = excluded.primary_label,
      secondary_label = excluded.secondary_label,
      sub_label = excluded.sub_label,
      summary = excluded.summary,
      interest_tags = excluded.interest_tags,
      model = excluded.model,
      classified_at = excluded.classified_at
  `);
  const clearFailure = db.prepare('DELETE FROM classification_failures WHERE document_id = ?');

  const saveAll = db.transaction((rows: ClassificationRecord[]) => {
    for (const record of rows) {
      upsert.run({
        documentId: record.documentId,
        runDate: record.runDate,
        primaryLabel: record.result.primaryLabel,
        secondaryLabel: record.result.secondaryLabel,
        subLabel: record.result.subLabel,
        summary: record.result.summary,
        interestTags: JSON.stringify(record.result.interestTags),
        model: record.model,
        classifiedAt: record.classifiedAt.toISOString(),
      });
      clearFailure.run(record.documentId);
    }
    return rows.length;
  });

  return saveAll(records);
}

export function recordClassificationFailures(failures: ClassificationFailureRecord[]): number {
  const db = getDatabase();
  const stmt = db.prepare(`
    INSERT INTO classification_failures (document_id, run_date, reason, failed_at)
    VALUES (@documentId, @runDate, @reason, @failedAt)
    ON CONFLICT(document_id) DO UPDATE SET
      run_date = excluded.run_date,
      reason = excluded.reason,
      failed_at = excluded.failed_at
  `);

  const recordAll = db.transaction((rows: ClassificationFailureRecord[]) => {
    for (const failure of rows) {
      stmt.run({
        documentId: failure.documentId,
        runDate: failure.runDate,
        reason: failure.reason,
        failedAt: failure.failedAt.toISOString(),
      });
    }
    return rows.length;
  });

  return recordAll(failures);
}

export function getClassificationFailures(runDate: string): ClassificationFailureRecord[] {
  const db = getDatabase();
  const stmt = db.prepare<[string], FailureRow>(`
    SELECT * FROM classification_failures
    WHERE run_date = ?
    ORDER BY document_id ASC
  `);
  return stmt.all(runDate).map((row) => ({
    documentId: row.document_id,
    runDate: row.run_date,
    reason: row.reason,
    failedAt: new Date(row.failed_at),
  }));
}

/**
 * Get classified documents of a run date in fetch order
 */
export function getClassifiedDocuments(runDate: string): ClassifiedDocument[] {
  const db = getDatabase();
  const stmt = db.prepare<[string], ClassifiedDocumentRow>(`
    SELECT d.*, c.primary_label, c.secondary_label, c.sub_label, c.summary,
           c.interest_tags, c.classified_at
    FROM documents d
    INNER JOIN classifications c ON c.document_id = d.id
    WHERE d.run_date = ?
    ORDER BY d.position ASC, d.id ASC
  `);
  return stmt.all(runDate).map(mapClassifiedDocumentRow);
}

export function countClassified(runDate: string): number {
  const db = getDatabase();
  const row = db
    .prepare<[string], CountRow>(`
      SELECT COUNT(*) as count FROM documents d
      INNER JOIN classifications c ON c.document_id = d.id
      WHERE d.run_date = ?
    `)
    .get(runDate);
  return row?.count ?? 0;
}

export interface DocumentSearch {
  keyword?: string;
  date?: string;
}

export interface DocumentSearchResult {
  date: string | null;
  documents: ClassifiedDocument[];
}

/**
 * Search classified documents of a date (default: the latest date with documents).
 * The keyword matches title, abstract, summary and labels, case-insensitively.
 */
export function searchClassifiedDocuments(search: DocumentSearch = {}): DocumentSearchResult {
  const date = search.date ?? getLatestDocumentDate();
  if (date === null) {
    return { date: null, documents: [] };
  }

  const documents = getClassifiedDocuments(date);
  const keyword = search.keyword?.trim().toLowerCase();
  if (!keyword) {
    return { date, documents };
  }

  const matches = documents.filter((doc) =>
    [
      doc.title,
      doc.content,
      doc.classification.summary,
      doc.classification.primaryLabel,
      doc.classification.secondaryLabel,
      doc.classification.subLabel,
    ].some((field) => field.toLowerCase().includes(keyword))
  );
  return { date, documents: matches };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Statistics
// ═══════════════════════════════════════════════════════════════════════════════

export interface DbStats {
  totalDocuments: number;
  totalClassified: number;
  pendingFailures: number;
  runDates: number;
  lastRunDate: string | null;
}

export function getStats(): DbStats {
  const db = getDatabase();
  const count = (sql: string): number => db.prepare<[], CountRow>(sql).get()?.count ?? 0;

  return {
    totalDocuments: count('SELECT COUNT(*) as count FROM documents'),
    totalClassified: count('SELECT COUNT(*) as count FROM classifications'),
    pendingFailures: count('SELECT COUNT(*) as count FROM classification_failures'),
    runDates: count('SELECT COUNT(*) as count FROM runs'),
    lastRunDate:
      db.prepare<[], { last: string | null }>('SELECT MAX(run_date) as last FROM runs').get()
        ?.last ?? null,
  };
}

// Row types for database results
interface CountRow {
  count: number;
}

interface DocumentRow {
  id: string;
  run_date: string;
  category: string;
  primary_category: string;
  batch_id: string;
  position: number;
  title: string;
  content: string;
  authors: string;
  url: string;
  published_at: string;
  fetched_at: string;
}

interface ClassifiedDocumentRow extends DocumentRow {
  primary_label: string;
  secondary_label: string;
  sub_label: string;
  summary: string;
  interest_tags: string;
  classified_at: string;
}

interface FailureRow {
  document_id: string;
  run_date: string;
  reason: string;
  failed_at: string;
}

// Mappers
function mapDocumentRow(row: DocumentRow): Document {
  return {
    id: row.id,
    runDate: row.run_date,
    category: row.category,
    primaryCategory: row.primary_category,
    batchId: row.batch_id,
    position: row.position,
    title: row.title,
    content: row.content,
    authors: parseStringArray(row.authors),
    url: row.url,
    publishedAt: new Date(row.published_at),
    fetchedAt: new Date(row.fetched_at),
  };
}

function mapClassifiedDocumentRow(row: ClassifiedDocumentRow): ClassifiedDocument {
  return {
    ...mapDocumentRow(row),
    classification: {
      primaryLabel: row.primary_label,
      secondaryLabel: row.secondary_label,
      subLabel: row.sub_label,
      summary: row.summary,
      interestTags: parseStringArray(row.interest_tags),
    },
    classifiedAt: new Date(row.classified_at),
  };
}

function parseStringArray(text: string): string[] {
  const value: unknown = JSON.parse(text);
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === 'string');
}
