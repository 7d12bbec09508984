/**
 * SQLite Database Schema
 */

export const SCHEMA = `
-- ═══════════════════════════════════════════════════════════════════════════════
-- Stage Markers Table
-- One row per (run date, stage); status only moves forward to 'done'
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS stage_markers (
  run_date TEXT NOT NULL,
  stage TEXT NOT NULL CHECK (stage IN ('fetch', 'classify', 'notify')),
  status TEXT NOT NULL CHECK (status IN ('pending', 'in_progress', 'done', 'failed')),
  item_count INTEGER NOT NULL DEFAULT 0,
  error TEXT,
  meta TEXT NOT NULL DEFAULT '{}',
  updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
  PRIMARY KEY (run_date, stage)
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Runs Table
-- Latest pipeline outcome per run date
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS runs (
  run_date TEXT PRIMARY KEY,                      -- YYYY-MM-DD format
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
  last_status TEXT NOT NULL,
  last_summary TEXT NOT NULL DEFAULT '',
  updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Documents Table
-- Archived source documents, one row per source id
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS documents (
  id TEXT PRIMARY KEY,
  run_date TEXT NOT NULL,
  category TEXT NOT NULL,
  primary_category TEXT NOT NULL,
  batch_id TEXT NOT NULL,
  position INTEGER NOT NULL,
  title TEXT NOT NULL,
  content TEXT NOT NULL DEFAULT '',
  authors TEXT NOT NULL DEFAULT '[]',
  url TEXT NOT NULL,
  published_at TEXT NOT NULL,
  fetched_at TEXT NOT NULL
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Classifications Table
-- At most one result per document
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS classifications (
  document_id TEXT PRIMARY KEY,
  run_date TEXT NOT NULL,
  primary_label TEXT NOT NULL,
  secondary_label TEXT NOT NULL DEFAULT '',
  sub_label TEXT NOT NULL DEFAULT '',
  summary TEXT NOT NULL DEFAULT '',
  interest_tags TEXT NOT NULL DEFAULT '[]',
  model TEXT,
  classified_at TEXT NOT NULL,
  FOREIGN KEY (document_id) REFERENCES documents(id) ON DELETE CASCADE
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Classification Failures Table
-- Latest failure reason for documents still lacking a result
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS classification_failures (
  document_id TEXT PRIMARY KEY,
  run_date TEXT NOT NULL,
  reason TEXT NOT NULL,
  failed_at TEXT NOT NULL,
  FOREIGN KEY (document_id) REFERENCES documents(id) ON DELETE CASCADE
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Indexes for Performance
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE INDEX IF NOT EXISTS idx_documents_run_date ON documents(run_date, category, batch_id);
CREATE INDEX IF NOT EXISTS idx_classifications_labels ON classifications(primary_label, secondary_label, sub_label, document_id);
CREATE INDEX IF NOT EXISTS idx_classifications_run_date ON classifications(run_date);
CREATE INDEX IF NOT EXISTS idx_failures_run_date ON classification_failures(run_date);
`;
