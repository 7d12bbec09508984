/**
 * Core types for the paper digest pipeline
 */

export const STAGES = ['fetch', 'classify', 'notify'] as const;

export type StageName = (typeof STAGES)[number];
export type StageStatus = 'pending' | 'in_progress' | 'done' | 'failed';

/**
 * A document as produced by a source adapter, before it is archived for a run
 */
export interface SourceDocument {
  id: string;
  category: string;
  primaryCategory: string;
  title: string;
  content: string;
  authors: string[];
  url: string;
  publishedAt: Date;
  fetchedAt: Date;
}

export interface Document extends SourceDocument {
  runDate: string;
  batchId: string;
  position: number;
}

export interface ClassificationResult {
  primaryLabel: string;
  secondaryLabel: string;
  subLabel: string;
  summary: string;
  interestTags: string[];
}

export interface ClassifiedDocument extends Document {
  classification: ClassificationResult;
  classifiedAt: Date;
}

export interface StageMarker {
  runDate: string;
  stage: StageName;
  status: StageStatus;
  itemCount: number;
  updatedAt: Date | null;
  error?: string;
  meta: Record<string, unknown>;
}

export interface StageMeta {
  itemCount: number;
  [key: string]: unknown;
}

export type RunStatus = 'completed' | 'failed' | 'skipped';
export type SkipReason = 'already_done' | 'no_updates_expected';
export type StageOutcome = 'done' | 'skipped' | 'failed' | 'not_run';

export interface StageReport {
  outcome: StageOutcome;
  attempted: number;
  succeeded: number;
  failed: number;
}

export interface RunSummary {
  status: RunStatus;
  date: string;
  skipReason?: SkipReason;
  stages: Record<StageName, StageReport>;
  documentCount: number;
  summary: string;
  errors: string[];
  durationMs: number;
}

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
}
