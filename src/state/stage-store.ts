/**
 * Stage State Store
 *
 * Durable record of which stages have completed for which run date. Every
 * write is a single-row upsert keyed by (run_date, stage) and is committed
 * before the returned promise resolves. A 'done' marker never regresses.
 */

import type { SqliteDatabase } from '../db/index.js';
import { STAGES, type RunStatus, type StageMarker, type StageMeta, type StageName, type StageStatus } from '../types/index.js';
import { StorageError, toErrorMessage } from '../utils/errors.js';

export interface StageStateStore {
  getStatus(runDate: string, stage: StageName): Promise<StageMarker>;
  markStarted(runDate: string, stage: StageName): Promise<void>;
  markDone(runDate: string, stage: StageName, meta: StageMeta): Promise<void>;
  markFailed(runDate: string, stage: StageName, reason: string): Promise<void>;
  /** Markers for each of `runDates` that has any; dates with no marker rows are left out */
  listHistory(runDates: string[]): Promise<Map<string, Record<StageName, StageMarker>>>;
  recordRun(runDate: string, status: RunStatus, summary: string): Promise<void>;
}

interface MarkerRow {
  run_date: string;
  stage: string;
  status: string;
  item_count: number;
  error: string | null;
  meta: string;
  updated_at: string;
}

const STATUSES: readonly StageStatus[] = ['pending', 'in_progress', 'done', 'failed'];

export function pendingMarker(runDate: string, stage: StageName): StageMarker {
  return { runDate, stage, status: 'pending', itemCount: 0, updatedAt: null, meta: {} };
}

export class SqliteStageStore implements StageStateStore {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly now: () => Date = () => new Date()
  ) {}

  async getStatus(runDate: string, stage: StageName): Promise<StageMarker> {
    return this.read(() => {
      const row = this.db
        .prepare<[string, string], MarkerRow>(
          'SELECT * FROM stage_markers WHERE run_date = ? AND stage = ?'
        )
        .get(runDate, stage);
      return row ? mapMarkerRow(row, stage) : pendingMarker(runDate, stage);
    }, `read ${stage} marker for ${runDate}`);
  }

  async markStarted(runDate: string, stage: StageName): Promise<void> {
    this.write(
      () =>
        this.db
          .prepare(`
            INSERT INTO stage_markers (run_date, stage, status, item_count, error, meta, updated_at)
            VALUES (?, ?, 'in_progress', 0, NULL, '{}', ?)
            ON CONFLICT(run_date, stage) DO UPDATE SET
              status = 'in_progress',
              error = NULL,
              updated_at = excluded.updated_at
            WHERE stage_markers.status <> 'done'
          `)
          .run(runDate, stage, this.timestamp()),
      `mark ${stage} started for ${runDate}`
    );
  }

  async markDone(runDate: string, stage: StageName, meta: StageMeta): Promise<void> {
    this.write(
      () =>
        this.db
          .prepare(`
            INSERT INTO stage_markers (run_date, stage, status, item_count, error, meta, updated_at)
            VALUES (?, ?, 'done', ?, NULL, ?, ?)
            ON CONFLICT(run_date, stage) DO UPDATE SET
              status = 'done',
              item_count = excluded.item_count,
              error = NULL,
              meta = excluded.meta,
              updated_at = excluded.updated_at
          `)
          .run(runDate, stage, meta.itemCount, JSON.stringify(meta), this.timestamp()),
      `mark ${stage} done for ${runDate}`
    );
  }

  async markFailed(runDate: string, stage: StageName, reason: string): Promise<void> {
    this.write(
      () =>
        this.db
          .prepare(`
            INSERT INTO stage_markers (run_date, stage, status, item_count, error, meta, updated_at)
            VALUES (?, ?, 'failed', 0, ?, '{}', ?)
            ON CONFLICT(run_date, stage) DO UPDATE SET
              status = 'failed',
              error = excluded.error,
              updated_at = excluded.updated_at
            WHERE stage_markers.status <> 'done'
          `)
          .run(runDate, stage, reason, this.timestamp()),
      `mark ${stage} failed for ${runDate}`
    );
  }

  async listHistory(runDates: string[]): Promise<Map<string, Record<StageName, StageMarker>>> {
    const history = new Map<string, Record<StageName, StageMarker>>();
    for (const runDate of runDates) {
      const markers = this.read(() => {
        const rows = this.db
          .prepare<[string], MarkerRow>('SELECT * FROM stage_markers WHERE run_date = ?')
          .all(runDate);
        if (rows.length === 0) {
          return null;
        }
        const byStage: Record<StageName, StageMarker> = {
          fetch: pendingMarker(runDate, 'fetch'),
          classify: pendingMarker(runDate, 'classify'),
          notify: pendingMarker(runDate, 'notify'),
        };
        for (const row of rows) {
          const stage = STAGES.find((name) => name === row.stage);
          if (stage) {
            byStage[stage] = mapMarkerRow(row, stage);
          }
        }
        return byStage;
      }, `read markers for ${runDate}`);
      if (markers) {
        history.set(runDate, markers);
      }
    }
    return history;
  }

  async recordRun(runDate: string, status: RunStatus, summary: string): Promise<void> {
    const timestamp = this.timestamp();
    this.write(
      () =>
        this.db
          .prepare(`
            INSERT INTO runs (run_date, created_at, last_status, last_summary, updated_at)
            VALUES (?, ?, ?, ?, ?)
            ON CONFLICT(run_date) DO UPDATE SET
              last_status = excluded.last_status,
              last_summary = excluded.last_summary,
              updated_at = excluded.updated_at
          `)
          .run(runDate, timestamp, status, summary, timestamp),
      `record run for ${runDate}`
    );
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private read<T>(fn: () => T, operation: string): T {
    try {
      return fn();
    } catch (error) {
      throw new StorageError(`Failed to ${operation}: ${toErrorMessage(error)}`, { cause: error });
    }
  }

  private write(fn: () => unknown, operation: string): void {
    try {
      fn();
    } catch (error) {
      throw new StorageError(`Failed to ${operation}: ${toErrorMessage(error)}`, { cause: error });
    }
  }
}

function mapMarkerRow(row: MarkerRow, stage: StageName): StageMarker {
  const status = STATUSES.find((value) => value === row.status) ?? 'pending';
  const marker: StageMarker = {
    runDate: row.run_date,
    stage,
    status,
    itemCount: row.item_count,
    updatedAt: new Date(row.updated_at),
    meta: parseMeta(row.meta),
  };
  if (row.error !== null) {
    marker.error = row.error;
  }
  return marker;
}

function parseMeta(text: string): Record<string, unknown> {
  const value: unknown = JSON.parse(text);
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}
