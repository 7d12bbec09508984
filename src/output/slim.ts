/**
 * Output slimming
 *
 * Compact views of query and run results for display or for handing to a
 * downstream consumer. Each result kind has one pure rule; unknown fields
 * never pass through.
 */

import type { ConfigDump, DocumentListing, StatusReport } from '../reports.js';
import type { RunSummary, StageMarker, StageName, StageStatus } from '../types/index.js';

export const MAX_LISTED_DOCUMENTS = 10;
export const MAX_LISTED_ERRORS = 3;
export const MAX_ERROR_LENGTH = 200;

export interface SlimDocumentList {
  count: number;
  showing: number;
  documents: Array<{ title: string; primaryLabel: string }>;
}

export interface SlimConfig {
  categories: string[];
  interestTags: Array<{ label: string }>;
  channels: Array<{ type: string; configured: boolean }>;
  classifier: { model: string; apiBase: string };
  language: string;
}

export interface SlimRunSummary {
  status: RunSummary['status'];
  date: string;
  skipReason?: RunSummary['skipReason'];
  stages: RunSummary['stages'];
  documentCount: number;
  summary: string;
  errors: string[];
  errorCount: number;
}

export interface SlimStatusHistory {
  days: Array<{
    date: string;
    stages: Record<StageName, { status: StageStatus; itemCount: number }>;
  }>;
}

interface SlimKinds {
  'document-list': { input: DocumentListing; output: SlimDocumentList };
  config: { input: ConfigDump; output: SlimConfig };
  'run-summary': { input: RunSummary; output: SlimRunSummary };
  'status-history': { input: StatusReport; output: SlimStatusHistory };
}

export type ResultKind = keyof SlimKinds;

const RULES: { [K in ResultKind]: (input: SlimKinds[K]['input']) => SlimKinds[K]['output'] } = {
  'document-list': (listing) => {
    const documents = listing.documents.slice(0, MAX_LISTED_DOCUMENTS).map((doc) => ({
      title: doc.title,
      primaryLabel: doc.classification.primaryLabel,
    }));
    return { count: listing.count, showing: documents.length, documents };
  },

  config: (dump) => ({
    categories: dump.subscriptions.categories,
    interestTags: dump.subscriptions.interestTags.map((tag) => ({ label: tag.label })),
    channels: dump.channels.map((channel) => ({ type: channel.type, configured: channel.configured })),
    classifier: { model: dump.classifier.model, apiBase: dump.classifier.apiBase },
    language: dump.language,
  }),

  'run-summary': (summary) => {
    const slim: SlimRunSummary = {
      status: summary.status,
      date: summary.date,
      stages: summary.stages,
      documentCount: summary.documentCount,
      summary: summary.summary,
      errors: summary.errors
        .slice(0, MAX_LISTED_ERRORS)
        .map((error) => (error.length > MAX_ERROR_LENGTH ? `${error.slice(0, MAX_ERROR_LENGTH - 1)}…` : error)),
      errorCount: summary.errors.length,
    };
    if (summary.skipReason) {
      slim.skipReason = summary.skipReason;
    }
    return slim;
  },

  'status-history': (report) => ({
    days: report.days.map((day) => ({
      date: day.date,
      stages: {
        fetch: slimMarker(day.stages.fetch),
        classify: slimMarker(day.stages.classify),
        notify: slimMarker(day.stages.notify),
      },
    })),
  }),
};

function slimMarker(marker: StageMarker): { status: StageStatus; itemCount: number } {
  return { status: marker.status, itemCount: marker.itemCount };
}

export function slimResult<K extends ResultKind>(kind: K, input: SlimKinds[K]['input']): SlimKinds[K]['output'] {
  const rule: (value: SlimKinds[K]['input']) => SlimKinds[K]['output'] = RULES[kind];
  return rule(input);
}
