/**
 * Read-only queries over pipeline state: stage history, classified
 * documents and the effective configuration.
 */

import { config, type ChannelConfig, type InterestTag, type Profile } from './config/index.js';
import { resolveClassifierSettings } from './context.js';
import { searchClassifiedDocuments, type DocumentSearch } from './db/queries.js';
import type { StageStateStore } from './state/stage-store.js';
import type { ClassifiedDocument, StageMarker, StageName } from './types/index.js';
import { formatDate, recentDates } from './utils/date.js';

export interface StatusHistoryEntry {
  date: string;
  stages: Record<StageName, StageMarker>;
}

export interface StatusReport {
  days: StatusHistoryEntry[];
}

export interface DocumentListing {
  date: string | null;
  count: number;
  documents: ClassifiedDocument[];
}

export type ChannelDescription = ChannelConfig & { configured: boolean };

export interface ConfigDump {
  language: Profile['language'];
  subscriptions: {
    categories: string[];
    interestTags: InterestTag[];
  };
  channels: ChannelDescription[];
  classifier: Profile['classifier'] & { apiKeyConfigured: boolean };
  schedule: Profile['schedule'];
  paths: {
    database: string;
    profile: string;
  };
}

/**
 * Stage markers for the last `days` calendar days, newest first
 */
export async function queryStatus(
  store: StageStateStore,
  options: { days?: number; now?: Date } = {}
): Promise<StatusReport> {
  const days = Math.max(1, options.days ?? 7);
  const dates = recentDates(formatDate(options.now ?? new Date()), days);
  const history = await store.listHistory(dates);

  return {
    days: dates.flatMap((date) => {
      const stages = history.get(date);
      return stages ? [{ date, stages }] : [];
    }),
  };
}

export function queryDocuments(search: DocumentSearch = {}): DocumentListing {
  const result = searchClassifiedDocuments(search);
  return { date: result.date, count: result.documents.length, documents: result.documents };
}

export function describeConfig(profile: Profile, profilePath: string = config.profile.path): ConfigDump {
  return {
    language: profile.language,
    subscriptions: {
      categories: profile.subscriptions.categories,
      interestTags: profile.subscriptions.interestTags,
    },
    channels: profile.channels.map((channel) => ({ ...channel, configured: isConfigured(channel) })),
    classifier: { ...resolveClassifierSettings(profile), apiKeyConfigured: Boolean(config.llm.apiKey) },
    schedule: profile.schedule,
    paths: {
      database: config.database.path,
      profile: profilePath,
    },
  };
}

function isConfigured(channel: ChannelConfig): boolean {
  switch (channel.type) {
    case 'feishu':
      return Boolean(channel.webhookUrl || config.feishu.webhookUrl);
    case 'notion':
      return Boolean(config.notion.apiKey) && channel.databaseId !== '';
  }
}
