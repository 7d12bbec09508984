/**
 * Application configuration
 *
 * Process-wide settings only. The pipeline profile (categories, channels,
 * classifier, schedule) lives in ./profile.ts and is passed explicitly.
 */

import { env } from './env.js';

export const config = {
  app: {
    name: 'paper-digest-pipeline',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  llm: {
    apiKey: env.LLM_API_KEY,
    apiBase: env.LLM_API_BASE,
    model: env.LLM_MODEL,
  },

  notion: {
    apiKey: env.NOTION_API_KEY,
  },

  feishu: {
    webhookUrl: env.FEISHU_WEBHOOK_URL,
    requestTimeoutMs: 10_000,
  },

  source: {
    baseUrls: ['https://export.arxiv.org/api/query', 'http://export.arxiv.org/api/query'],
    pageSize: 200,
    timeoutMs: 30_000,
    userAgent: 'Mozilla/5.0 (compatible; PaperDigestBot/1.0)',
  },

  database: {
    path: env.DB_PATH,
  },

  profile: {
    path: env.PROFILE_PATH,
  },

  logging: {
    level: env.LOG_LEVEL,
  },

  retry: {
    maxAttempts: 3,
    initialDelayMs: 1000,
    maxDelayMs: 5000,
    factor: 2,
  },
} as const;

export type Config = typeof config;
export { env } from './env.js';
export {
  loadProfile,
  saveProfile,
  parseProfile,
  defaultProfile,
  type Profile,
  type ChannelConfig,
  type FeishuChannelConfig,
  type NotionChannelConfig,
  type InterestTag,
} from './profile.js';
