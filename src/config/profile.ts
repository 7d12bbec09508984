/**
 * Pipeline profile
 *
 * Subscriptions, notification channels, classifier and schedule settings,
 * stored as JSON and validated with Zod. Loaded once per process and passed
 * to the pipeline explicitly.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from 'fs';
import { basename, dirname, join } from 'path';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const interestTagSchema = z.object({
  label: z.string().trim().min(1),
  description: z.string().default(''),
  keywords: z.array(z.string()).default([]),
});

const excludeTagsSchema = z.array(z.string()).default([]);

const feishuChannelSchema = z.object({
  type: z.literal('feishu'),
  webhookUrl: z.string().default(''),
  delaySeconds: z.number().min(0).default(2),
  separatorText: z.string().default('🚧 Next: {label} ({current}/{total}) 🚧'),
  excludeTags: excludeTagsSchema,
  maxAttempts: z.number().int().min(1).default(3),
});

const notionChannelSchema = z.object({
  type: z.literal('notion'),
  databaseId: z.string().min(1, 'databaseId is required for notion channels'),
  titleProperty: z.string().default('Name'),
  delaySeconds: z.number().min(0).default(0.35),
  excludeTags: excludeTagsSchema,
  maxAttempts: z.number().int().min(1).default(3),
});

const channelSchema = z.discriminatedUnion('type', [feishuChannelSchema, notionChannelSchema]);

const profileSchema = z.object({
  language: z.enum(['en', 'zh']).default('en'),
  subscriptions: z
    .object({
      categories: z.array(z.string().trim().min(1)).default(['cs.CL', 'cs.AI', 'cs.LG', 'cs.CV']),
      interestTags: z.array(interestTagSchema).default([]),
    })
    .default({}),
  channels: z.array(channelSchema).default([]),
  classifier: z
    .object({
      model: z.string().default('gpt-4o-mini'),
      apiBase: z.string().url().default('https://api.openai.com/v1'),
      temperature: z.number().min(0).max(2).default(0.2),
      maxConcurrency: z.number().int().min(1).default(5),
      timeoutMs: z.number().int().min(1).default(60_000),
      maxAttempts: z.number().int().min(1).default(3),
    })
    .default({}),
  schedule: z
    .object({
      mode: z.enum(['workday', 'daily']).default('workday'),
      cron: z.string().default('0 9 * * *'),
      timezone: z.string().default('UTC'),
      maxAttempts: z.number().int().min(1).default(6),
      intervalSeconds: z.number().int().min(30).default(3600),
      weekendReminder: z.boolean().default(false),
    })
    .default({}),
});

export type Profile = z.infer<typeof profileSchema>;
export type ChannelConfig = z.infer<typeof channelSchema>;
export type FeishuChannelConfig = z.infer<typeof feishuChannelSchema>;
export type NotionChannelConfig = z.infer<typeof notionChannelSchema>;
export type InterestTag = z.infer<typeof interestTagSchema>;

export function defaultProfile(): Profile {
  return profileSchema.parse({});
}

/**
 * Validate raw profile data, reporting every issue with its path
 */
export function parseProfile(data: unknown, source = 'profile'): Profile {
  const result = profileSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${source}: ${issues}`);
  }
  return result.data;
}

/**
 * Load a profile; a missing file is created from defaults
 */
export function loadProfile(path: string): Profile {
  if (!existsSync(path)) {
    const profile = defaultProfile();
    saveProfile(profile, path);
    logger.info({ path }, 'Profile not found, created default profile');
    return profile;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Profile ${path} is not valid JSON`, { cause: error });
  }

  return parseProfile(raw, `profile ${path}`);
}

/**
 * Write a profile atomically (temp file + rename)
 */
export function saveProfile(profile: Profile, path: string): void {
  const dir = dirname(path);
  const tmpPath = join(dir, `.${basename(path)}.${process.pid}.${Date.now()}.tmp`);

  mkdirSync(dir, { recursive: true });
  try {
    writeFileSync(tmpPath, `${JSON.stringify(profile, null, 2)}\n`, 'utf-8');
    renameSync(tmpPath, path);
  } catch (error) {
    if (existsSync(tmpPath)) {
      unlinkSync(tmpPath);
    }
    throw error;
  }
}
