/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

const envSchema = z.object({
  // Language model (any OpenAI-compatible endpoint)
  LLM_API_KEY: z.string().optional(),
  LLM_API_BASE: z.string().url().optional(),
  LLM_MODEL: z.string().optional(),

  // Notification channels
  FEISHU_WEBHOOK_URL: z.string().optional(), // Fallback for feishu channels without a webhookUrl
  NOTION_API_KEY: z.string().optional(),

  // Storage
  DB_PATH: z.string().default('./data/pipeline.db'),
  PROFILE_PATH: z.string().default('./profiles/default.json'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = validateEnv();
