/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en', { timeZone });
    return true;
  } catch {
    return false;
  }
}

const envSchema = z.object({
  // Translation
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  TARGET_LANGUAGE: z.string().min(2).default('ko'),

  // Delivery
  EMAIL_PROVIDER: z.enum(['smtp', 'console']).default('smtp'),
  SMTP_HOST: optionalString,
  SMTP_PORT: z.coerce.number().int().positive().default(465),
  SMTP_USER: optionalString,
  SMTP_PASSWORD: optionalString,
  EMAIL_TO: z.string().default(''),

  // Fetching
  SCRAPE_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  USER_AGENT: z.string().default('Mozilla/5.0 (compatible; ComplianceDigestBot/1.0)'),

  // Storage
  STORE_PATH: z.string().default('./data/processed_items.txt'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  LOG_FILE: optionalString,

  // Scheduling
  CRON_SCHEDULE: z.string().default('0 * * * *'),
  TZ: z.string().refine(isValidTimeZone, { message: 'Invalid IANA time zone' }).default('Asia/Seoul'),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = parseEnv(process.env);
