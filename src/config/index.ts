/**
 * Application configuration
 */

import { env } from './env.js';
import { COMPLIANCE_KEYWORDS } from './keywords.js';
import { DEFAULT_FEEDS, DEFAULT_SCRAPE_TARGETS } from './feeds.js';

export const config = {
  app: {
    name: 'compliance-news-digest',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  translation: {
    apiKey: env.OPENAI_API_KEY,
    model: env.OPENAI_MODEL,
    targetLanguage: env.TARGET_LANGUAGE,
  },

  email: {
    provider: env.EMAIL_PROVIDER,
    subject: '[Compliance Digest] 신규 규제 소식 / 법률 변경 알림',
    smtp: {
      host: env.SMTP_HOST,
      port: env.SMTP_PORT,
      user: env.SMTP_USER,
      password: env.SMTP_PASSWORD,
    },
    recipients: env.EMAIL_TO.split(',')
      .map((address) => address.trim())
      .filter((address) => address.length > 0),
  },

  scraper: {
    userAgent: env.USER_AGENT,
    timeoutMs: env.SCRAPE_TIMEOUT_MS,
  },

  store: {
    path: env.STORE_PATH,
  },

  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
  },

  scheduler: {
    cronExpression: env.CRON_SCHEDULE,
    timezone: env.TZ,
  },

  sources: {
    feeds: DEFAULT_FEEDS,
    scrapeTargets: DEFAULT_SCRAPE_TARGETS,
  },

  keywords: COMPLIANCE_KEYWORDS,
} as const;

export type Config = typeof config;
export { env } from './env.js';
export { COMPLIANCE_KEYWORDS } from './keywords.js';
export { DEFAULT_FEEDS, DEFAULT_SCRAPE_TARGETS } from './feeds.js';
