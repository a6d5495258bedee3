/**
 * Application configuration
 */

import 'dotenv/config';
import { ConfigError } from '../utils/errors.js';
import { envSchema, formatEnvIssues, withoutBlankValues, type EnvSource } from './env.js';
import { parseChannelSpecs } from './channels.js';
import type { ChannelSpec } from '../types/index.js';

export interface Config {
  app: {
    name: string;
    version: string;
    env: 'development' | 'production' | 'test';
  };
  telegram: {
    apiId: number;
    apiHash: string;
    session: string;
    channels: readonly ChannelSpec[];
    pageLimit: number;
  };
  openai: {
    apiKey: string;
    model: string;
    baseUrl: string | undefined;
    delayMs: number;
    timeoutMs: number;
  };
  slack: {
    webhookUrl: string;
  };
  scraper: {
    timeoutMs: number;
    userAgent: string;
  };
  scheduler: {
    cronExpression: string;
    timezone: string;
  };
  logging: {
    level: string;
  };
}

/**
 * Validate the environment and build the run configuration.
 * Throws ConfigError listing every missing or invalid variable.
 */
export function loadConfig(source: EnvSource = process.env): Config {
  const result = envSchema.safeParse(withoutBlankValues(source));

  if (!result.success) {
    const problems = formatEnvIssues(result.error);
    throw new ConfigError(`Environment validation failed:\n  - ${problems.join('\n  - ')}`, {
      problems,
    });
  }

  const env = result.data;

  return {
    app: {
      name: 'telegram-daily-digest',
      version: '1.0.0',
      env: env.NODE_ENV,
    },
    telegram: {
      apiId: env.TELEGRAM_API_ID,
      apiHash: env.TELEGRAM_API_HASH,
      session: env.TELEGRAM_SESSION,
      channels: parseChannelSpecs(env.TELEGRAM_CHANNELS),
      pageLimit: env.FETCH_PAGE_LIMIT,
    },
    openai: {
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL,
      baseUrl: env.OPENAI_BASE_URL,
      delayMs: env.GENERATION_DELAY_MS,
      timeoutMs: env.GENERATION_TIMEOUT_MS,
    },
    slack: {
      webhookUrl: env.SLACK_WEBHOOK_URL,
    },
    scraper: {
      timeoutMs: env.ARTICLE_TIMEOUT_MS,
      userAgent: env.USER_AGENT,
    },
    scheduler: {
      cronExpression: env.CRON_SCHEDULE,
      timezone: env.TIMEZONE,
    },
    logging: {
      level: env.LOG_LEVEL,
    },
  };
}

export { parseChannelSpecs, resolveChannels, CHANNEL_STRATEGIES } from './channels.js';
export { telegramCredentialsSchema, type Env } from './env.js';
