/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

export const telegramCredentialsSchema = z.object({
  TELEGRAM_API_ID: z.coerce.number({ invalid_type_error: 'must be a number' }).int().positive(),
  TELEGRAM_API_HASH: z.string().min(1, 'TELEGRAM_API_HASH is required'),
});

export const envSchema = telegramCredentialsSchema.extend({
  // Telegram
  TELEGRAM_SESSION: z.string().min(1, 'TELEGRAM_SESSION is required (run `npm run session`)'),
  TELEGRAM_CHANNELS: z.string().default('Ahboyreads:scrape'),
  FETCH_PAGE_LIMIT: z.coerce.number().int().positive().default(100),

  // Generation backend
  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_BASE_URL: z.string().url().optional(),
  GENERATION_DELAY_MS: z.coerce.number().int().nonnegative().default(4500),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  // Slack
  SLACK_WEBHOOK_URL: z.string().url('must be a URL'),

  // Scraping
  ARTICLE_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  USER_AGENT: z.string().default(DEFAULT_USER_AGENT),

  // Scheduling
  TIMEZONE: z
    .string()
    .default('Asia/Seoul')
    .refine(isValidTimeZone, { message: 'must be an IANA timezone' }),
  CRON_SCHEDULE: z.string().default('0 9 * * *'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

export type EnvSource = Record<string, string | undefined>;

/**
 * Blank values count as unset so that `FOO=` in .env falls back to the default
 */
export function withoutBlankValues(source: EnvSource): EnvSource {
  return Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
}

/**
 * Human-readable list of validation problems, one per variable
 */
export function formatEnvIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const variable = issue.path.join('.');
    return issue.code === 'invalid_type' && issue.received === 'undefined'
      ? `${variable} is required`
      : `${variable}: ${issue.message}`;
  });
}
