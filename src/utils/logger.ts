/**
 * Application logger
 */

import pino from 'pino';

const nodeEnv = process.env['NODE_ENV'];
const usePretty = nodeEnv !== 'production' && nodeEnv !== 'test';

export const logger = pino({
  level: process.env['LOG_LEVEL'] ?? 'info',
  transport: usePretty
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:HH:MM:ss' } }
    : undefined,
  serializers: {
    error: pino.stdSerializers.err,
  },
  redact: {
    paths: ['apiKey', 'apiHash', 'session', 'webhookUrl', '*.apiKey', '*.apiHash', '*.session', '*.webhookUrl'],
    censor: '***REDACTED***',
  },
});

export type Logger = typeof logger;

/**
 * Apply the validated LOG_LEVEL once the configuration is loaded
 */
export function configureLogger(options: { level: string }): void {
  logger.level = options.level;
}
