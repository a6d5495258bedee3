#!/usr/bin/env node
/**
 * Telegram Daily Digest
 *
 * Collects yesterday's messages from Telegram channels, turns each one into a
 * short Korean item (article summary or translation) and posts the digest to
 * Slack.
 *
 * Usage:
 *   node dist/index.js                 - Run once for every configured channel and exit
 *   node dist/index.js <channel>       - Run once for a single configured channel
 *   node dist/index.js --schedule      - Stay alive and run on CRON_SCHEDULE
 *   node dist/index.js --dry-run       - Log Slack payloads instead of posting them
 */

import { loadConfig, resolveChannels, type Config } from './config/index.js';
import { TelegramChannelSource } from './telegram/client.js';
import { fetchArticle } from './scraper/index.js';
import { GenerationClient, OpenAiBackend } from './summarizer/index.js';
import { SlackWebhookClient, LoggingEndpoint, type DeliveryEndpoint } from './slack/index.js';
import { runPipeline } from './pipeline.js';
import { startScheduler } from './scheduler.js';
import { parseArgs } from './cli.js';
import { ConfigError } from './utils/errors.js';
import { logger, configureLogger } from './utils/logger.js';
import type { ChannelSpec } from './types/index.js';

async function executeDigest(
  config: Config,
  channels: readonly ChannelSpec[],
  dryRun: boolean
): Promise<void> {
  const source = new TelegramChannelSource(config.telegram);
  const endpoint: DeliveryEndpoint = dryRun
    ? new LoggingEndpoint()
    : new SlackWebhookClient({ webhookUrl: config.slack.webhookUrl });
  const generator = new GenerationClient(
    new OpenAiBackend({
      apiKey: config.openai.apiKey,
      model: config.openai.model,
      baseUrl: config.openai.baseUrl,
      timeoutMs: config.openai.timeoutMs,
    }),
    { delayMs: config.openai.delayMs }
  );
  const articles = {
    fetchArticle: (url: string) =>
      fetchArticle(url, {
        timeoutMs: config.scraper.timeoutMs,
        userAgent: config.scraper.userAgent,
      }),
  };

  try {
    const result = await runPipeline(
      {
        channels,
        timeZone: config.scheduler.timezone,
        pageLimit: config.telegram.pageLimit,
      },
      { source, endpoint, generator, articles }
    );

    logger.info('');
    logger.info('Digest Complete:');
    logger.info(`  ✓ Channels:  ${result.channels}`);
    logger.info(`  ✓ Fetched:   ${result.fetched} messages`);
    logger.info(`  ✓ Emitted:   ${result.emitted} items`);
    logger.info(`  ✓ Dropped:   ${result.dropped} messages`);
    logger.info(`  ✓ Delivered: ${result.chunksDelivered} Slack messages`);
    if (result.chunksFailed > 0) {
      logger.info(`  ⚠ Failed:    ${result.chunksFailed} Slack messages`);
    }
    logger.info(`  ⏱ Duration:  ${(result.durationMs / 1000).toFixed(1)}s`);
  } finally {
    await source.disconnect();
  }
}

async function main(): Promise<void> {
  // Configuration problems stop the run before any network activity
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  configureLogger(config.logging);
  const channels = resolveChannels(config.telegram.channels, args.channel);

  logger.info(
    {
      env: config.app.env,
      mode: args.schedule ? 'schedule' : 'run-once',
      dryRun: args.dryRun,
      channels: channels.map((c) => c.name),
    },
    'Starting Telegram Daily Digest'
  );

  if (!args.schedule) {
    await executeDigest(config, channels, args.dryRun);
    return;
  }

  const stop = startScheduler(() => executeDigest(config, channels, args.dryRun), {
    cronExpression: config.scheduler.cronExpression,
    timezone: config.scheduler.timezone,
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down...');
    stop();
    process.exit(0);
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.fatal(error.message);
    process.exit(1);
  }
  logger.fatal({ error }, 'Application failed');
  process.exit(1);
});
