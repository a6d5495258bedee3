/**
 * Channel Fetch Test Script
 *
 * Run with: npx tsx src/telegram/test-fetch.ts [channel]
 *
 * Prints the ten most recent messages of a channel. Requires the full .env.
 */

import { loadConfig } from '../config/index.js';
import { formatTimeOfDay, getZonedParts } from '../window/index.js';
import { logger } from '../utils/logger.js';
import { TelegramChannelSource } from './client.js';

async function testFetch(): Promise<void> {
  const config = loadConfig();
  const channel = process.argv[2] ?? config.telegram.channels[0]?.name;
  const timeZone = config.scheduler.timezone;

  if (!channel) {
    logger.error('No channel to test');
    return;
  }

  const source = new TelegramChannelSource(config.telegram);

  try {
    logger.info({ channel }, 'Fetching 10 most recent messages');

    let count = 0;
    for await (const message of source.listMessages(channel, 10)) {
      count++;
      const day = getZonedParts(message.date, timeZone);
      const preview = message.text.length > 100 ? `${message.text.slice(0, 100)}...` : message.text;

      logger.info(
        {
          id: message.id,
          date: `${day.year}-${day.month}-${day.day} ${formatTimeOfDay(message.date, timeZone)}`,
        },
        preview || '(no text)'
      );
    }

    if (count === 0) {
      logger.warn({ channel }, 'No messages found in this channel');
    }

    logger.info('=== Fetch Test Complete ===');
  } finally {
    await source.disconnect();
  }
}

testFetch().catch((error: unknown) => {
  logger.fatal({ error }, 'Test failed');
  process.exit(1);
});
