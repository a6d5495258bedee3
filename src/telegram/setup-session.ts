/**
 * Telegram Session Setup
 *
 * Run with: npx tsx src/telegram/setup-session.ts
 *
 * Logs in interactively with TELEGRAM_API_ID / TELEGRAM_API_HASH from .env and
 * prints the string session to store as TELEGRAM_SESSION.
 */

import 'dotenv/config';
import { createInterface } from 'node:readline/promises';
import { TelegramClient } from 'telegram';
import { StringSession } from 'telegram/sessions/index.js';
import { telegramCredentialsSchema } from '../config/env.js';
import { logger } from '../utils/logger.js';

async function setupSession(): Promise<void> {
  const credentials = telegramCredentialsSchema.safeParse(process.env);
  if (!credentials.success) {
    logger.error('Set TELEGRAM_API_ID and TELEGRAM_API_HASH in .env first');
    process.exit(1);
  }

  const session = new StringSession('');
  const client = new TelegramClient(
    session,
    credentials.data.TELEGRAM_API_ID,
    credentials.data.TELEGRAM_API_HASH,
    { connectionRetries: 5 }
  );
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  logger.info('Starting Telegram authentication, a login code will be sent to your Telegram app');

  try {
    await client.start({
      phoneNumber: async () => rl.question('Phone number (international format): '),
      phoneCode: async () => rl.question('Login code: '),
      password: async () => rl.question('Two-step verification password: '),
      onError: (error) => {
        logger.error({ error }, 'Authentication error');
      },
    });

    logger.info('Authenticated, add this value to your secrets as TELEGRAM_SESSION:');
    process.stdout.write(`\n${session.save()}\n\n`);
  } finally {
    rl.close();
    await client.destroy();
  }
}

setupSession().catch((error: unknown) => {
  logger.fatal({ error }, 'Session setup failed');
  process.exit(1);
});
