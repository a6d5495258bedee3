/**
 * Telegram Channel Source
 *
 * Reads channel history through an MTProto user session (gramjs)
 */

import { TelegramClient } from 'telegram';
import { StringSession } from 'telegram/sessions/index.js';
import { logger } from '../utils/logger.js';
import { SourceUnavailableError, errorMessage } from '../utils/errors.js';
import type { SourceMessage } from '../types/index.js';
import type { ChannelSource } from './types.js';

export interface TelegramSourceOptions {
  apiId: number;
  apiHash: string;
  session: string;
  connectionRetries?: number;
}

/**
 * Fields of a history item the digest reads. Service messages (pins, photo
 * changes) come through `iterMessages` too and carry no `message` text.
 */
export interface HistoryItem {
  id: number;
  date: number;
  message?: string;
}

export function toSourceMessage(item: HistoryItem): SourceMessage {
  return {
    id: item.id,
    text: item.message ?? '',
    date: new Date(item.date * 1000),
  };
}

export class TelegramChannelSource implements ChannelSource {
  private readonly client: TelegramClient;
  private connecting: Promise<void> | null = null;

  constructor(options: TelegramSourceOptions) {
    this.client = new TelegramClient(
      new StringSession(options.session),
      options.apiId,
      options.apiHash,
      { connectionRetries: options.connectionRetries ?? 5 }
    );
  }

  /**
   * Connect once and check that the session is still authorized
   */
  private ensureConnected(): Promise<void> {
    if (!this.connecting) {
      this.connecting = (async () => {
        logger.info('Connecting to Telegram');
        await this.client.connect();

        if (!(await this.client.checkAuthorization())) {
          throw new SourceUnavailableError(
            'Telegram session is not authorized, run `npm run session` to create a new one'
          );
        }

        logger.info('Connected to Telegram');
      })();
    }
    return this.connecting;
  }

  async *listMessages(channel: string, pageLimit: number): AsyncGenerator<SourceMessage> {
    try {
      await this.ensureConnected();

      for await (const message of this.client.iterMessages(channel, { limit: pageLimit })) {
        yield toSourceMessage(message);
      }
    } catch (error) {
      if (error instanceof SourceUnavailableError) {
        throw error;
      }
      throw new SourceUnavailableError(`Cannot read channel ${channel}: ${errorMessage(error)}`, {
        channel,
      });
    }
  }

  async disconnect(): Promise<void> {
    if (!this.connecting) {
      return;
    }

    // destroy() also ends the update loop, which disconnect() leaves running
    try {
      await this.client.destroy();
      logger.info('Disconnected from Telegram');
    } catch (error) {
      logger.warn({ error }, 'Error disconnecting from Telegram');
    }
    this.connecting = null;
  }
}
