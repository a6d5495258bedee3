/**
 * Message Fetcher
 *
 * Reads a channel newest-first and keeps the messages posted inside the window
 */

import { isWithinWindow } from '../window/index.js';
import { logger } from '../utils/logger.js';
import type { RawMessage, TimeWindow } from '../types/index.js';
import type { ChannelSource, FetchOptions } from './types.js';

export const DEFAULT_PAGE_LIMIT = 100;

/**
 * Public link of a channel message
 */
export function buildMessageLink(channel: string, id: number): string {
  return `https://t.me/${channel}/${id}`;
}

/**
 * Fetch the messages of a channel posted inside the window, oldest first.
 * A source failure yields an empty list for the channel.
 */
export async function fetchWindowMessages(
  source: ChannelSource,
  channel: string,
  window: TimeWindow,
  options: FetchOptions = {}
): Promise<RawMessage[]> {
  const { pageLimit = DEFAULT_PAGE_LIMIT } = options;
  const start = window.start.getTime();

  const messages: RawMessage[] = [];
  let scanned = 0;
  let skippedEmpty = 0;

  logger.info({ channel, date: window.date, pageLimit }, 'Fetching channel messages');

  try {
    for await (const message of source.listMessages(channel, pageLimit)) {
      scanned++;
      // Newest first: everything after this is older still
      if (message.date.getTime() < start) {
        break;
      }
      if (!isWithinWindow(message.date, window)) {
        continue;
      }

      const { text } = message;
      if (!text.trim()) {
        skippedEmpty++;
        continue;
      }

      messages.push({
        id: message.id,
        text,
        timestamp: message.date,
        sourceLink: buildMessageLink(channel, message.id),
      });
    }
  } catch (error) {
    logger.warn({ channel, error }, 'Failed to fetch channel messages');
    return [];
  }

  messages.reverse();

  logger.info(
    { channel, scanned, kept: messages.length, skippedEmpty },
    'Channel messages fetched'
  );

  return messages;
}
