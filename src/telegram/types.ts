/**
 * Telegram Source Types
 */

import type { SourceMessage } from '../types/index.js';

/**
 * Capability to read the history of a channel
 */
export interface ChannelSource {
  /**
   * Iterate the most recent messages of a channel, newest first
   * @param channel Channel username
   * @param pageLimit Maximum number of messages to read
   * @throws SourceUnavailableError when the channel cannot be read
   */
  listMessages(channel: string, pageLimit: number): AsyncIterable<SourceMessage>;
}

export interface FetchOptions {
  pageLimit?: number;
}
