/**
 * Telegram Module
 *
 * Channel history source and window-filtered message fetching
 */

export { fetchWindowMessages, buildMessageLink, DEFAULT_PAGE_LIMIT } from './fetcher.js';
export {
  TelegramChannelSource,
  toSourceMessage,
  type TelegramSourceOptions,
  type HistoryItem,
} from './client.js';
export type { ChannelSource, FetchOptions } from './types.js';
