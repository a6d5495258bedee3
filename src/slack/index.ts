/**
 * Slack Module
 *
 * Chunked Block Kit rendering and webhook delivery of the digest
 */

export {
  deliverItems,
  chunkItems,
  buildChunkPayload,
  buildEmptyPayload,
  buildHeaderText,
  escapeMrkdwn,
  encodeLinkUrl,
  MAX_ITEMS_PER_CHUNK,
  EMPTY_DIGEST_TEXT,
  type DigestContext,
} from './formatter.js';

export { SlackWebhookClient, LoggingEndpoint, type SlackWebhookOptions } from './client.js';
export type { DeliveryEndpoint, SlackPayload, SlackBlock } from './types.js';
