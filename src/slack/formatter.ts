/**
 * Delivery Formatter
 *
 * Renders digest items as Slack messages. A Slack message holds at most 50
 * blocks; an item takes up to 3 (section, link, divider), so items are sent in
 * chunks of 15.
 */

import { formatTimeOfDay } from '../window/index.js';
import { logger } from '../utils/logger.js';
import type { DeliveryChunk, DeliveryResult, OutputItem } from '../types/index.js';
import type { DeliveryEndpoint, SlackBlock, SlackPayload } from './types.js';

export const MAX_ITEMS_PER_CHUNK = 15;

// Slack limits
const MAX_HEADER_LENGTH = 150;
const MAX_SECTION_LENGTH = 3000;

export const EMPTY_DIGEST_TEXT = '어제 수집된 뉴스가 없습니다.';

export interface DigestContext {
  /** e.g. "2024년 03월 09일" */
  dateLabel: string;
  /** Set when the run covers a single channel */
  channelName?: string;
  timeZone: string;
}

export function chunkItems(
  items: readonly OutputItem[],
  size = MAX_ITEMS_PER_CHUNK
): DeliveryChunk[] {
  const totalChunks = Math.ceil(items.length / size);
  const chunks: DeliveryChunk[] = [];

  for (let offset = 0; offset < items.length; offset += size) {
    chunks.push({
      items: items.slice(offset, offset + size),
      chunkIndex: chunks.length + 1,
      totalChunks,
      offset,
    });
  }

  return chunks;
}

/**
 * Escape the characters Slack treats as control sequences in mrkdwn
 */
export function escapeMrkdwn(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Percent-encode the characters that would end or split a `<url|label>` link
 */
export function encodeLinkUrl(url: string): string {
  return url.replace(/\|/g, '%7C').replace(/</g, '%3C').replace(/>/g, '%3E');
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

export function buildHeaderText(context: DigestContext, chunk?: DeliveryChunk): string {
  const source = context.channelName ?? '텔레그램 채널';
  const position =
    chunk && chunk.totalChunks > 1 ? ` (${chunk.chunkIndex}/${chunk.totalChunks})` : '';
  return truncate(`📰 ${source} 일간 뉴스 요약 - ${context.dateLabel}${position}`, MAX_HEADER_LENGTH);
}

function headerBlocks(text: string): SlackBlock[] {
  return [
    { type: 'header', text: { type: 'plain_text', text, emoji: true } },
    { type: 'divider' },
  ];
}

export function buildChunkPayload(
  chunk: DeliveryChunk,
  totalItems: number,
  context: DigestContext
): SlackPayload {
  const header = buildHeaderText(context, chunk);
  const blocks = headerBlocks(header);

  chunk.items.forEach((item, i) => {
    const number = chunk.offset + i + 1;
    const time = formatTimeOfDay(item.timestamp, context.timeZone);
    const label = context.channelName ? '뉴스' : escapeMrkdwn(item.channel);
    const body = escapeMrkdwn(item.body);

    blocks.push({
      type: 'section',
      text: { type: 'mrkdwn', text: truncate(`*${number}. [${time}] ${label}*\n${body}`, MAX_SECTION_LENGTH) },
    });

    if (item.link) {
      blocks.push({
        type: 'section',
        text: { type: 'mrkdwn', text: `<${encodeLinkUrl(item.link)}|📎 원문 보기>` },
      });
    }

    // Divider between items, not after the last one
    if (i < chunk.items.length - 1) {
      blocks.push({ type: 'divider' });
    }
  });

  if (chunk.chunkIndex === chunk.totalChunks) {
    blocks.push({
      type: 'context',
      elements: [{ type: 'mrkdwn', text: `총 ${totalItems}개의 뉴스` }],
    });
  }

  return { text: header, blocks };
}

export function buildEmptyPayload(context: DigestContext): SlackPayload {
  const header = buildHeaderText(context);
  return {
    text: `${header}: ${EMPTY_DIGEST_TEXT}`,
    blocks: [
      ...headerBlocks(header),
      { type: 'section', text: { type: 'mrkdwn', text: `ℹ️ ${EMPTY_DIGEST_TEXT}` } },
    ],
  };
}

/**
 * Post the digest, one message per chunk. A failed chunk does not stop the
 * following ones. An empty digest still posts a "no items" message.
 */
export async function deliverItems(
  items: readonly OutputItem[],
  endpoint: DeliveryEndpoint,
  context: DigestContext
): Promise<DeliveryResult> {
  const payloads =
    items.length === 0
      ? [buildEmptyPayload(context)]
      : chunkItems(items).map((chunk) => buildChunkPayload(chunk, items.length, context));

  const result: DeliveryResult = { chunks: payloads.length, delivered: 0, failed: 0 };

  logger.info({ items: items.length, chunks: payloads.length }, 'Delivering digest');

  for (const [index, payload] of payloads.entries()) {
    try {
      await endpoint.post(payload);
      result.delivered++;
      logger.info({ chunk: index + 1, of: payloads.length, blocks: payload.blocks.length }, 'Chunk delivered');
    } catch (error) {
      result.failed++;
      logger.error({ error, chunk: index + 1, of: payloads.length }, 'Failed to deliver chunk');
    }
  }

  return result;
}
