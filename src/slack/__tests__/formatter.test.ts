import { describe, it, expect, vi } from 'vitest';
import {
  chunkItems,
  deliverItems,
  buildChunkPayload,
  buildEmptyPayload,
  escapeMrkdwn,
  encodeLinkUrl,
  type DigestContext,
} from '../formatter.js';
import { DeliveryError } from '../../utils/errors.js';
import type { DeliveryEndpoint, SlackPayload, SlackBlock } from '../types.js';
import type { OutputItem } from '../../types/index.js';

const CONTEXT: DigestContext = {
  dateLabel: '2024년 03월 09일',
  timeZone: 'Asia/Seoul',
};

function item(index: number, channel = 'Ahboyreads'): OutputItem {
  return {
    body: `요약 ${index}`,
    // 09:05 KST
    timestamp: new Date('2024-03-09T00:05:00Z'),
    link: `https://example.com/${index}`,
    channel,
  };
}

function items(count: number): OutputItem[] {
  return Array.from({ length: count }, (_, i) => item(i + 1));
}

function recordingEndpoint() {
  const payloads: SlackPayload[] = [];
  const endpoint: DeliveryEndpoint = {
    post: vi.fn(async (payload: SlackPayload) => {
      payloads.push(payload);
    }),
  };
  return { endpoint, payloads };
}

function headerText(payload: SlackPayload): string {
  const [header] = payload.blocks;
  return header?.type === 'header' ? header.text.text : '';
}

function sectionTexts(payload: SlackPayload): string[] {
  return payload.blocks.flatMap((block: SlackBlock) => (block.type === 'section' ? [block.text.text] : []));
}

function countBlocks(payload: SlackPayload, type: SlackBlock['type']): number {
  return payload.blocks.filter((block) => block.type === type).length;
}

describe('chunkItems', () => {
  it('splits 37 items into 15, 15 and 7', () => {
    const chunks = chunkItems(items(37));

    expect(chunks.map((c) => c.items.length)).toEqual([15, 15, 7]);
    expect(chunks.map((c) => c.offset)).toEqual([0, 15, 30]);
    expect(chunks.map((c) => `${c.chunkIndex}/${c.totalChunks}`)).toEqual(['1/3', '2/3', '3/3']);
  });

  it('returns no chunk for no items', () => {
    expect(chunkItems([])).toEqual([]);
  });

  it('keeps a single chunk for exactly 15 items', () => {
    expect(chunkItems(items(15)).map((c) => c.items.length)).toEqual([15]);
  });
});

describe('buildChunkPayload', () => {
  it('renders a single-channel chunk', () => {
    const [chunk] = chunkItems([item(1)]);
    if (!chunk) throw new Error('expected a chunk');

    const payload = buildChunkPayload(chunk, 1, { ...CONTEXT, channelName: 'Ahboyreads' });

    expect(payload).toEqual({
      text: '📰 Ahboyreads 일간 뉴스 요약 - 2024년 03월 09일',
      blocks: [
        {
          type: 'header',
          text: { type: 'plain_text', text: '📰 Ahboyreads 일간 뉴스 요약 - 2024년 03월 09일', emoji: true },
        },
        { type: 'divider' },
        { type: 'section', text: { type: 'mrkdwn', text: '*1. [09:05] 뉴스*\n요약 1' } },
        { type: 'section', text: { type: 'mrkdwn', text: '<https://example.com/1|📎 원문 보기>' } },
        { type: 'context', elements: [{ type: 'mrkdwn', text: '총 1개의 뉴스' }] },
      ],
    });
  });

  it('labels items with their channel when several channels are digested', () => {
    const [chunk] = chunkItems([item(1, 'Ahboyreads'), item(2, 'cryptonews')]);
    if (!chunk) throw new Error('expected a chunk');

    const payload = buildChunkPayload(chunk, 2, CONTEXT);

    expect(headerText(payload)).toBe('📰 텔레그램 채널 일간 뉴스 요약 - 2024년 03월 09일');
    expect(sectionTexts(payload)).toEqual([
      '*1. [09:05] Ahboyreads*\n요약 1',
      '<https://example.com/1|📎 원문 보기>',
      '*2. [09:05] cryptonews*\n요약 2',
      '<https://example.com/2|📎 원문 보기>',
    ]);
    // Divider between the two items only
    expect(countBlocks(payload, 'divider')).toBe(2);
  });

  it('escapes control characters in bodies and links', () => {
    const [chunk] = chunkItems([
      { ...item(1), body: '<!channel> S&P 500 > 5000', link: 'https://a.example.com/x|y' },
    ]);
    if (!chunk) throw new Error('expected a chunk');

    const payload = buildChunkPayload(chunk, 1, { ...CONTEXT, channelName: 'Ahboyreads' });

    expect(sectionTexts(payload)).toEqual([
      '*1. [09:05] 뉴스*\n&lt;!channel&gt; S&amp;P 500 &gt; 5000',
      '<https://a.example.com/x%7Cy|📎 원문 보기>',
    ]);
  });

  it('stays within the Slack block limit for a full chunk', () => {
    const [chunk] = chunkItems(items(15));
    if (!chunk) throw new Error('expected a chunk');

    expect(buildChunkPayload(chunk, 15, CONTEXT).blocks).toHaveLength(47);
  });
});

describe('escapeMrkdwn', () => {
  it('escapes ampersands before angle brackets', () => {
    expect(escapeMrkdwn('BTC < 60k & ETH > 3k')).toBe('BTC &lt; 60k &amp; ETH &gt; 3k');
  });

  it('leaves plain text alone', () => {
    expect(escapeMrkdwn('📈 비트코인 상승')).toBe('📈 비트코인 상승');
  });
});

describe('encodeLinkUrl', () => {
  it('keeps query strings intact', () => {
    expect(encodeLinkUrl('https://example.com/a?b=1&c=2')).toBe('https://example.com/a?b=1&c=2');
  });

  it('encodes pipes and angle brackets', () => {
    expect(encodeLinkUrl('https://example.com/<a>|b')).toBe('https://example.com/%3Ca%3E%7Cb');
  });
});

describe('buildEmptyPayload', () => {
  it('announces that there is nothing to report', () => {
    const payload = buildEmptyPayload({ ...CONTEXT, channelName: 'Ahboyreads' });

    expect(payload.blocks).toEqual([
      {
        type: 'header',
        text: { type: 'plain_text', text: '📰 Ahboyreads 일간 뉴스 요약 - 2024년 03월 09일', emoji: true },
      },
      { type: 'divider' },
      { type: 'section', text: { type: 'mrkdwn', text: 'ℹ️ 어제 수집된 뉴스가 없습니다.' } },
    ]);
  });
});

describe('deliverItems', () => {
  it('posts 37 items as three chunks with the footer on the last one', async () => {
    const { endpoint, payloads } = recordingEndpoint();

    const result = await deliverItems(items(37), endpoint, CONTEXT);

    expect(result).toEqual({ chunks: 3, delivered: 3, failed: 0 });
    expect(payloads.map(headerText)).toEqual([
      '📰 텔레그램 채널 일간 뉴스 요약 - 2024년 03월 09일 (1/3)',
      '📰 텔레그램 채널 일간 뉴스 요약 - 2024년 03월 09일 (2/3)',
      '📰 텔레그램 채널 일간 뉴스 요약 - 2024년 03월 09일 (3/3)',
    ]);
    expect(payloads.map((p) => countBlocks(p, 'context'))).toEqual([0, 0, 1]);
    expect(payloads[2]?.blocks.at(-1)).toEqual({
      type: 'context',
      elements: [{ type: 'mrkdwn', text: '총 37개의 뉴스' }],
    });
  });

  it('numbers items across chunks', async () => {
    const { endpoint, payloads } = recordingEndpoint();

    await deliverItems(items(37), endpoint, CONTEXT);

    expect(sectionTexts(payloads[2] ?? { text: '', blocks: [] })[0]).toBe('*31. [09:05] Ahboyreads*\n요약 31');
  });

  it('delivers every item exactly once', async () => {
    const { endpoint, payloads } = recordingEndpoint();

    await deliverItems(items(37), endpoint, CONTEXT);

    const links = payloads.flatMap(sectionTexts).filter((text) => text.startsWith('<'));
    expect(links).toHaveLength(37);
    expect(new Set(links).size).toBe(37);
  });

  it('still posts one message when there are no items', async () => {
    const { endpoint, payloads } = recordingEndpoint();

    const result = await deliverItems([], endpoint, CONTEXT);

    expect(endpoint.post).toHaveBeenCalledTimes(1);
    expect(result).toEqual({ chunks: 1, delivered: 1, failed: 0 });
    expect(sectionTexts(payloads[0] ?? { text: '', blocks: [] })).toEqual(['ℹ️ 어제 수집된 뉴스가 없습니다.']);
  });

  it('keeps posting after a chunk fails', async () => {
    const post = vi
      .fn(async (_payload: SlackPayload) => {})
      .mockRejectedValueOnce(new DeliveryError('Slack webhook returned 500', 500));

    const result = await deliverItems(items(37), { post }, CONTEXT);

    expect(post).toHaveBeenCalledTimes(3);
    expect(result).toEqual({ chunks: 3, delivered: 2, failed: 1 });
  });
});
