import { describe, it, expect, vi } from 'vitest';
import { processMessage, processChannel, type DispatcherDeps } from '../strategy.js';
import type { ChannelSpec, ExtractedContent, RawMessage } from '../../types/index.js';

const SCRAPE: ChannelSpec = { name: 'Ahboyreads', strategy: 'scrape' };
const TRANSLATE: ChannelSpec = { name: 'cryptonews', strategy: 'translate' };

function rawMessage(id: number, text: string, channel = 'cryptonews'): RawMessage {
  return {
    id,
    text,
    timestamp: new Date('2024-03-09T03:00:00Z'),
    sourceLink: `https://t.me/${channel}/${id}`,
  };
}

function article(url: string): ExtractedContent {
  const text = `Article body for ${url} `.repeat(20);
  return { url, title: `Title of ${url}`, text, length: text.length };
}

function createDeps(options: {
  articles?: Record<string, ExtractedContent | null>;
  translation?: string | null;
  summary?: string;
} = {}) {
  const fetchArticle = vi.fn(async (url: string) => options.articles?.[url] ?? null);
  const summarizeToKorean = vi.fn(async (_text: string, _titleHint?: string) => options.summary ?? '📈 요약');
  const translateToKorean = vi.fn(async (_text: string) =>
    options.translation === undefined ? '번역' : options.translation
  );

  const deps: DispatcherDeps = {
    articles: { fetchArticle },
    generator: { summarizeToKorean, translateToKorean },
  };

  return { deps, fetchArticle, summarizeToKorean, translateToKorean };
}

describe('translate strategy', () => {
  it('emits the translation linked to the first url in the message', async () => {
    const { deps } = createDeps({ translation: '비트코인 상승' });
    const message = rawMessage(7, 'BTC rallies https://example.com/a');

    const item = await processMessage(TRANSLATE, message, deps);

    expect(item).toEqual({
      body: '비트코인 상승',
      timestamp: message.timestamp,
      link: 'https://example.com/a',
      channel: 'cryptonews',
    });
  });

  it('links to the message itself when the text has no url', async () => {
    const { deps } = createDeps({ translation: '이더리움 하락' });

    const item = await processMessage(TRANSLATE, rawMessage(8, 'ETH dips'), deps);

    expect(item?.link).toBe('https://t.me/cryptonews/8');
  });

  it('drops the message when translation fails', async () => {
    const { deps, summarizeToKorean } = createDeps({ translation: null });

    const item = await processMessage(TRANSLATE, rawMessage(9, 'SOL news https://example.com/s'), deps);

    expect(item).toBeNull();
    expect(summarizeToKorean).not.toHaveBeenCalled();
  });

  it('translates the full message text', async () => {
    const { deps, translateToKorean } = createDeps();
    const text = 'Line one\nLine two https://example.com/x';

    await processMessage(TRANSLATE, rawMessage(10, text), deps);

    expect(translateToKorean).toHaveBeenCalledWith(text);
  });
});

describe('scrape strategy', () => {
  it('summarizes the first link that yields content and stops there', async () => {
    const { deps, fetchArticle, summarizeToKorean } = createDeps({
      articles: {
        'https://example.com/b': article('https://example.com/b'),
        'https://example.com/c': article('https://example.com/c'),
      },
      summary: '📈 하나\n🏦 둘\n⚠️ 셋',
    });
    const message = rawMessage(
      11,
      'Watch https://youtu.be/xyz then https://example.com/a and https://example.com/b or https://example.com/c',
      'Ahboyreads'
    );

    const item = await processMessage(SCRAPE, message, deps);

    expect(fetchArticle.mock.calls.map(([url]) => url)).toEqual([
      'https://example.com/a',
      'https://example.com/b',
    ]);
    const expected = article('https://example.com/b');
    expect(summarizeToKorean).toHaveBeenCalledWith(expected.text, expected.title);
    expect(item).toEqual({
      body: '📈 하나\n🏦 둘\n⚠️ 셋',
      timestamp: message.timestamp,
      link: 'https://example.com/b',
      channel: 'Ahboyreads',
    });
  });

  it('drops the message when no link yields content', async () => {
    const { deps, summarizeToKorean } = createDeps();

    const item = await processMessage(SCRAPE, rawMessage(12, 'Read https://example.com/a'), deps);

    expect(item).toBeNull();
    expect(summarizeToKorean).not.toHaveBeenCalled();
  });

  it('drops a message without links', async () => {
    const { deps, fetchArticle } = createDeps();

    const item = await processMessage(SCRAPE, rawMessage(13, 'Just an opinion'), deps);

    expect(item).toBeNull();
    expect(fetchArticle).not.toHaveBeenCalled();
  });

  it('never fetches social or video links', async () => {
    const { deps, fetchArticle } = createDeps();

    await processMessage(SCRAPE, rawMessage(14, 'https://x.com/a/status/1 https://www.youtube.com/watch?v=1'), deps);

    expect(fetchArticle).not.toHaveBeenCalled();
  });
});

describe('processChannel', () => {
  it('keeps message order and counts dropped messages', async () => {
    const { deps, translateToKorean } = createDeps();
    translateToKorean
      .mockResolvedValueOnce('첫째')
      .mockResolvedValueOnce(null)
      .mockResolvedValueOnce('셋째');

    const result = await processChannel(
      TRANSLATE,
      [rawMessage(1, 'first'), rawMessage(2, 'second'), rawMessage(3, 'third')],
      deps
    );

    expect(result.items.map((item) => item.body)).toEqual(['첫째', '셋째']);
    expect(result.items.map((item) => item.link)).toEqual([
      'https://t.me/cryptonews/1',
      'https://t.me/cryptonews/3',
    ]);
    expect(result.dropped).toBe(1);
  });
});
