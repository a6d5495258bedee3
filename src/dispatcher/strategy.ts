/**
 * Channel Strategy Dispatcher
 *
 * Turns a channel message into at most one digest item, according to the
 * channel's strategy
 */

import { extractLinks, isScrapeableUrl } from '../scraper/links.js';
import { logger } from '../utils/logger.js';
import type { TextGenerator } from '../summarizer/summarizer.js';
import type {
  ChannelSpec,
  ChannelStrategy,
  ExtractedContent,
  OutputItem,
  RawMessage,
} from '../types/index.js';

export interface ArticleFetcher {
  fetchArticle(url: string): Promise<ExtractedContent | null>;
}

export interface DispatcherDeps {
  articles: ArticleFetcher;
  generator: TextGenerator;
}

type StrategyHandler = (
  channel: string,
  message: RawMessage,
  deps: DispatcherDeps
) => Promise<OutputItem | null>;

/**
 * Summarize the first linked article that yields usable content
 */
async function scrapeAndSummarize(
  channel: string,
  message: RawMessage,
  deps: DispatcherDeps
): Promise<OutputItem | null> {
  const links = extractLinks(message.text);
  const candidates = links.filter(isScrapeableUrl);

  if (candidates.length < links.length) {
    logger.debug(
      { channel, messageId: message.id, skipped: links.length - candidates.length },
      'Skipped non-scrapeable links'
    );
  }

  for (const url of candidates) {
    const article = await deps.articles.fetchArticle(url);
    if (!article) {
      continue;
    }

    const body = await deps.generator.summarizeToKorean(article.text, article.title);
    return { body, timestamp: message.timestamp, link: url, channel };
  }

  logger.info(
    { channel, messageId: message.id, links: links.length },
    'No scrapeable content found, dropping message'
  );
  return null;
}

async function translateMessage(
  channel: string,
  message: RawMessage,
  deps: DispatcherDeps
): Promise<OutputItem | null> {
  const body = await deps.generator.translateToKorean(message.text);

  if (body === null) {
    logger.info({ channel, messageId: message.id }, 'Translation failed, dropping message');
    return null;
  }

  const link = extractLinks(message.text)[0] ?? message.sourceLink;
  return { body, timestamp: message.timestamp, link, channel };
}

const STRATEGY_HANDLERS: Record<ChannelStrategy, StrategyHandler> = {
  scrape: scrapeAndSummarize,
  translate: translateMessage,
};

export async function processMessage(
  channel: ChannelSpec,
  message: RawMessage,
  deps: DispatcherDeps
): Promise<OutputItem | null> {
  return STRATEGY_HANDLERS[channel.strategy](channel.name, message, deps);
}

export interface ChannelProcessResult {
  items: OutputItem[];
  dropped: number;
}

/**
 * Process the messages of one channel sequentially, in order
 */
export async function processChannel(
  channel: ChannelSpec,
  messages: readonly RawMessage[],
  deps: DispatcherDeps
): Promise<ChannelProcessResult> {
  const result: ChannelProcessResult = { items: [], dropped: 0 };

  for (const [index, message] of messages.entries()) {
    logger.debug(
      { channel: channel.name, messageId: message.id, progress: `${index + 1}/${messages.length}` },
      'Processing message'
    );

    const item = await processMessage(channel, message, deps);
    if (item) {
      result.items.push(item);
    } else {
      result.dropped++;
    }
  }

  logger.info(
    { channel: channel.name, strategy: channel.strategy, emitted: result.items.length, dropped: result.dropped },
    'Channel processed'
  );

  return result;
}
