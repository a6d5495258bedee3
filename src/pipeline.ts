/**
 * Main Pipeline
 *
 * Orchestrates the daily digest:
 * 1. Select yesterday's window in the target timezone
 * 2. Fetch each channel's messages inside the window
 * 3. Scrape + summarize or translate each message, per channel strategy
 * 4. Deliver the collected items to Slack (always, even when empty)
 */

import { fetchWindowMessages } from './telegram/fetcher.js';
import { processChannel, type DispatcherDeps } from './dispatcher/index.js';
import { deliverItems } from './slack/index.js';
import { selectWindow, formatDateLabel } from './window/index.js';
import { logger } from './utils/logger.js';
import type { ChannelSource } from './telegram/types.js';
import type { DeliveryEndpoint } from './slack/types.js';
import type { ChannelSpec, OutputItem, PipelineResult } from './types/index.js';

/**
 * Pipeline options
 */
export interface PipelineOptions {
  channels: readonly ChannelSpec[];
  timeZone: string;
  pageLimit?: number;
  /** Day to digest relative to today */
  dayOffset?: number;
  now?: Date;
}

export interface PipelineDeps extends DispatcherDeps {
  source: ChannelSource;
  endpoint: DeliveryEndpoint;
}

/**
 * Run the full pipeline
 */
export async function runPipeline(
  options: PipelineOptions,
  deps: PipelineDeps
): Promise<PipelineResult> {
  const { channels, timeZone, pageLimit, dayOffset = -1, now = new Date() } = options;

  const startTime = Date.now();
  const result: PipelineResult = {
    channels: channels.length,
    fetched: 0,
    emitted: 0,
    dropped: 0,
    chunksDelivered: 0,
    chunksFailed: 0,
    durationMs: 0,
  };

  const window = selectWindow(now, timeZone, dayOffset);
  const dateLabel = formatDateLabel(window);

  logger.info(
    {
      date: window.date,
      timeZone,
      start: window.start.toISOString(),
      end: window.end.toISOString(),
      channels: channels.map((c) => `${c.name}:${c.strategy}`),
    },
    'Starting pipeline'
  );

  const items: OutputItem[] = [];

  for (const channel of channels) {
    const messages = await fetchWindowMessages(deps.source, channel.name, window, { pageLimit });
    result.fetched += messages.length;

    if (messages.length === 0) {
      logger.info({ channel: channel.name }, 'No messages in window');
      continue;
    }

    const channelResult = await processChannel(channel, messages, deps);
    items.push(...channelResult.items);
    result.dropped += channelResult.dropped;
  }

  result.emitted = items.length;

  const delivery = await deliverItems(items, deps.endpoint, {
    dateLabel,
    channelName: channels.length === 1 ? channels[0]?.name : undefined,
    timeZone,
  });
  result.chunksDelivered = delivery.delivered;
  result.chunksFailed = delivery.failed;
  result.durationMs = Date.now() - startTime;

  logger.info({ result }, 'Pipeline complete');

  return result;
}
