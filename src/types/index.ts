/**
 * Core types for Telegram Daily Digest
 */

/**
 * How messages of a channel are turned into digest items
 * - scrape: follow the links in the message and summarize the article
 * - translate: translate the message itself
 */
export type ChannelStrategy = 'scrape' | 'translate';

export interface ChannelSpec {
  readonly name: string;
  readonly strategy: ChannelStrategy;
}

/**
 * Message as returned by a channel source, before window filtering
 */
export interface SourceMessage {
  id: number;
  text: string;
  date: Date;
}

export interface RawMessage {
  readonly id: number;
  readonly text: string;
  readonly timestamp: Date;
  readonly sourceLink: string;
}

/**
 * Inclusive time range of the target calendar day
 */
export interface TimeWindow {
  readonly start: Date;
  readonly end: Date;
  /** Calendar date in the target timezone (YYYY-MM-DD) */
  readonly date: string;
  readonly timeZone: string;
}

export interface ExtractedContent {
  url: string;
  title: string;
  text: string;
  length: number;
}

export interface OutputItem {
  readonly body: string;
  readonly timestamp: Date;
  readonly link: string;
  readonly channel: string;
}

export interface DeliveryChunk {
  items: OutputItem[];
  /** 1-based */
  chunkIndex: number;
  totalChunks: number;
  /** Position of the first item in the full sequence */
  offset: number;
}

export interface DeliveryResult {
  chunks: number;
  delivered: number;
  failed: number;
}

export interface PipelineResult {
  channels: number;
  fetched: number;
  emitted: number;
  dropped: number;
  chunksDelivered: number;
  chunksFailed: number;
  durationMs: number;
}
