/**
 * Generation Client
 *
 * Summarizes articles into three Korean lines and translates messages into
 * Korean. Every backend call is followed by a fixed delay to stay under the
 * backend's rate limit (4.5s ≈ 13 calls/minute, limit 15).
 */

import { logger } from '../utils/logger.js';
import { RateLimiter, sleep, type SleepFn } from '../utils/rate-limiter.js';
import { buildSummaryPrompt, buildTranslationPrompt } from './prompts.js';
import type { GenerationBackend } from './backend.js';

export const DEFAULT_GENERATION_DELAY_MS = 4500;
export const MAX_INPUT_LENGTH = 3000;
export const SUMMARY_LINES = 3;
export const FALLBACK_LENGTH = 200;

export interface GenerationClientOptions {
  delayMs?: number;
  timeoutMs?: number;
  sleep?: SleepFn;
}

/**
 * Non-blank trimmed lines of the generated text, at most `SUMMARY_LINES`
 */
export function toSummaryLines(raw: string): string[] {
  return raw
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .slice(0, SUMMARY_LINES);
}

/**
 * Degraded summary: the beginning of the original text
 */
export function fallbackSummary(text: string): string {
  return text.length > FALLBACK_LENGTH ? `${text.slice(0, FALLBACK_LENGTH)}...` : text;
}

export class GenerationClient {
  private readonly limiter: RateLimiter;
  private readonly timeoutMs: number | undefined;

  constructor(
    private readonly backend: GenerationBackend,
    options: GenerationClientOptions = {}
  ) {
    this.limiter = new RateLimiter(options.delayMs ?? DEFAULT_GENERATION_DELAY_MS, options.sleep ?? sleep);
    this.timeoutMs = options.timeoutMs;

    logger.debug({ requestsPerMinute: this.limiter.requestsPerMinute }, 'Generation client ready');
  }

  private generate(prompt: string): Promise<string> {
    return this.limiter.execute(() => this.backend.generate(prompt, { timeoutMs: this.timeoutMs }));
  }

  /**
   * Three-line Korean summary. Never throws: on failure the first 200
   * characters of the input are returned instead.
   */
  async summarizeToKorean(text: string, titleHint?: string): Promise<string> {
    const prompt = buildSummaryPrompt(text.slice(0, MAX_INPUT_LENGTH), titleHint);

    try {
      const lines = toSummaryLines(await this.generate(prompt));
      if (lines.length === 0) {
        throw new Error('Summary has no content');
      }

      logger.debug({ lines: lines.length, inputLength: text.length }, 'Summary generated');
      return lines.join('\n');
    } catch (error) {
      logger.warn({ error }, 'Summarization failed, using fallback');
      return fallbackSummary(text);
    }
  }

  /**
   * Korean translation, or null when the backend fails
   */
  async translateToKorean(text: string): Promise<string | null> {
    const prompt = buildTranslationPrompt(text.slice(0, MAX_INPUT_LENGTH));

    try {
      const translated = (await this.generate(prompt)).trim();
      if (!translated) {
        logger.warn('Translation is empty');
        return null;
      }

      logger.debug({ inputLength: text.length, outputLength: translated.length }, 'Message translated');
      return translated;
    } catch (error) {
      logger.warn({ error }, 'Translation failed');
      return null;
    }
  }
}

/**
 * Operations the strategy dispatcher needs from the generation client
 */
export type TextGenerator = Pick<GenerationClient, 'summarizeToKorean' | 'translateToKorean'>;
