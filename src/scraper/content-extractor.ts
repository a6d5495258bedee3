/**
 * Article Content Extractor
 *
 * Fetches a linked page and extracts its main text, rejecting pages that are
 * too short or look paywalled
 */

import { JSDOM } from 'jsdom';
import { logger } from '../utils/logger.js';
import type { ExtractedContent } from '../types/index.js';

export const MIN_CONTENT_LENGTH = 300;
export const MAX_CONTENT_LENGTH = 5000;
export const PAYWALL_LENGTH_THRESHOLD = 1000;

const DEFAULT_TIMEOUT_MS = 10000;
const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

/**
 * Phrases that, on a short page, mean the body is behind a paywall or login
 */
export const PAYWALL_KEYWORDS = [
  'subscribe',
  'subscription',
  'premium',
  'members only',
  'member-only',
  'paywall',
  'sign in to read',
  'log in to continue',
  '유료',
  '구독',
  '회원 전용',
  '로그인 후',
] as const;

const UNWANTED_SELECTORS = ['script', 'style', 'noscript', 'nav', 'header', 'footer', 'aside'];

const CONTENT_SELECTORS = [
  'article',
  '[class*="article-body"]',
  '[class*="article-content"]',
  '[class*="post-content"]',
  '[class*="entry-content"]',
  'main',
  '[role="main"]',
];

// A container must hold more text than this to be preferred over <body>
const MIN_CONTAINER_TEXT = 200;

export interface FetchArticleOptions {
  timeoutMs?: number;
  userAgent?: string;
}

/**
 * Keep non-blank lines, trimmed, joined by single newlines
 */
export function collapseLines(text: string): string {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

export function isPaywalled(text: string): boolean {
  if (text.length >= PAYWALL_LENGTH_THRESHOLD) {
    return false;
  }
  const lower = text.toLowerCase();
  return PAYWALL_KEYWORDS.some((keyword) => lower.includes(keyword));
}

/**
 * Extract the main text of an HTML document
 */
export function extractMainText(document: Document): string {
  for (const selector of UNWANTED_SELECTORS) {
    document.querySelectorAll(selector).forEach((el) => el.remove());
  }

  let contentElement: Element | null = null;
  for (const selector of CONTENT_SELECTORS) {
    const el = document.querySelector(selector);
    if (el?.textContent && el.textContent.trim().length > MIN_CONTAINER_TEXT) {
      contentElement = el;
      break;
    }
  }

  // Fallback to body if no specific container found
  const container = contentElement ?? document.body;
  if (!container) {
    return '';
  }

  const paragraphs: string[] = [];
  container.querySelectorAll('p').forEach((p) => {
    const text = p.textContent?.trim();
    if (text) {
      paragraphs.push(text);
    }
  });

  const raw = paragraphs.length > 0 ? paragraphs.join('\n') : (container.textContent ?? '');
  return collapseLines(raw);
}

/**
 * Fetch a page and extract its article text.
 * Returns null when the page cannot be fetched or fails the quality gates.
 */
export async function fetchArticle(
  url: string,
  options: FetchArticleOptions = {}
): Promise<ExtractedContent | null> {
  const { timeoutMs = DEFAULT_TIMEOUT_MS, userAgent = DEFAULT_USER_AGENT } = options;

  let html: string;
  try {
    logger.debug({ url }, 'Fetching article');

    const response = await fetch(url, {
      headers: {
        'User-Agent': userAgent,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.9,ko;q=0.8',
      },
      redirect: 'follow',
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      logger.warn({ url, status: response.status }, 'Article request failed');
      return null;
    }

    html = await response.text();
  } catch (error) {
    logger.warn({ url, error }, 'Failed to fetch article');
    return null;
  }

  const dom = new JSDOM(html, { url });
  const document = dom.window.document;
  const title = document.title.trim();
  const text = extractMainText(document);
  dom.window.close();

  if (text.length < MIN_CONTENT_LENGTH) {
    logger.info({ url, contentLength: text.length }, 'Article too short, skipping');
    return null;
  }

  if (isPaywalled(text)) {
    logger.info({ url, contentLength: text.length }, 'Article looks paywalled, skipping');
    return null;
  }

  const capped = text.slice(0, MAX_CONTENT_LENGTH);

  logger.debug({ url, contentLength: capped.length }, 'Content extracted');

  return {
    url,
    title,
    text: capped,
    length: capped.length,
  };
}
