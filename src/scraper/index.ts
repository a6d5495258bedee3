/**
 * Scraper Module
 *
 * Link extraction from channel messages and article text extraction
 */

export { extractLinks, isScrapeableUrl, NON_SCRAPEABLE_DOMAINS } from './links.js';

export {
  fetchArticle,
  extractMainText,
  collapseLines,
  isPaywalled,
  MIN_CONTENT_LENGTH,
  MAX_CONTENT_LENGTH,
  PAYWALL_LENGTH_THRESHOLD,
  PAYWALL_KEYWORDS,
  type FetchArticleOptions,
} from './content-extractor.js';
