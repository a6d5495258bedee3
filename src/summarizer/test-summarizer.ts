/**
 * Summarizer Test Script
 *
 * Run with: npx tsx src/summarizer/test-summarizer.ts <article-url>
 *
 * Note: Requires the full .env (OPENAI_API_KEY in particular)
 */

import { loadConfig } from '../config/index.js';
import { fetchArticle } from '../scraper/index.js';
import { logger } from '../utils/logger.js';
import { GenerationClient } from './summarizer.js';
import { OpenAiBackend } from './backend.js';

async function testSummarizer(): Promise<void> {
  const url = process.argv[2];
  if (!url) {
    logger.error('Usage: npx tsx src/summarizer/test-summarizer.ts <article-url>');
    return;
  }

  const config = loadConfig();

  logger.info({ url }, 'Extracting article');
  const article = await fetchArticle(url, config.scraper);

  if (!article) {
    logger.warn({ url }, 'No usable content (fetch failed, too short or paywalled)');
    return;
  }

  logger.info({ title: article.title.slice(0, 60), length: article.length }, 'Article extracted');

  const client = new GenerationClient(
    new OpenAiBackend({
      apiKey: config.openai.apiKey,
      model: config.openai.model,
      baseUrl: config.openai.baseUrl,
      timeoutMs: config.openai.timeoutMs,
    }),
    { delayMs: 0, timeoutMs: config.openai.timeoutMs }
  );

  logger.info('Generating summary...');
  const summary = await client.summarizeToKorean(article.text, article.title);

  logger.info('Summary:');
  logger.info(summary);

  logger.info('=== Summarizer Test Complete ===');
}

testSummarizer().catch((error: unknown) => {
  logger.fatal({ error }, 'Test failed');
  process.exit(1);
});
