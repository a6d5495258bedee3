/**
 * Summarizer Module
 *
 * Korean summarization and translation through a rate-limited generation backend
 */

export {
  GenerationClient,
  toSummaryLines,
  fallbackSummary,
  DEFAULT_GENERATION_DELAY_MS,
  MAX_INPUT_LENGTH,
  type GenerationClientOptions,
  type TextGenerator,
} from './summarizer.js';

export {
  OpenAiBackend,
  type GenerationBackend,
  type GenerateOptions,
  type OpenAiBackendOptions,
} from './backend.js';

export { buildSummaryPrompt, buildTranslationPrompt } from './prompts.js';
