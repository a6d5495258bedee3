/**
 * Generation Backend
 *
 * OpenAI chat completions behind a single prompt-in, text-out call. Works
 * with any OpenAI-compatible endpoint (e.g. Gemini) through `baseUrl`.
 */

import OpenAI from 'openai';
import { GenerationError, errorMessage } from '../utils/errors.js';

export interface GenerateOptions {
  timeoutMs?: number;
}

export interface GenerationBackend {
  /**
   * @throws GenerationError on timeout, transport failure or empty output
   */
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export interface OpenAiBackendOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  timeoutMs?: number;
  temperature?: number;
}

export class OpenAiBackend implements GenerationBackend {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly temperature: number;

  constructor(options: OpenAiBackendOptions) {
    if (!options.apiKey) {
      throw new Error('OPENAI_API_KEY is not configured');
    }

    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.temperature = options.temperature ?? 0.3;
    // One attempt per call: failures are handled by the caller's fallback
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      maxRetries: 0,
    });
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const timeout = options.timeoutMs ?? this.timeoutMs;

    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
          temperature: this.temperature,
        },
        { timeout }
      );
      content = response.choices[0]?.message?.content;
    } catch (error) {
      if (error instanceof OpenAI.APIConnectionTimeoutError) {
        throw new GenerationError(`Generation timed out after ${timeout}ms`, 'timeout');
      }
      throw new GenerationError(`Generation request failed: ${errorMessage(error)}`, 'transport', {
        status: error instanceof OpenAI.APIError ? error.status : undefined,
      });
    }

    if (!content?.trim()) {
      throw new GenerationError('Empty response from generation backend', 'malformed');
    }

    return content;
  }
}
