/**
 * Slack Incoming Webhook client
 */

import { logger } from '../utils/logger.js';
import { DeliveryError, errorMessage } from '../utils/errors.js';
import type { DeliveryEndpoint, SlackPayload } from './types.js';

const DEFAULT_TIMEOUT_MS = 10000;

export interface SlackWebhookOptions {
  webhookUrl: string;
  timeoutMs?: number;
}

export class SlackWebhookClient implements DeliveryEndpoint {
  private readonly webhookUrl: string;
  private readonly timeoutMs: number;

  constructor(options: SlackWebhookOptions) {
    if (!options.webhookUrl) {
      throw new Error('SLACK_WEBHOOK_URL is not configured');
    }
    this.webhookUrl = options.webhookUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async post(payload: SlackPayload): Promise<void> {
    const startedAt = Date.now();

    let response: Response;
    try {
      response = await fetch(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new DeliveryError(`Slack webhook request failed: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new DeliveryError(`Slack webhook returned ${response.status}`, response.status, {
        body: body.slice(0, 300),
      });
    }

    logger.debug({ durationMs: Date.now() - startedAt }, 'Slack webhook accepted payload');
  }
}

/**
 * Endpoint that logs payloads instead of posting them (--dry-run)
 */
export class LoggingEndpoint implements DeliveryEndpoint {
  readonly payloads: SlackPayload[] = [];

  async post(payload: SlackPayload): Promise<void> {
    this.payloads.push(payload);
    logger.info({ blocks: payload.blocks.length, payload }, `[dry-run] ${payload.text}`);
  }
}
