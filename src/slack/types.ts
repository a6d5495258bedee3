/**
 * Slack Block Kit payload types (the subset the digest uses)
 */

export interface PlainTextObject {
  type: 'plain_text';
  text: string;
  emoji?: boolean;
}

export interface MrkdwnObject {
  type: 'mrkdwn';
  text: string;
}

export interface HeaderBlock {
  type: 'header';
  text: PlainTextObject;
}

export interface DividerBlock {
  type: 'divider';
}

export interface SectionBlock {
  type: 'section';
  text: MrkdwnObject;
}

export interface ContextBlock {
  type: 'context';
  elements: MrkdwnObject[];
}

export type SlackBlock = HeaderBlock | DividerBlock | SectionBlock | ContextBlock;

export interface SlackPayload {
  /** Notification fallback text */
  text: string;
  blocks: SlackBlock[];
}

/**
 * Where digest payloads are posted
 */
export interface DeliveryEndpoint {
  /**
   * @throws DeliveryError when the payload is rejected or cannot be sent
   */
  post(payload: SlackPayload): Promise<void>;
}
