/**
 * Webhook notification types
 */

export interface SendResult {
  success: boolean;
  messageId?: string;
  error?: string;
}

export interface WebhookConfig {
  /** Webhook URL to POST to */
  url: string;
  /** Custom headers to send */
  headers?: Record<string, string>;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Longest message the endpoint accepts (default: 2000, Discord's limit) */
  maxLength?: number;
}

/**
 * Body of the POST. Discord reads `content`; Slack-compatible endpoints
 * read `text`, so both carry the message.
 */
export interface WebhookPayload {
  content: string;
  text: string;
}
