/**
 * Webhook notification adapter for run reports
 */

import type { WebhookConfig, SendResult, WebhookPayload } from './types';

const DEFAULT_TIMEOUT = 30000;
const DEFAULT_MAX_LENGTH = 2000;
const TRUNCATION_MARKER = '\n…(truncated)';

/**
 * Cut a message to the endpoint's size limit, keeping a visible marker.
 * Cuts between code points so an emoji is never split in half.
 */
export function truncateMessage(content: string, maxLength: number = DEFAULT_MAX_LENGTH): string {
  if (content.length <= maxLength) {
    return content;
  }

  const budget = Math.max(0, maxLength - TRUNCATION_MARKER.length);
  let kept = '';
  for (const codePoint of content) {
    if (kept.length + codePoint.length > budget) break;
    kept += codePoint;
  }
  return kept + TRUNCATION_MARKER;
}

/**
 * Format a text message into webhook payload
 */
export function formatWebhookPayload(content: string, maxLength?: number): WebhookPayload {
  const message = truncateMessage(content, maxLength);
  return { content: message, text: message };
}

/**
 * Sends one text message to a webhook.
 *
 * Tried once: a failed delivery is reported in the result, never thrown and
 * never retried.
 *
 * @param config - Webhook configuration (URL, headers, timeout)
 * @param content - Message text, markdown allowed
 */
export async function sendWebhookMessage(
  config: WebhookConfig,
  content: string,
): Promise<SendResult> {
  const timeout = config.timeout ?? DEFAULT_TIMEOUT;
  const body = JSON.stringify(formatWebhookPayload(content, config.maxLength));

  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    'User-Agent': 'SupplierWatch/1.0',
    ...config.headers,
  };

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch(config.url, {
      method: 'POST',
      headers,
      body,
      signal: controller.signal,
    });

    // Check for success (2xx status codes)
    if (response.ok) {
      return {
        success: true,
        messageId: `webhook-${Date.now()}-${response.status}`,
      };
    }

    const errorText = await response.text().catch(() => 'No response body');
    return {
      success: false,
      error: `Webhook returned ${response.status}: ${errorText}`,
    };
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      return { success: false, error: `Request timeout after ${timeout}ms` };
    }
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
    };
  } finally {
    clearTimeout(timeoutId);
  }
}
