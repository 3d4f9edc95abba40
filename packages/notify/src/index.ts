/**
 * Public API for @supplier-watch/notify
 */

export { sendWebhookMessage, formatWebhookPayload, truncateMessage } from './webhook/webhook';
export type { WebhookConfig, WebhookPayload, SendResult } from './webhook/types';
