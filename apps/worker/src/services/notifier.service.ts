import { Injectable, Logger } from '@nestjs/common';
import { sendWebhookMessage } from '@supplier-watch/notify';
import { WorkerConfigService } from '../config/config.service';

/**
 * Delivers the run report. Delivery problems are logged and never fail
 * the run.
 */
@Injectable()
export class NotifierService {
  private readonly logger = new Logger(NotifierService.name);

  constructor(private readonly config: WorkerConfigService) {}

  async send(content: string): Promise<void> {
    const url = this.config.webhookUrl;

    if (!url) {
      this.logger.warn(`WEBHOOK_URL is not set. Message:\n${content}`);
      return;
    }

    const result = await sendWebhookMessage({ url }, content);

    if (result.success) {
      this.logger.log('Notification sent');
    } else {
      this.logger.error(`Failed to send notification: ${result.error}`);
    }
  }
}
