import { Injectable } from '@nestjs/common';
import { ConfigService as NestConfigService } from '@nestjs/config';
import type { Credentials } from '@supplier-watch/shared';
import type { EnvConfig } from './env.validation';

/**
 * Configuration service for worker app
 * Centralizes environment variable access; values are validated at startup
 */
@Injectable()
export class WorkerConfigService {
  constructor(private configService: NestConfigService<EnvConfig, true>) {}

  /**
   * Supplier login credentials
   */
  get credentials(): Credentials {
    return {
      username: this.configService.get('SUPPLIER_USERNAME', { infer: true }),
      password: this.configService.get('SUPPLIER_PASSWORD', { infer: true }),
    };
  }

  /**
   * Webhook receiving the run report, undefined to only log it
   */
  get webhookUrl(): string | undefined {
    return this.configService.get('WEBHOOK_URL', { infer: true }) || undefined;
  }

  /**
   * Supplier configuration file (login form and products)
   */
  get configPath(): string {
    return this.configService.get('CONFIG_PATH', { infer: true });
  }

  /**
   * Snapshot state file
   */
  get statePath(): string {
    return this.configService.get('STATE_PATH', { infer: true });
  }

  /**
   * Pause between two product fetches
   */
  get requestDelayMs(): number {
    return this.configService.get('REQUEST_DELAY_MS', { infer: true });
  }

  get requestTimeoutMs(): number {
    return this.configService.get('REQUEST_TIMEOUT_MS', { infer: true });
  }

  get userAgent(): string | undefined {
    return this.configService.get('USER_AGENT', { infer: true });
  }
}
