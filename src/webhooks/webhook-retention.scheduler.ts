/**
 * Scheduler: deletes old delivery records once they are terminal.
 * Pending, retrying and in-progress records are kept regardless of age.
 */

import { Inject, Injectable } from '@nestjs/common';
import { Cron } from '@nestjs/schedule';
import { LoggerService } from '../../shared/logger/logger.service';
import { webhooksConfig, WebhooksConfig } from '../config/webhooks.config';
import { WebhookDeliveryStore } from './webhook-delivery.store';

/** Default: daily at 03:00. Override via WEBHOOK_RETENTION_CRON in .env. */
const DEFAULT_CRON = '0 3 * * *';

const DAY_MS = 24 * 60 * 60 * 1000;

@Injectable()
export class WebhookRetentionScheduler {
  constructor(
    private readonly deliveryStore: WebhookDeliveryStore,
    @Inject(webhooksConfig.KEY)
    private readonly config: WebhooksConfig,
    @Inject(LoggerService)
    private readonly logger: LoggerService,
  ) {}

  @Cron(process.env.WEBHOOK_RETENTION_CRON ?? DEFAULT_CRON)
  async handleCleanup(): Promise<void> {
    try {
      await this.cleanup();
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      this.logger.error(`[WEBHOOK_SWEEP] Cleanup failed: ${msg}`, err instanceof Error ? err.stack : undefined, 'WebhookRetentionScheduler');
    }
  }

  async cleanup(olderThanDays = this.config.retentionDays): Promise<number> {
    const cutoff = new Date(Date.now() - olderThanDays * DAY_MS);
    const deleted = await this.deliveryStore.deleteTerminalBefore(cutoff);
    this.logger.log(`[WEBHOOK_SWEEP] Cleaned up ${deleted} old webhook deliveries`, 'WebhookRetentionScheduler');
    return deleted;
  }
}
