/**
 * Scheduler: safety net for deliveries the queue lost track of.
 * Re-enqueues due retries and orphaned pending records, and hands claims
 * abandoned by crashed workers back to the retry path.
 */

import { Inject, Injectable } from '@nestjs/common';
import { Cron } from '@nestjs/schedule';
import { LoggerService } from '../../shared/logger/logger.service';
import { webhooksConfig, WebhooksConfig } from '../config/webhooks.config';
import { WebhookDelivery } from './entities/webhook-delivery.entity';
import { DeliveryQueue } from './queue/delivery-queue';
import { WebhookDeliveryStore } from './webhook-delivery.store';
import { WebhookEndpointService } from './webhook-endpoint.service';

/** Default: every 5 minutes. Override via WEBHOOK_RETRY_SWEEP_CRON in .env. */
const DEFAULT_CRON = '*/5 * * * *';

export const STALE_CLAIM_MESSAGE = 'Delivery attempt did not complete';

@Injectable()
export class WebhookRetryScheduler {
  constructor(
    private readonly deliveryStore: WebhookDeliveryStore,
    private readonly endpointService: WebhookEndpointService,
    private readonly queue: DeliveryQueue,
    @Inject(webhooksConfig.KEY)
    private readonly config: WebhooksConfig,
    @Inject(LoggerService)
    private readonly logger: LoggerService,
  ) {}

  @Cron(process.env.WEBHOOK_RETRY_SWEEP_CRON ?? DEFAULT_CRON)
  async handleSweep(): Promise<void> {
    try {
      const recovered = await this.recoverStaleClaims();
      const requeued = await this.sweepDueRetries();
      if (recovered > 0 || requeued > 0) {
        this.logger.log(`[WEBHOOK_SWEEP] Run finished: requeued=${requeued}, recovered=${recovered}`, 'WebhookRetryScheduler');
      }
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      this.logger.error(`[WEBHOOK_SWEEP] Retry sweep failed: ${msg}`, err instanceof Error ? err.stack : undefined, 'WebhookRetryScheduler');
    }
  }

  /**
   * Re-enqueues `retrying` deliveries whose next_retry_at has passed, then
   * `pending` ones older than the orphan grace period, up to `limit` in total.
   * Safe to repeat: the worker's claim drops duplicates.
   */
  async sweepDueRetries(limit = this.config.retrySweepLimit): Promise<number> {
    const now = new Date();
    const due = await this.deliveryStore.findDueRetries(now, limit);
    const orphanCutoff = new Date(now.getTime() - this.config.orphanGraceMinutes * 60 * 1000);
    const orphaned = due.length < limit ? await this.deliveryStore.findOrphanedPending(orphanCutoff, limit - due.length) : [];

    const count = await this.requeue([...due, ...orphaned]);
    if (count) {
      this.logger.log(`[WEBHOOK_SWEEP] Queued ${count} webhook retries`, 'WebhookRetryScheduler');
    }
    return count;
  }

  async recoverStaleClaims(limit = this.config.retrySweepLimit): Promise<number> {
    const now = new Date();
    const claimedBefore = new Date(now.getTime() - this.config.claimLeaseMinutes * 60 * 1000);
    const stale = await this.deliveryStore.findStaleClaims(claimedBefore, limit);

    let recovered = 0;
    for (const delivery of stale) {
      const status = await this.deliveryStore.releaseStaleClaim(delivery, STALE_CLAIM_MESSAGE, now);
      if (status === 'retrying') {
        recovered += 1;
        await this.requeue([delivery]);
      } else if (status === 'failed') {
        recovered += 1;
        await this.endpointService.recordFailure(delivery.endpointId);
      }
    }

    if (recovered) {
      this.logger.warn(`[WEBHOOK_SWEEP] Released ${recovered} stale delivery claims`, 'WebhookRetryScheduler');
    }
    return recovered;
  }

  private async requeue(deliveries: WebhookDelivery[]): Promise<number> {
    let count = 0;
    for (const delivery of deliveries) {
      try {
        await this.queue.enqueue(delivery.id);
        count += 1;
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        this.logger.warn(`[WEBHOOK_SWEEP] Failed to enqueue ${delivery.id}: ${msg}`, 'WebhookRetryScheduler');
      }
    }
    return count;
  }
}
