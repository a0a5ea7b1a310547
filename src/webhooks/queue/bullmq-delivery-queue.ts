/**
 * BullMQ-backed delivery queue.
 */

import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { Queue } from 'bullmq';
import { webhooksConfig, WebhooksConfig } from '../../config/webhooks.config';
import { DELIVERY_QUEUE_NAME } from '../webhook.constants';
import { DeliveryJobData, DeliveryQueue } from './delivery-queue';
import { redisConnectionFromUrl } from './redis-connection';

export const DELIVER_JOB_NAME = 'deliver';

@Injectable()
export class BullMqDeliveryQueue extends DeliveryQueue implements OnModuleDestroy {
  private readonly queue: Queue<DeliveryJobData>;

  constructor(@Inject(webhooksConfig.KEY) config: WebhooksConfig) {
    super();
    this.queue = new Queue<DeliveryJobData>(DELIVERY_QUEUE_NAME, {
      connection: redisConnectionFromUrl(config.redisUrl),
    });
  }

  async enqueue(deliveryId: string, delayMs = 0): Promise<void> {
    // One queue-level attempt: retries are scheduled by the worker's own policy.
    await this.queue.add(
      DELIVER_JOB_NAME,
      { deliveryId },
      {
        delay: delayMs > 0 ? delayMs : undefined,
        attempts: 1,
        removeOnComplete: true,
        removeOnFail: 1000,
      },
    );
  }

  async onModuleDestroy(): Promise<void> {
    await this.queue.close();
  }
}
