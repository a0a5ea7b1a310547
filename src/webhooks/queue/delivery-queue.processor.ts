/**
 * Runs the delivery worker on jobs pulled from the BullMQ queue.
 * Disabled with WEBHOOK_WORKER_ENABLED=false for API-only processes.
 */

import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { Job, Worker } from 'bullmq';
import { LoggerService } from '../../../shared/logger/logger.service';
import { webhooksConfig, WebhooksConfig } from '../../config/webhooks.config';
import { WebhookDeliveryWorker } from '../webhook-delivery.worker';
import { DELIVERY_QUEUE_NAME } from '../webhook.constants';
import { DeliveryJobData } from './delivery-queue';
import { redisConnectionFromUrl } from './redis-connection';

@Injectable()
export class DeliveryQueueProcessor implements OnModuleInit, OnModuleDestroy {
  private worker: Worker<DeliveryJobData> | null = null;

  constructor(
    private readonly deliveryWorker: WebhookDeliveryWorker,
    @Inject(webhooksConfig.KEY)
    private readonly config: WebhooksConfig,
    @Inject(LoggerService)
    private readonly logger: LoggerService,
  ) {}

  onModuleInit(): void {
    if (!this.config.workerEnabled) {
      this.logger.log('[WEBHOOK_QUEUE] Worker disabled, not consuming deliveries', 'DeliveryQueueProcessor');
      return;
    }

    this.worker = new Worker<DeliveryJobData>(
      DELIVERY_QUEUE_NAME,
      (job: Job<DeliveryJobData>) => this.handle(job),
      {
        connection: redisConnectionFromUrl(this.config.redisUrl),
        concurrency: this.config.workerConcurrency,
      },
    );
    this.worker.on('error', (error: Error) => {
      this.logger.error(`[WEBHOOK_QUEUE] Worker error: ${error.message}`, error.stack, 'DeliveryQueueProcessor');
    });
    this.logger.log(
      `[WEBHOOK_QUEUE] Consuming ${DELIVERY_QUEUE_NAME} with concurrency ${this.config.workerConcurrency}`,
      'DeliveryQueueProcessor',
    );
  }

  async handle(job: Job<DeliveryJobData>): Promise<string> {
    return this.deliveryWorker.process(job.data.deliveryId);
  }

  async onModuleDestroy(): Promise<void> {
    if (this.worker) {
      await this.worker.close();
      this.worker = null;
    }
  }
}
