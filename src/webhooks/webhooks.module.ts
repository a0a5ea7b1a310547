/**
 * Webhooks Module
 * Endpoint registry, dispatch pipeline, delivery worker, sweepers and the management API.
 */

import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthModule } from '../auth/auth.module';
import { webhooksConfig } from '../config/webhooks.config';
import { WebhookDelivery } from './entities/webhook-delivery.entity';
import { WebhookEndpoint } from './entities/webhook-endpoint.entity';
import { BullMqDeliveryQueue } from './queue/bullmq-delivery-queue';
import { DeliveryQueue } from './queue/delivery-queue';
import { DeliveryQueueProcessor } from './queue/delivery-queue.processor';
import { WebhookDeliveryController } from './webhook-delivery.controller';
import { WebhookDeliveryStore } from './webhook-delivery.store';
import { WebhookDeliveryWorker } from './webhook-delivery.worker';
import { WebhookDispatcherService } from './webhook-dispatcher.service';
import { WebhookEndpointController } from './webhook-endpoint.controller';
import { WebhookEndpointService } from './webhook-endpoint.service';
import { WebhookEventPublisher } from './webhook-event.publisher';
import { WebhookRetentionScheduler } from './webhook-retention.scheduler';
import { WebhookRetryScheduler } from './webhook-retry.scheduler';
import { WebhookSenderService } from './webhook-sender.service';
import { DELIVERY_TIMEOUT_MS } from './webhook.constants';

@Module({
  imports: [
    TypeOrmModule.forFeature([WebhookEndpoint, WebhookDelivery]),
    HttpModule.register({ timeout: DELIVERY_TIMEOUT_MS, maxRedirects: 0 }),
    ConfigModule.forFeature(webhooksConfig),
    AuthModule,
  ],
  controllers: [WebhookEndpointController, WebhookDeliveryController],
  providers: [
    WebhookEndpointService,
    WebhookDeliveryStore,
    WebhookSenderService,
    WebhookDispatcherService,
    WebhookDeliveryWorker,
    WebhookEventPublisher,
    WebhookRetryScheduler,
    WebhookRetentionScheduler,
    DeliveryQueueProcessor,
    { provide: DeliveryQueue, useClass: BullMqDeliveryQueue },
  ],
  exports: [WebhookEventPublisher, WebhookDispatcherService],
})
export class WebhooksModule {}
