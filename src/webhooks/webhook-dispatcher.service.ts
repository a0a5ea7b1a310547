/**
 * Webhook Dispatcher Service
 * Fans a domain event out to the owner's subscribed endpoints: one pending
 * delivery record per endpoint, then one queued task per record.
 */

import { Inject, Injectable } from '@nestjs/common';
import { LoggerService } from '../../shared/logger/logger.service';
import { WebhookPayload } from './entities/webhook-delivery.entity';
import { WebhookEndpoint } from './entities/webhook-endpoint.entity';
import { DeliveryQueue } from './queue/delivery-queue';
import { WebhookDeliveryStore } from './webhook-delivery.store';
import { WebhookEndpointService } from './webhook-endpoint.service';
import { WebhookEventName } from './webhook-events';

@Injectable()
export class WebhookDispatcherService {
  constructor(
    private readonly endpointService: WebhookEndpointService,
    private readonly deliveryStore: WebhookDeliveryStore,
    private readonly queue: DeliveryQueue,
    @Inject(LoggerService)
    private readonly logger: LoggerService,
  ) {}

  /**
   * Never rejects and never waits on the network: the caller is a business
   * operation that must not fail because a webhook could not be queued.
   *
   * @returns ids of the delivery records created
   */
  async dispatch(event: WebhookEventName, data: Record<string, unknown>, ownerId: string): Promise<string[]> {
    let endpoints: WebhookEndpoint[];
    try {
      endpoints = await this.endpointService.listActiveSubscribers(event, ownerId);
    } catch (error: unknown) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      const errorStack = error instanceof Error ? error.stack : undefined;
      this.logger.error(`[WEBHOOK_DISPATCH] ❌ Endpoint lookup failed for ${event}: ${errorMessage}`, errorStack, 'WebhookDispatcherService');
      return [];
    }

    if (endpoints.length === 0) {
      this.logger.debug(`[WEBHOOK_DISPATCH] No endpoints subscribed to ${event} for owner ${ownerId}`, 'WebhookDispatcherService');
      return [];
    }

    const deliveryIds: string[] = [];
    for (const endpoint of endpoints) {
      const deliveryId = await this.dispatchToEndpoint(endpoint, event, data);
      if (deliveryId) {
        deliveryIds.push(deliveryId);
      }
    }
    return deliveryIds;
  }

  private async dispatchToEndpoint(
    endpoint: WebhookEndpoint,
    event: WebhookEventName,
    data: Record<string, unknown>,
  ): Promise<string | null> {
    const payload: WebhookPayload = {
      event,
      timestamp: new Date().toISOString(),
      data,
    };

    let deliveryId: string;
    try {
      const delivery = await this.deliveryStore.createPending(endpoint, payload);
      deliveryId = delivery.id;
    } catch (error: unknown) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      const errorStack = error instanceof Error ? error.stack : undefined;
      this.logger.error(
        `[WEBHOOK_DISPATCH] ❌ Could not record ${event} delivery for ${endpoint.name}: ${errorMessage}`,
        errorStack,
        'WebhookDispatcherService',
      );
      return null;
    }

    try {
      await this.queue.enqueue(deliveryId);
      this.logger.log(`[WEBHOOK_DISPATCH] Queued webhook delivery ${deliveryId} for ${event} to ${endpoint.name}`, 'WebhookDispatcherService');
    } catch (error: unknown) {
      // The record is durable; the retry sweeper enqueues orphaned pending deliveries.
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(`[WEBHOOK_DISPATCH] ⚠️ Could not enqueue delivery ${deliveryId}: ${errorMessage}`, 'WebhookDispatcherService');
    }
    return deliveryId;
  }
}
