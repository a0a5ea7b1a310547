/**
 * Webhook Delivery Worker
 * Processes one dequeued delivery: claim, sign, POST once, record the outcome,
 * then either schedule the next attempt or finish the delivery.
 *
 *   pending ──claim──▶ in_progress ──2xx──▶ success
 *   retrying ─claim──▶ in_progress ──err──▶ retrying (attempts left) | failed
 */

import { Inject, Injectable } from '@nestjs/common';
import { LoggerService } from '../../shared/logger/logger.service';
import { WebhookDelivery } from './entities/webhook-delivery.entity';
import { WebhookEndpoint } from './entities/webhook-endpoint.entity';
import { DeliveryQueue } from './queue/delivery-queue';
import { AttemptResponse, DeliveryClaim, WebhookDeliveryStore } from './webhook-delivery.store';
import { WebhookEndpointService } from './webhook-endpoint.service';
import { describeDeliveryError, isSuccessStatus, WebhookSenderService } from './webhook-sender.service';
import { ERROR_BODY_EXCERPT, RESPONSE_BODY_LIMIT, retryDelaySeconds } from './webhook.constants';

export type DeliveryOutcome = 'success' | 'retrying' | 'failed' | 'skipped' | 'missing' | 'error';

export const ENDPOINT_DISABLED_MESSAGE = 'Endpoint is disabled';
export const MAX_ATTEMPTS_MESSAGE = 'Maximum attempts reached';

@Injectable()
export class WebhookDeliveryWorker {
  constructor(
    private readonly deliveryStore: WebhookDeliveryStore,
    private readonly endpointService: WebhookEndpointService,
    private readonly sender: WebhookSenderService,
    private readonly queue: DeliveryQueue,
    @Inject(LoggerService)
    private readonly logger: LoggerService,
  ) {}

  /**
   * Never rejects: anything unexpected is logged and reported as 'error', so
   * the queue never redelivers on its own.
   */
  async process(deliveryId: string): Promise<DeliveryOutcome> {
    try {
      return await this.processDelivery(deliveryId);
    } catch (error: unknown) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      const errorStack = error instanceof Error ? error.stack : undefined;
      this.logger.error(`[WEBHOOK_DELIVERY] ❌ Delivery ${deliveryId} crashed: ${errorMessage}`, errorStack, 'WebhookDeliveryWorker');
      return 'error';
    }
  }

  private async processDelivery(deliveryId: string): Promise<DeliveryOutcome> {
    const delivery = await this.deliveryStore.findById(deliveryId);
    if (!delivery) {
      this.logger.error(`[WEBHOOK_DELIVERY] Delivery ${deliveryId} not found`, undefined, 'WebhookDeliveryWorker');
      return 'missing';
    }

    if (delivery.status === 'success') {
      this.logger.log(`[WEBHOOK_DELIVERY] Delivery ${deliveryId} already delivered, skipping`, 'WebhookDeliveryWorker');
      return 'skipped';
    }
    if (delivery.status !== 'pending' && delivery.status !== 'retrying') {
      this.logger.log(`[WEBHOOK_DELIVERY] Delivery ${deliveryId} is ${delivery.status}, skipping`, 'WebhookDeliveryWorker');
      return 'skipped';
    }

    const now = new Date();
    if (delivery.status === 'retrying' && delivery.nextRetryAt && delivery.nextRetryAt > now) {
      this.logger.log(
        `[WEBHOOK_DELIVERY] Delivery ${deliveryId} not due until ${delivery.nextRetryAt.toISOString()}, skipping`,
        'WebhookDeliveryWorker',
      );
      return 'skipped';
    }

    const endpoint = await this.endpointService.findById(delivery.endpointId);
    if (!endpoint || !endpoint.isActive) {
      await this.deliveryStore.failUnclaimed(delivery.id, ENDPOINT_DISABLED_MESSAGE);
      this.logger.log(`[WEBHOOK_DELIVERY] Delivery ${deliveryId} skipped - endpoint disabled`, 'WebhookDeliveryWorker');
      return 'failed';
    }

    if (delivery.attemptCount >= delivery.maxAttempts) {
      if (await this.deliveryStore.failUnclaimed(delivery.id, MAX_ATTEMPTS_MESSAGE)) {
        await this.endpointService.recordFailure(delivery.endpointId);
        this.logger.error(
          `[WEBHOOK_DELIVERY] ❌ Delivery ${deliveryId} permanently failed: ${MAX_ATTEMPTS_MESSAGE}`,
          undefined,
          'WebhookDeliveryWorker',
        );
      }
      return 'failed';
    }

    const claim = await this.deliveryStore.claim(delivery, now);
    if (!claim) {
      this.logger.log(`[WEBHOOK_DELIVERY] Delivery ${deliveryId} claimed by another worker or not due, skipping`, 'WebhookDeliveryWorker');
      return 'skipped';
    }

    return this.attempt(delivery, claim, endpoint);
  }

  private async attempt(delivery: WebhookDelivery, claim: DeliveryClaim, endpoint: WebhookEndpoint): Promise<DeliveryOutcome> {
    let response: AttemptResponse;
    try {
      const result = await this.sender.send(endpoint, delivery.id, delivery.payload);
      const responseBody = result.body.slice(0, RESPONSE_BODY_LIMIT);

      if (isSuccessStatus(result.statusCode)) {
        const recorded = await this.deliveryStore.markSucceeded(
          claim,
          { responseStatusCode: result.statusCode, responseBody, errorMessage: '' },
          new Date(),
        );
        if (!recorded) {
          return this.claimLost(delivery.id);
        }
        await this.endpointService.recordSuccess(endpoint.id);
        this.logger.log(
          `[WEBHOOK_DELIVERY] ✅ Delivered ${delivery.id} (${delivery.event}) to ${endpoint.name} - Status: ${result.statusCode}`,
          'WebhookDeliveryWorker',
        );
        return 'success';
      }

      response = {
        responseStatusCode: result.statusCode,
        responseBody,
        errorMessage: `HTTP ${result.statusCode}: ${result.body.slice(0, ERROR_BODY_EXCERPT)}`,
      };
    } catch (error: unknown) {
      response = { responseStatusCode: null, responseBody: '', errorMessage: describeDeliveryError(error) };
    }

    return this.handleFailure(delivery, claim, response);
  }

  private async handleFailure(delivery: WebhookDelivery, claim: DeliveryClaim, response: AttemptResponse): Promise<DeliveryOutcome> {
    const attemptCount = claim.attemptCount;
    if (attemptCount < delivery.maxAttempts) {
      const delaySeconds = retryDelaySeconds(attemptCount);
      const nextRetryAt = new Date(Date.now() + delaySeconds * 1000);
      if (!(await this.deliveryStore.markRetrying(claim, response, nextRetryAt))) {
        return this.claimLost(delivery.id);
      }

      this.logger.warn(
        `[WEBHOOK_DELIVERY] ⚠️ Delivery ${delivery.id} failed (${response.errorMessage}), retry ${attemptCount}/${delivery.maxAttempts} scheduled in ${delaySeconds}s`,
        'WebhookDeliveryWorker',
      );

      try {
        await this.queue.enqueue(delivery.id, delaySeconds * 1000);
      } catch (error: unknown) {
        // The retry sweeper picks the record up once next_retry_at passes.
        const errorMessage = error instanceof Error ? error.message : 'Unknown error';
        this.logger.warn(`[WEBHOOK_DELIVERY] Could not schedule retry for ${delivery.id}: ${errorMessage}`, 'WebhookDeliveryWorker');
      }
      return 'retrying';
    }

    if (!(await this.deliveryStore.markFailed(claim, response))) {
      return this.claimLost(delivery.id);
    }
    await this.endpointService.recordFailure(delivery.endpointId);
    this.logger.error(
      `[WEBHOOK_DELIVERY] ❌ Delivery ${delivery.id} permanently failed after ${attemptCount} attempts: ${response.errorMessage}`,
      undefined,
      'WebhookDeliveryWorker',
    );
    return 'failed';
  }

  /**
   * The retry sweeper released this claim as stale while the request was in
   * flight. Whoever holds the record now owns its outcome and the endpoint
   * counters.
   */
  private claimLost(deliveryId: string): DeliveryOutcome {
    this.logger.warn(
      `[WEBHOOK_DELIVERY] Delivery ${deliveryId} lost its claim before the attempt finished, discarding the result`,
      'WebhookDeliveryWorker',
    );
    return 'skipped';
  }
}
