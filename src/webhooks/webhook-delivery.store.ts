/**
 * Webhook Delivery Store
 * Durable log of delivery attempts. Every state change after creation is a
 * conditional UPDATE, so concurrent workers and sweepers cannot overwrite
 * each other's transitions.
 */

import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, In, LessThan, LessThanOrEqual, MoreThanOrEqual, Repository } from 'typeorm';
import {
  CLAIMABLE_DELIVERY_STATUSES,
  TERMINAL_DELIVERY_STATUSES,
  WebhookDelivery,
  WebhookDeliveryStatus,
  WebhookPayload,
} from './entities/webhook-delivery.entity';
import { WebhookEndpoint } from './entities/webhook-endpoint.entity';
import { DEFAULT_MAX_ATTEMPTS } from './webhook.constants';
import { WebhookEventName } from './webhook-events';

export interface AttemptResponse {
  responseStatusCode: number | null;
  responseBody: string;
  errorMessage: string;
}

export interface DeliveryListFilter {
  endpointIds: string[];
  status?: WebhookDeliveryStatus;
  event?: WebhookEventName;
  limit: number;
  offset: number;
}

/**
 * Identifies one claimed attempt. Finishing an attempt only applies while the
 * row still carries this claim.
 */
export interface DeliveryClaim {
  id: string;
  attemptCount: number;
  claimedAt: Date;
}

export interface DeliveryStats {
  total: number;
  successful: number;
  failed: number;
}

@Injectable()
export class WebhookDeliveryStore {
  constructor(
    @InjectRepository(WebhookDelivery)
    private deliveryRepository: Repository<WebhookDelivery>,
  ) {}

  async createPending(endpoint: WebhookEndpoint, payload: WebhookPayload): Promise<WebhookDelivery> {
    const delivery = this.deliveryRepository.create({
      endpointId: endpoint.id,
      event: payload.event,
      payload,
      status: 'pending',
      attemptCount: 0,
      maxAttempts: DEFAULT_MAX_ATTEMPTS,
      responseStatusCode: null,
      responseBody: '',
      errorMessage: '',
      deliveredAt: null,
      nextRetryAt: null,
      claimedAt: null,
    });
    return this.deliveryRepository.save(delivery);
  }

  async findById(id: string): Promise<WebhookDelivery | null> {
    return this.deliveryRepository.findOne({ where: { id } });
  }

  /**
   * Compare-and-swap into `in_progress`, counting the attempt. Only succeeds
   * while the record still has the status and attempt count the caller saw,
   * and a `retrying` record only once its next_retry_at has passed, so exactly
   * one of several racing workers wins and duplicate jobs cannot skip the
   * retry delay.
   */
  async claim(delivery: WebhookDelivery, now: Date = new Date()): Promise<DeliveryClaim | null> {
    if (delivery.status !== 'pending' && delivery.status !== 'retrying') {
      return null;
    }
    const where: FindOptionsWhere<WebhookDelivery> = {
      id: delivery.id,
      status: delivery.status,
      attemptCount: delivery.attemptCount,
    };
    if (delivery.status === 'retrying') {
      where.nextRetryAt = LessThanOrEqual(now);
    }

    const claim: DeliveryClaim = { id: delivery.id, attemptCount: delivery.attemptCount + 1, claimedAt: now };
    const result = await this.deliveryRepository.update(where, {
      status: 'in_progress',
      attemptCount: claim.attemptCount,
      claimedAt: claim.claimedAt,
      nextRetryAt: null,
    });
    return result.affected === 1 ? claim : null;
  }

  /**
   * Terminal failure without an attempt (disabled endpoint, exhausted record).
   */
  async failUnclaimed(id: string, errorMessage: string): Promise<boolean> {
    const result = await this.deliveryRepository.update(
      { id, status: In([...CLAIMABLE_DELIVERY_STATUSES]) },
      { status: 'failed', errorMessage, nextRetryAt: null, claimedAt: null },
    );
    return result.affected === 1;
  }

  async markSucceeded(claim: DeliveryClaim, response: AttemptResponse, deliveredAt: Date): Promise<boolean> {
    return this.finishAttempt(claim, {
      status: 'success',
      deliveredAt,
      ...response,
    });
  }

  async markRetrying(claim: DeliveryClaim, response: AttemptResponse, nextRetryAt: Date): Promise<boolean> {
    return this.finishAttempt(claim, {
      status: 'retrying',
      nextRetryAt,
      ...response,
    });
  }

  async markFailed(claim: DeliveryClaim, response: AttemptResponse): Promise<boolean> {
    return this.finishAttempt(claim, {
      status: 'failed',
      ...response,
    });
  }

  /**
   * False when the claim was released (or released and re-claimed) while the
   * attempt was running; the row is left untouched.
   */
  private async finishAttempt(
    claim: DeliveryClaim,
    changes: AttemptResponse & { status: WebhookDeliveryStatus; deliveredAt?: Date; nextRetryAt?: Date },
  ): Promise<boolean> {
    const result = await this.deliveryRepository.update(
      { id: claim.id, status: 'in_progress', attemptCount: claim.attemptCount, claimedAt: claim.claimedAt },
      {
        status: changes.status,
        responseStatusCode: changes.responseStatusCode,
        responseBody: changes.responseBody,
        errorMessage: changes.errorMessage,
        deliveredAt: changes.deliveredAt ?? null,
        nextRetryAt: changes.nextRetryAt ?? null,
        claimedAt: null,
      },
    );
    return result.affected === 1;
  }

  async findDueRetries(now: Date, limit: number): Promise<WebhookDelivery[]> {
    return this.deliveryRepository.find({
      where: { status: 'retrying', nextRetryAt: LessThanOrEqual(now) },
      order: { nextRetryAt: 'ASC' },
      take: limit,
    });
  }

  /**
   * Pending records created before `createdBefore` never reached a worker.
   */
  async findOrphanedPending(createdBefore: Date, limit: number): Promise<WebhookDelivery[]> {
    return this.deliveryRepository.find({
      where: { status: 'pending', createdAt: LessThan(createdBefore) },
      order: { createdAt: 'ASC' },
      take: limit,
    });
  }

  async findStaleClaims(claimedBefore: Date, limit: number): Promise<WebhookDelivery[]> {
    return this.deliveryRepository.find({
      where: { status: 'in_progress', claimedAt: LessThan(claimedBefore) },
      order: { claimedAt: 'ASC' },
      take: limit,
    });
  }

  /**
   * Hands a claim abandoned by a crashed worker back to the retry path.
   * Conditional on the claim timestamp, so a worker that finished first wins
   * and a worker that finishes later finds its claim gone.
   */
  async releaseStaleClaim(delivery: WebhookDelivery, errorMessage: string, now: Date): Promise<WebhookDeliveryStatus | null> {
    if (!delivery.claimedAt) {
      return null;
    }
    const status: WebhookDeliveryStatus = delivery.attemptCount < delivery.maxAttempts ? 'retrying' : 'failed';
    const result = await this.deliveryRepository.update(
      { id: delivery.id, status: 'in_progress', claimedAt: delivery.claimedAt },
      {
        status,
        errorMessage,
        nextRetryAt: status === 'retrying' ? now : null,
        claimedAt: null,
      },
    );
    return result.affected === 1 ? status : null;
  }

  /**
   * Manual re-trigger of a permanently failed delivery.
   */
  async resetForRetry(id: string): Promise<boolean> {
    const result = await this.deliveryRepository.update(
      { id, status: 'failed' },
      {
        status: 'pending',
        attemptCount: 0,
        errorMessage: '',
        responseStatusCode: null,
        responseBody: '',
        nextRetryAt: null,
        claimedAt: null,
      },
    );
    return result.affected === 1;
  }

  async deleteTerminalBefore(cutoff: Date): Promise<number> {
    const result = await this.deliveryRepository.delete({
      status: In([...TERMINAL_DELIVERY_STATUSES]),
      createdAt: LessThan(cutoff),
    });
    return result.affected ?? 0;
  }

  async list(filter: DeliveryListFilter): Promise<WebhookDelivery[]> {
    if (filter.endpointIds.length === 0) {
      return [];
    }
    const where: FindOptionsWhere<WebhookDelivery> = { endpointId: In(filter.endpointIds) };
    if (filter.status) {
      where.status = filter.status;
    }
    if (filter.event) {
      where.event = filter.event;
    }
    return this.deliveryRepository.find({
      where,
      order: { createdAt: 'DESC' },
      take: filter.limit,
      skip: filter.offset,
    });
  }

  async statsSince(endpointId: string, since: Date): Promise<DeliveryStats> {
    const recent = { endpointId, createdAt: MoreThanOrEqual(since) };
    const [total, successful, failed] = await Promise.all([
      this.deliveryRepository.count({ where: recent }),
      this.deliveryRepository.count({ where: { ...recent, status: 'success' } }),
      this.deliveryRepository.count({ where: { ...recent, status: 'failed' } }),
    ]);
    return { total, successful, failed };
  }
}
