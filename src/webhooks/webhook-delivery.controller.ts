/**
 * Webhook Delivery Controller
 * Delivery history for the caller's endpoints and manual retry of failed deliveries.
 */

import { Controller, Get, Post, Param, Query, HttpCode, HttpException, HttpStatus, UseGuards } from '@nestjs/common';
import { ApiResponseUtil } from '../../shared/utils/api-response.util';
import { JwtOwnerGuard } from '../auth/jwt-owner.guard';
import { OwnerId } from '../auth/owner-id.decorator';
import { WebhookDelivery, WebhookDeliveryStatus } from './entities/webhook-delivery.entity';
import { DeliveryQueue } from './queue/delivery-queue';
import { WebhookDeliveryStore } from './webhook-delivery.store';
import { WebhookEndpointService } from './webhook-endpoint.service';
import { isWebhookEventName } from './webhook-events';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 200;

const DELIVERY_STATUSES: readonly WebhookDeliveryStatus[] = ['pending', 'in_progress', 'success', 'failed', 'retrying'];

function isDeliveryStatus(value: string): value is WebhookDeliveryStatus {
  return DELIVERY_STATUSES.some((status) => status === value);
}

export function parseLimit(limit?: string): number {
  const limitNum = limit ? parseInt(limit, 10) : DEFAULT_LIMIT;
  return Number.isNaN(limitNum) || limitNum < 1 ? DEFAULT_LIMIT : Math.min(limitNum, MAX_LIMIT);
}

export function parseOffset(offset?: string): number {
  const offsetNum = offset ? parseInt(offset, 10) : 0;
  return Number.isNaN(offsetNum) || offsetNum < 0 ? 0 : offsetNum;
}

function badRequest(message: string): HttpException {
  return new HttpException(ApiResponseUtil.error('VALIDATION_ERROR', message), HttpStatus.BAD_REQUEST);
}

@Controller('webhooks/deliveries')
@UseGuards(JwtOwnerGuard)
export class WebhookDeliveryController {
  constructor(
    private readonly endpointService: WebhookEndpointService,
    private readonly deliveryStore: WebhookDeliveryStore,
    private readonly queue: DeliveryQueue,
  ) {}

  /**
   * GET /webhooks/deliveries?endpoint=&status=&event=&limit=50&offset=0
   */
  @Get()
  async findAll(
    @OwnerId() ownerId: string,
    @Query('endpoint') endpoint?: string,
    @Query('status') status?: string,
    @Query('event') event?: string,
    @Query('limit') limit?: string,
    @Query('offset') offset?: string,
  ) {
    if (status && !isDeliveryStatus(status)) {
      throw badRequest(`Unknown status: ${status}`);
    }
    if (event && !isWebhookEventName(event)) {
      throw badRequest(`Unknown event: ${event}`);
    }

    try {
      const endpoints = await this.endpointService.findAllForOwner(ownerId);
      const ownedIds = endpoints.map((owned) => owned.id);
      const endpointIds = endpoint ? ownedIds.filter((id) => id === endpoint) : ownedIds;

      const deliveries = await this.deliveryStore.list({
        endpointIds,
        status: status && isDeliveryStatus(status) ? status : undefined,
        event: event && isWebhookEventName(event) ? event : undefined,
        limit: parseLimit(limit),
        offset: parseOffset(offset),
      });
      return ApiResponseUtil.success(deliveries);
    } catch (error: unknown) {
      throw ApiResponseUtil.toHttpException(error, 'LIST_FAILED');
    }
  }

  @Get(':id')
  async findOne(@OwnerId() ownerId: string, @Param('id') id: string) {
    try {
      const delivery = await this.findOwnedDelivery(ownerId, id);
      return ApiResponseUtil.success(delivery);
    } catch (error: unknown) {
      throw ApiResponseUtil.toHttpException(error, 'GET_FAILED');
    }
  }

  /**
   * Re-runs a permanently failed delivery from scratch.
   * POST /webhooks/deliveries/:id/retry
   */
  @Post(':id/retry')
  @HttpCode(HttpStatus.OK)
  async retry(@OwnerId() ownerId: string, @Param('id') id: string) {
    let delivery: WebhookDelivery;
    try {
      delivery = await this.findOwnedDelivery(ownerId, id);
    } catch (error: unknown) {
      throw ApiResponseUtil.toHttpException(error, 'RETRY_FAILED');
    }

    if (delivery.status !== 'failed') {
      throw badRequest(`Only failed deliveries can be retried (status: ${delivery.status})`);
    }

    try {
      const reset = await this.deliveryStore.resetForRetry(delivery.id);
      if (!reset) {
        throw badRequest('Delivery is no longer in failed state');
      }
      await this.queue.enqueue(delivery.id);
      return ApiResponseUtil.success({ id: delivery.id, status: 'pending' });
    } catch (error: unknown) {
      throw ApiResponseUtil.toHttpException(error, 'RETRY_FAILED');
    }
  }

  private async findOwnedDelivery(ownerId: string, id: string): Promise<WebhookDelivery> {
    const delivery = await this.deliveryStore.findById(id);
    if (delivery) {
      const endpoint = await this.endpointService.findById(delivery.endpointId);
      if (endpoint && endpoint.ownerId === ownerId) {
        return delivery;
      }
    }
    throw new HttpException(ApiResponseUtil.error('NOT_FOUND', `Webhook delivery with ID ${id} not found`), HttpStatus.NOT_FOUND);
  }
}
