/**
 * Webhook Endpoint Controller
 * Owner-scoped management of webhook endpoints. The signing secret is only
 * returned by create and regenerate-secret.
 */

import {
  Controller,
  Post,
  Get,
  Put,
  Delete,
  Body,
  Param,
  HttpCode,
  HttpException,
  HttpStatus,
  UseGuards,
} from '@nestjs/common';
import { ApiResponseUtil } from '../../shared/utils/api-response.util';
import { JwtOwnerGuard } from '../auth/jwt-owner.guard';
import { OwnerId } from '../auth/owner-id.decorator';
import { CreateWebhookEndpointDto, TestWebhookEndpointDto, UpdateWebhookEndpointDto } from './dto/webhook-endpoint.dto';
import { WebhookEndpoint } from './entities/webhook-endpoint.entity';
import { DeliveryStats, WebhookDeliveryStore } from './webhook-delivery.store';
import { WebhookEndpointService } from './webhook-endpoint.service';
import { WEBHOOK_EVENTS, WebhookEventName } from './webhook-events';
import { WebhookSenderService } from './webhook-sender.service';

const STATS_WINDOW_MS = 24 * 60 * 60 * 1000;
const DEFAULT_TEST_EVENT: WebhookEventName = 'application.created';

export interface WebhookEndpointView {
  id: string;
  name: string;
  url: string;
  events: WebhookEventName[];
  isActive: boolean;
  failureCount: number;
  lastSuccessAt: Date | null;
  lastFailureAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export function toEndpointView(endpoint: WebhookEndpoint): WebhookEndpointView {
  return {
    id: endpoint.id,
    name: endpoint.name,
    url: endpoint.url,
    events: endpoint.events,
    isActive: endpoint.isActive,
    failureCount: endpoint.failureCount,
    lastSuccessAt: endpoint.lastSuccessAt,
    lastFailureAt: endpoint.lastFailureAt,
    createdAt: endpoint.createdAt,
    updatedAt: endpoint.updatedAt,
  };
}

@Controller('webhooks/endpoints')
@UseGuards(JwtOwnerGuard)
export class WebhookEndpointController {
  constructor(
    private readonly endpointService: WebhookEndpointService,
    private readonly deliveryStore: WebhookDeliveryStore,
    private readonly sender: WebhookSenderService,
  ) {}

  /**
   * Event catalog
   * GET /webhooks/endpoints/events
   */
  @Get('events')
  listEvents() {
    return ApiResponseUtil.success(WEBHOOK_EVENTS.map((event) => ({ name: event.name, description: event.description })));
  }

  /**
   * POST /webhooks/endpoints
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(@OwnerId() ownerId: string, @Body() createDto: CreateWebhookEndpointDto) {
    try {
      const endpoint = await this.endpointService.create(ownerId, createDto);
      return ApiResponseUtil.success({ ...toEndpointView(endpoint), secret: endpoint.secret });
    } catch (error: unknown) {
      throw ApiResponseUtil.toHttpException(error, 'CREATE_FAILED');
    }
  }

  @Get()
  async findAll(@OwnerId() ownerId: string) {
    try {
      const endpoints = await this.endpointService.findAllForOwner(ownerId);
      return ApiResponseUtil.success(endpoints.map(toEndpointView));
    } catch (error: unknown) {
      throw ApiResponseUtil.toHttpException(error, 'LIST_FAILED');
    }
  }

  /**
   * Endpoint detail with delivery counts for the last 24 hours
   * GET /webhooks/endpoints/:id
   */
  @Get(':id')
  async findOne(@OwnerId() ownerId: string, @Param('id') id: string) {
    try {
      const endpoint = await this.endpointService.findOneForOwner(ownerId, id);
      const stats: DeliveryStats = await this.deliveryStore.statsSince(endpoint.id, new Date(Date.now() - STATS_WINDOW_MS));
      return ApiResponseUtil.success({ ...toEndpointView(endpoint), stats });
    } catch (error: unknown) {
      throw ApiResponseUtil.toHttpException(error, 'GET_FAILED');
    }
  }

  @Put(':id')
  async update(@OwnerId() ownerId: string, @Param('id') id: string, @Body() updateDto: UpdateWebhookEndpointDto) {
    try {
      const endpoint = await this.endpointService.update(ownerId, id, updateDto);
      return ApiResponseUtil.success(toEndpointView(endpoint));
    } catch (error: unknown) {
      throw ApiResponseUtil.toHttpException(error, 'UPDATE_FAILED');
    }
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@OwnerId() ownerId: string, @Param('id') id: string): Promise<void> {
    try {
      await this.endpointService.remove(ownerId, id);
    } catch (error: unknown) {
      throw ApiResponseUtil.toHttpException(error, 'DELETE_FAILED');
    }
  }

  /**
   * POST /webhooks/endpoints/:id/regenerate-secret
   */
  @Post(':id/regenerate-secret')
  async regenerateSecret(@OwnerId() ownerId: string, @Param('id') id: string) {
    try {
      const secret = await this.endpointService.regenerateSecret(ownerId, id);
      return ApiResponseUtil.success({ id, secret });
    } catch (error: unknown) {
      throw ApiResponseUtil.toHttpException(error, 'REGENERATE_FAILED');
    }
  }

  @Post(':id/activate')
  async activate(@OwnerId() ownerId: string, @Param('id') id: string) {
    try {
      const endpoint = await this.endpointService.activate(ownerId, id);
      return ApiResponseUtil.success(toEndpointView(endpoint));
    } catch (error: unknown) {
      throw ApiResponseUtil.toHttpException(error, 'ACTIVATE_FAILED');
    }
  }

  @Post(':id/deactivate')
  async deactivate(@OwnerId() ownerId: string, @Param('id') id: string) {
    try {
      const endpoint = await this.endpointService.deactivate(ownerId, id);
      return ApiResponseUtil.success(toEndpointView(endpoint));
    } catch (error: unknown) {
      throw ApiResponseUtil.toHttpException(error, 'DEACTIVATE_FAILED');
    }
  }

  /**
   * Sends a signed `<event>.test` payload once; nothing is recorded.
   * POST /webhooks/endpoints/:id/test
   */
  @Post(':id/test')
  @HttpCode(HttpStatus.OK)
  async test(@OwnerId() ownerId: string, @Param('id') id: string, @Body() testDto: TestWebhookEndpointDto) {
    let endpoint: WebhookEndpoint;
    try {
      endpoint = await this.endpointService.findOneForOwner(ownerId, id);
    } catch (error: unknown) {
      throw ApiResponseUtil.toHttpException(error, 'TEST_FAILED');
    }

    const result = await this.sender.sendTest(endpoint, testDto.event ?? DEFAULT_TEST_EVENT);
    if (!result.success) {
      throw new HttpException(
        ApiResponseUtil.error('TEST_FAILED', result.error ?? `Endpoint responded with HTTP ${result.statusCode}`, result),
        HttpStatus.BAD_REQUEST,
      );
    }
    return ApiResponseUtil.success(result);
  }
}
