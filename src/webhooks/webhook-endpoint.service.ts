/**
 * Webhook Endpoint Service
 * Registry of user-owned webhook endpoints and the predicate that decides who receives a dispatch.
 */

import { Injectable, NotFoundException, BadRequestException, Inject } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { LessThan, Repository } from 'typeorm';
import { randomBytes } from 'node:crypto';
import { LoggerService } from '../../shared/logger/logger.service';
import { WebhookEndpoint } from './entities/webhook-endpoint.entity';
import { isWebhookEventName, WebhookEventName } from './webhook-events';
import { MAX_ENDPOINT_FAILURES } from './webhook.constants';

export interface CreateEndpointInput {
  name: string;
  url: string;
  events: readonly string[];
  isActive?: boolean;
  secret?: string;
}

export interface UpdateEndpointInput {
  name?: string;
  url?: string;
  events?: readonly string[];
  isActive?: boolean;
}

export function generateSecret(): string {
  return randomBytes(32).toString('hex');
}

function assertAbsoluteUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new BadRequestException('Invalid webhook URL');
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new BadRequestException('Webhook URL must use http or https');
  }
}

function normalizeEvents(events: readonly string[]): WebhookEventName[] {
  if (events.length === 0) {
    throw new BadRequestException('At least one event is required');
  }
  const unknown = events.filter((event) => !isWebhookEventName(event));
  if (unknown.length > 0) {
    throw new BadRequestException(`Unknown events: ${unknown.join(', ')}`);
  }
  return [...new Set(events.filter(isWebhookEventName))];
}

@Injectable()
export class WebhookEndpointService {
  constructor(
    @InjectRepository(WebhookEndpoint)
    private endpointRepository: Repository<WebhookEndpoint>,
    @Inject(LoggerService)
    private logger: LoggerService,
  ) {}

  async create(ownerId: string, input: CreateEndpointInput): Promise<WebhookEndpoint> {
    this.logger.log(`[ENDPOINT] Creating endpoint "${input.name}" for owner ${ownerId}`, 'WebhookEndpointService');

    assertAbsoluteUrl(input.url);
    const events = normalizeEvents(input.events);

    const endpoint = this.endpointRepository.create({
      ownerId,
      name: input.name,
      url: input.url,
      secret: input.secret || generateSecret(),
      events,
      isActive: input.isActive ?? true,
      failureCount: 0,
      lastFailureAt: null,
      lastSuccessAt: null,
    });

    const saved = await this.endpointRepository.save(endpoint);
    this.logger.log(`[ENDPOINT] ✅ Created endpoint: ${saved.id}`, 'WebhookEndpointService');
    return saved;
  }

  async findAllForOwner(ownerId: string): Promise<WebhookEndpoint[]> {
    return this.endpointRepository.find({
      where: { ownerId },
      order: { createdAt: 'DESC' },
    });
  }

  async findOneForOwner(ownerId: string, id: string): Promise<WebhookEndpoint> {
    const endpoint = await this.endpointRepository.findOne({ where: { id, ownerId } });
    if (!endpoint) {
      throw new NotFoundException(`Webhook endpoint with ID ${id} not found`);
    }
    return endpoint;
  }

  async findById(id: string): Promise<WebhookEndpoint | null> {
    return this.endpointRepository.findOne({ where: { id } });
  }

  async update(ownerId: string, id: string, input: UpdateEndpointInput): Promise<WebhookEndpoint> {
    const endpoint = await this.findOneForOwner(ownerId, id);

    if (input.url !== undefined) {
      assertAbsoluteUrl(input.url);
      endpoint.url = input.url;
    }

    if (input.events !== undefined) {
      endpoint.events = normalizeEvents(input.events);
    }

    if (input.name !== undefined) {
      endpoint.name = input.name;
    }

    if (input.isActive !== undefined) {
      endpoint.isActive = input.isActive;
    }

    const updated = await this.endpointRepository.save(endpoint);
    this.logger.log(`[ENDPOINT] ✅ Updated endpoint: ${updated.id}`, 'WebhookEndpointService');
    return updated;
  }

  /**
   * Deliveries of the endpoint go with it (ON DELETE CASCADE).
   */
  async remove(ownerId: string, id: string): Promise<void> {
    const endpoint = await this.findOneForOwner(ownerId, id);
    await this.endpointRepository.remove(endpoint);
    this.logger.log(`[ENDPOINT] ✅ Deleted endpoint: ${id}`, 'WebhookEndpointService');
  }

  /**
   * Replaces the signing secret. The new value is returned once; receivers
   * verifying with the old secret will reject deliveries signed from now on.
   */
  async regenerateSecret(ownerId: string, id: string): Promise<string> {
    const endpoint = await this.findOneForOwner(ownerId, id);
    const secret = generateSecret();
    await this.endpointRepository.update({ id: endpoint.id }, { secret });
    this.logger.log(`[ENDPOINT] ✅ Regenerated secret for endpoint: ${id}`, 'WebhookEndpointService');
    return secret;
  }

  /**
   * Re-enables an endpoint, lifting a soft auto-disable as well.
   */
  async activate(ownerId: string, id: string): Promise<WebhookEndpoint> {
    const endpoint = await this.findOneForOwner(ownerId, id);
    endpoint.isActive = true;
    endpoint.failureCount = 0;
    const updated = await this.endpointRepository.save(endpoint);
    this.logger.log(`[ENDPOINT] ✅ Activated endpoint: ${id}`, 'WebhookEndpointService');
    return updated;
  }

  async deactivate(ownerId: string, id: string): Promise<WebhookEndpoint> {
    const endpoint = await this.findOneForOwner(ownerId, id);
    endpoint.isActive = false;
    const updated = await this.endpointRepository.save(endpoint);
    this.logger.log(`[ENDPOINT] ✅ Deactivated endpoint: ${id}`, 'WebhookEndpointService');
    return updated;
  }

  /**
   * The only gate for dispatch: active, under the failure threshold, subscribed.
   */
  async listActiveSubscribers(event: string, ownerId: string): Promise<WebhookEndpoint[]> {
    const candidates = await this.endpointRepository.find({
      where: {
        ownerId,
        isActive: true,
        failureCount: LessThan(MAX_ENDPOINT_FAILURES),
      },
      order: { createdAt: 'ASC' },
    });
    return candidates.filter((endpoint) => endpoint.events.some((subscribed) => subscribed === event));
  }

  async recordSuccess(endpointId: string): Promise<void> {
    await this.endpointRepository.update({ id: endpointId }, { failureCount: 0, lastSuccessAt: new Date() });
  }

  async recordFailure(endpointId: string): Promise<void> {
    await this.endpointRepository.increment({ id: endpointId }, 'failureCount', 1);
    await this.endpointRepository.update({ id: endpointId }, { lastFailureAt: new Date() });
  }
}
