/**
 * Unit tests for WebhookEndpointService
 */

import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { BadRequestException, NotFoundException } from '@nestjs/common';
import { LoggerService } from '../../shared/logger/logger.service';
import { InMemoryRepository } from '../../test/support/in-memory-repository';
import { createLoggerMock } from '../../test/support/logger.mock';
import { WebhookEndpoint } from './entities/webhook-endpoint.entity';
import { WebhookEndpointService } from './webhook-endpoint.service';

describe('WebhookEndpointService', () => {
  let service: WebhookEndpointService;
  let repository: InMemoryRepository<WebhookEndpoint>;

  const ownerId = 'owner-1';
  const base = {
    name: 'CRM',
    url: 'https://hooks.example.test/incoming',
    events: ['application.created'],
  };

  beforeEach(async () => {
    repository = new InMemoryRepository(() => new WebhookEndpoint());
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        WebhookEndpointService,
        { provide: getRepositoryToken(WebhookEndpoint), useValue: repository },
        { provide: LoggerService, useValue: createLoggerMock() },
      ],
    }).compile();

    service = module.get<WebhookEndpointService>(WebhookEndpointService);
  });

  describe('create', () => {
    it('generates a 64-char hex secret when none is supplied', async () => {
      const endpoint = await service.create(ownerId, base);

      expect(endpoint.secret).toMatch(/^[0-9a-f]{64}$/);
      expect(endpoint.isActive).toBe(true);
      expect(endpoint.failureCount).toBe(0);
      expect(endpoint.ownerId).toBe(ownerId);
    });

    it('keeps a supplied secret', async () => {
      const endpoint = await service.create(ownerId, { ...base, secret: 'test-secret' });

      expect(endpoint.secret).toBe('test-secret');
    });

    it('collapses duplicate events', async () => {
      const endpoint = await service.create(ownerId, {
        ...base,
        events: ['application.created', 'company.created', 'application.created'],
      });

      expect(endpoint.events).toEqual(['application.created', 'company.created']);
    });

    it('rejects an empty event list', async () => {
      await expect(service.create(ownerId, { ...base, events: [] })).rejects.toThrow(
        new BadRequestException('At least one event is required'),
      );
      expect(repository.rows).toHaveLength(0);
    });

    it('rejects events outside the catalog', async () => {
      await expect(
        service.create(ownerId, { ...base, events: ['application.created', 'user.login', 'x'] }),
      ).rejects.toThrow('Unknown events: user.login, x');
    });

    it('rejects relative and non-http URLs', async () => {
      await expect(service.create(ownerId, { ...base, url: '/relative/path' })).rejects.toThrow('Invalid webhook URL');
      await expect(service.create(ownerId, { ...base, url: 'ftp://files.example.test/' })).rejects.toThrow(
        'Webhook URL must use http or https',
      );
    });
  });

  describe('listActiveSubscribers', () => {
    it('returns only active, subscribed endpoints under the failure threshold', async () => {
      const subscribed = await service.create(ownerId, { ...base, name: 'subscribed' });
      await service.create(ownerId, { ...base, name: 'other-event', events: ['company.created'] });
      await service.create(ownerId, { ...base, name: 'inactive', isActive: false });
      const failing = await service.create(ownerId, { ...base, name: 'failing' });
      repository.row(failing.id).failureCount = 10;
      const almost = await service.create(ownerId, { ...base, name: 'almost' });
      repository.row(almost.id).failureCount = 9;
      await service.create('owner-2', { ...base, name: 'someone-else' });

      const result = await service.listActiveSubscribers('application.created', ownerId);

      expect(result.map((endpoint) => endpoint.id).sort()).toEqual([subscribed.id, almost.id].sort());
    });
  });

  describe('recordSuccess / recordFailure', () => {
    it('increments failureCount and stamps lastFailureAt', async () => {
      const endpoint = await service.create(ownerId, base);

      await service.recordFailure(endpoint.id);
      await service.recordFailure(endpoint.id);

      const stored = repository.row(endpoint.id);
      expect(stored.failureCount).toBe(2);
      expect(stored.lastFailureAt).toBeInstanceOf(Date);
    });

    it('resets failureCount on success', async () => {
      const endpoint = await service.create(ownerId, base);
      repository.row(endpoint.id).failureCount = 7;

      await service.recordSuccess(endpoint.id);

      const stored = repository.row(endpoint.id);
      expect(stored.failureCount).toBe(0);
      expect(stored.lastSuccessAt).toBeInstanceOf(Date);
    });
  });

  describe('ownership', () => {
    it('throws NotFoundException for an endpoint of another owner', async () => {
      const endpoint = await service.create('owner-2', base);

      await expect(service.findOneForOwner(ownerId, endpoint.id)).rejects.toThrow(NotFoundException);
      await expect(service.remove(ownerId, endpoint.id)).rejects.toThrow(
        `Webhook endpoint with ID ${endpoint.id} not found`,
      );
      expect(repository.rows).toHaveLength(1);
    });
  });

  describe('update', () => {
    it('validates events like create', async () => {
      const endpoint = await service.create(ownerId, base);

      await expect(service.update(ownerId, endpoint.id, { events: ['nope'] })).rejects.toThrow('Unknown events: nope');
    });

    it('applies the given fields only', async () => {
      const endpoint = await service.create(ownerId, base);

      const updated = await service.update(ownerId, endpoint.id, { name: 'Renamed', events: ['interview.created'] });

      expect(updated.name).toBe('Renamed');
      expect(updated.url).toBe(base.url);
      expect(repository.row(endpoint.id).events).toEqual(['interview.created']);
    });
  });

  describe('regenerateSecret', () => {
    it('stores and returns a new secret', async () => {
      const endpoint = await service.create(ownerId, { ...base, secret: 'test-secret' });

      const secret = await service.regenerateSecret(ownerId, endpoint.id);

      expect(secret).toMatch(/^[0-9a-f]{64}$/);
      expect(repository.row(endpoint.id).secret).toBe(secret);
    });
  });

  describe('activate / deactivate', () => {
    it('activate lifts the soft auto-disable', async () => {
      const endpoint = await service.create(ownerId, base);
      repository.row(endpoint.id).failureCount = 12;
      await service.deactivate(ownerId, endpoint.id);
      expect(repository.row(endpoint.id).isActive).toBe(false);

      await service.activate(ownerId, endpoint.id);

      expect(repository.row(endpoint.id).isActive).toBe(true);
      expect(repository.row(endpoint.id).failureCount).toBe(0);
      expect(await service.listActiveSubscribers('application.created', ownerId)).toHaveLength(1);
    });
  });
});
