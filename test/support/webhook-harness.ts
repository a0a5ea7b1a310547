/**
 * Builds the webhook services over in-memory repositories, a recording queue
 * and a mocked HttpService, so specs can drive whole delivery lifecycles.
 */

import { HttpService } from '@nestjs/axios';
import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { AxiosError } from 'axios';
import { of, throwError } from 'rxjs';
import { LoggerService } from '../../shared/logger/logger.service';
import { webhooksConfig, WebhooksConfig } from '../../src/config/webhooks.config';
import { WebhookDelivery } from '../../src/webhooks/entities/webhook-delivery.entity';
import { WebhookEndpoint } from '../../src/webhooks/entities/webhook-endpoint.entity';
import { DeliveryQueue } from '../../src/webhooks/queue/delivery-queue';
import { WebhookDeliveryStore } from '../../src/webhooks/webhook-delivery.store';
import { WebhookDeliveryWorker } from '../../src/webhooks/webhook-delivery.worker';
import { WebhookDispatcherService } from '../../src/webhooks/webhook-dispatcher.service';
import { WebhookEndpointService } from '../../src/webhooks/webhook-endpoint.service';
import { WebhookEventPublisher } from '../../src/webhooks/webhook-event.publisher';
import { WebhookRetentionScheduler } from '../../src/webhooks/webhook-retention.scheduler';
import { WebhookRetryScheduler } from '../../src/webhooks/webhook-retry.scheduler';
import { WebhookSenderService } from '../../src/webhooks/webhook-sender.service';
import { InMemoryRepository } from './in-memory-repository';
import { createLoggerMock } from './logger.mock';
import { RecordingDeliveryQueue } from './recording-delivery-queue';

export const TEST_CONFIG: WebhooksConfig = {
  redisUrl: 'redis://localhost:6379/0',
  workerEnabled: false,
  workerConcurrency: 1,
  retrySweepLimit: 100,
  retentionDays: 30,
  claimLeaseMinutes: 5,
  orphanGraceMinutes: 5,
};

export interface WebhookHarness {
  endpoints: InMemoryRepository<WebhookEndpoint>;
  deliveries: InMemoryRepository<WebhookDelivery>;
  queue: RecordingDeliveryQueue;
  http: { post: jest.Mock };
  logger: ReturnType<typeof createLoggerMock>;
  endpointService: WebhookEndpointService;
  deliveryStore: WebhookDeliveryStore;
  dispatcher: WebhookDispatcherService;
  worker: WebhookDeliveryWorker;
  publisher: WebhookEventPublisher;
  retryScheduler: WebhookRetryScheduler;
  retentionScheduler: WebhookRetentionScheduler;
}

export async function createWebhookHarness(): Promise<WebhookHarness> {
  const endpoints = new InMemoryRepository(() => new WebhookEndpoint());
  const deliveries = new InMemoryRepository(() => new WebhookDelivery());
  const queue = new RecordingDeliveryQueue();
  const http = { post: jest.fn() };
  const logger = createLoggerMock();

  const module = await Test.createTestingModule({
    providers: [
      WebhookEndpointService,
      WebhookDeliveryStore,
      WebhookSenderService,
      WebhookDispatcherService,
      WebhookDeliveryWorker,
      WebhookEventPublisher,
      WebhookRetryScheduler,
      WebhookRetentionScheduler,
      { provide: getRepositoryToken(WebhookEndpoint), useValue: endpoints },
      { provide: getRepositoryToken(WebhookDelivery), useValue: deliveries },
      { provide: DeliveryQueue, useValue: queue },
      { provide: HttpService, useValue: http },
      { provide: LoggerService, useValue: logger },
      { provide: webhooksConfig.KEY, useValue: TEST_CONFIG },
    ],
  }).compile();

  return {
    endpoints,
    deliveries,
    queue,
    http,
    logger,
    endpointService: module.get(WebhookEndpointService),
    deliveryStore: module.get(WebhookDeliveryStore),
    dispatcher: module.get(WebhookDispatcherService),
    worker: module.get(WebhookDeliveryWorker),
    publisher: module.get(WebhookEventPublisher),
    retryScheduler: module.get(WebhookRetryScheduler),
    retentionScheduler: module.get(WebhookRetentionScheduler),
  };
}

export function respondWith(status: number, data: unknown = '') {
  return of({ status, statusText: '', data, headers: {}, config: {} });
}

export function timeoutError() {
  return throwError(() => new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED'));
}
