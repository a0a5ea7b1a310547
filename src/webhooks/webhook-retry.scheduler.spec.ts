import { createWebhookHarness, respondWith, WebhookHarness } from '../../test/support/webhook-harness';
import { WebhookEndpoint } from './entities/webhook-endpoint.entity';
import { STALE_CLAIM_MESSAGE } from './webhook-retry.scheduler';

const MINUTE = 60 * 1000;

describe('WebhookRetryScheduler', () => {
  let harness: WebhookHarness;
  let endpoint: WebhookEndpoint;

  const payload = { event: 'application.created' as const, timestamp: '2026-01-01T00:00:00.000Z', data: {} };

  async function createDelivery(fields: Record<string, unknown>): Promise<string> {
    const delivery = await harness.deliveryStore.createPending(endpoint, payload);
    Object.assign(harness.deliveries.row(delivery.id), fields);
    return delivery.id;
  }

  beforeEach(async () => {
    harness = await createWebhookHarness();
    endpoint = await harness.endpointService.create('owner-1', {
      name: 'CRM',
      url: 'https://hooks.example.test/incoming',
      events: ['application.created'],
    });
  });

  describe('sweepDueRetries', () => {
    it('re-enqueues due retries and orphaned pending deliveries only', async () => {
      const now = Date.now();
      const due = await createDelivery({ status: 'retrying', attemptCount: 1, nextRetryAt: new Date(now - MINUTE) });
      await createDelivery({ status: 'retrying', attemptCount: 1, nextRetryAt: new Date(now + 10 * MINUTE) });
      const orphan = await createDelivery({ status: 'pending', createdAt: new Date(now - 10 * MINUTE) });
      await createDelivery({ status: 'pending', createdAt: new Date(now - MINUTE) });
      await createDelivery({ status: 'failed', createdAt: new Date(now - 10 * MINUTE) });

      const count = await harness.retryScheduler.sweepDueRetries();

      expect(count).toBe(2);
      expect(harness.queue.jobs).toEqual([
        { deliveryId: due, delayMs: 0 },
        { deliveryId: orphan, delayMs: 0 },
      ]);
    });

    it('respects the limit', async () => {
      const past = new Date(Date.now() - MINUTE);
      for (let i = 0; i < 3; i++) {
        await createDelivery({ status: 'retrying', attemptCount: 1, nextRetryAt: past });
      }

      expect(await harness.retryScheduler.sweepDueRetries(2)).toBe(2);
      expect(harness.queue.jobs).toHaveLength(2);
    });

    it('is harmless to repeat: the worker sends a re-queued delivery once', async () => {
      const id = await createDelivery({ status: 'retrying', attemptCount: 1, nextRetryAt: new Date(Date.now() - MINUTE) });
      harness.http.post.mockReturnValue(respondWith(200, 'ok'));

      await harness.retryScheduler.sweepDueRetries();
      await harness.retryScheduler.sweepDueRetries();
      for (const job of harness.queue.take()) {
        await harness.worker.process(job.deliveryId);
      }

      expect(harness.http.post).toHaveBeenCalledTimes(1);
      expect(harness.deliveries.row(id).status).toBe('success');
    });
  });

  describe('recoverStaleClaims', () => {
    it('returns an abandoned claim to the retry path', async () => {
      const id = await createDelivery({ status: 'in_progress', attemptCount: 1, claimedAt: new Date(Date.now() - 10 * MINUTE) });

      expect(await harness.retryScheduler.recoverStaleClaims()).toBe(1);

      expect(harness.deliveries.row(id)).toMatchObject({ status: 'retrying', errorMessage: STALE_CLAIM_MESSAGE, claimedAt: null });
      expect(harness.queue.jobs).toEqual([{ deliveryId: id, delayMs: 0 }]);
    });

    it('fails an abandoned final attempt and counts it against the endpoint', async () => {
      const id = await createDelivery({ status: 'in_progress', attemptCount: 3, claimedAt: new Date(Date.now() - 10 * MINUTE) });

      await harness.retryScheduler.recoverStaleClaims();

      expect(harness.deliveries.row(id).status).toBe('failed');
      expect(harness.endpoints.row(endpoint.id).failureCount).toBe(1);
      expect(harness.queue.jobs).toEqual([]);
    });

    it('leaves claims within the lease alone', async () => {
      const id = await createDelivery({ status: 'in_progress', attemptCount: 1, claimedAt: new Date(Date.now() - MINUTE) });

      expect(await harness.retryScheduler.recoverStaleClaims()).toBe(0);
      expect(harness.deliveries.row(id).status).toBe('in_progress');
    });
  });

  it('logs instead of throwing when a scheduled run fails', async () => {
    jest.spyOn(harness.deliveryStore, 'findStaleClaims').mockRejectedValueOnce(new Error('db down'));

    await expect(harness.retryScheduler.handleSweep()).resolves.toBeUndefined();
    expect(harness.logger.error).toHaveBeenCalledWith(
      '[WEBHOOK_SWEEP] Retry sweep failed: db down',
      expect.any(String),
      'WebhookRetryScheduler',
    );
  });
});
