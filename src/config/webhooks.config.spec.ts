import { webhooksConfig } from './webhooks.config';

describe('webhooksConfig', () => {
  const originalEnv = { ...process.env };

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('uses defaults when nothing is set', () => {
    delete process.env.REDIS_URL;
    delete process.env.WEBHOOK_WORKER_ENABLED;
    delete process.env.WEBHOOK_WORKER_CONCURRENCY;
    delete process.env.WEBHOOK_RETRY_SWEEP_LIMIT;
    delete process.env.WEBHOOK_RETENTION_DAYS;
    delete process.env.WEBHOOK_CLAIM_LEASE_MINUTES;
    delete process.env.WEBHOOK_ORPHAN_GRACE_MINUTES;

    expect(webhooksConfig()).toEqual({
      redisUrl: 'redis://localhost:6379/0',
      workerEnabled: true,
      workerConcurrency: 5,
      retrySweepLimit: 100,
      retentionDays: 30,
      claimLeaseMinutes: 5,
      orphanGraceMinutes: 5,
    });
  });

  it('falls back on invalid numbers and clamps large ones', () => {
    process.env.WEBHOOK_RETENTION_DAYS = 'abc';
    process.env.WEBHOOK_CLAIM_LEASE_MINUTES = '-3';
    process.env.WEBHOOK_RETRY_SWEEP_LIMIT = '5000';
    process.env.WEBHOOK_WORKER_ENABLED = 'false';

    const config = webhooksConfig();

    expect(config.retentionDays).toBe(30);
    expect(config.claimLeaseMinutes).toBe(5);
    expect(config.retrySweepLimit).toBe(1000);
    expect(config.workerEnabled).toBe(false);
  });
});
