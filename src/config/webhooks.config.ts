/**
 * Webhook delivery settings, read once from the environment.
 */

import { ConfigType, registerAs } from '@nestjs/config';

function positiveInt(raw: string | undefined, fallback: number, max?: number): number {
  if (raw == null || raw === '') return fallback;
  const n = parseInt(raw, 10);
  if (Number.isNaN(n) || n < 1) return fallback;
  return max !== undefined ? Math.min(n, max) : n;
}

export const webhooksConfig = registerAs('webhooks', () => ({
  redisUrl: process.env.REDIS_URL || 'redis://localhost:6379/0',
  workerEnabled: process.env.WEBHOOK_WORKER_ENABLED !== 'false',
  workerConcurrency: positiveInt(process.env.WEBHOOK_WORKER_CONCURRENCY, 5, 100),
  retrySweepLimit: positiveInt(process.env.WEBHOOK_RETRY_SWEEP_LIMIT, 100, 1000),
  retentionDays: positiveInt(process.env.WEBHOOK_RETENTION_DAYS, 30),
  claimLeaseMinutes: positiveInt(process.env.WEBHOOK_CLAIM_LEASE_MINUTES, 5),
  orphanGraceMinutes: positiveInt(process.env.WEBHOOK_ORPHAN_GRACE_MINUTES, 5),
}));

export type WebhooksConfig = ConfigType<typeof webhooksConfig>;
