export const WEBHOOK_USER_AGENT = 'JobTracker-Webhook/1.0';

/** Endpoints at or above this many consecutive terminal failures stop receiving dispatches. */
export const MAX_ENDPOINT_FAILURES = 10;

export const DEFAULT_MAX_ATTEMPTS = 3;

/** Delay before attempt N+1, indexed by N-1; the last value repeats. */
export const RETRY_DELAYS_SECONDS = [60, 300, 900] as const;

export const DELIVERY_TIMEOUT_MS = 30_000;
export const TEST_DELIVERY_TIMEOUT_MS = 10_000;

export const RESPONSE_BODY_LIMIT = 1000;
export const TEST_RESPONSE_LIMIT = 500;
export const ERROR_BODY_EXCERPT = 200;

export const DELIVERY_QUEUE_NAME = 'webhook-deliveries';

export function retryDelaySeconds(attemptCount: number): number {
  const index = Math.min(Math.max(attemptCount - 1, 0), RETRY_DELAYS_SECONDS.length - 1);
  return RETRY_DELAYS_SECONDS[index];
}
