/**
 * Webhook payload signing.
 *
 * Every outbound delivery carries `X-Webhook-Signature: sha256=<hex>`, an
 * HMAC-SHA256 of the exact request body keyed with the endpoint secret.
 *
 * Receivers verify by recomputing the HMAC over the raw bytes they received
 * (before any JSON parsing) with their copy of the secret and comparing the
 * result to the header in constant time. {@link verifySignature} is that check.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';

const SIGNATURE_PREFIX = 'sha256=';

export function signPayload(payload: string | Buffer, secret: string): string {
  return createHmac('sha256', secret).update(payload).digest('hex');
}

export function formatSignatureHeader(signature: string): string {
  return `${SIGNATURE_PREFIX}${signature}`;
}

export function verifySignature(rawBody: string | Buffer, secret: string, header: string): boolean {
  if (!header.startsWith(SIGNATURE_PREFIX)) {
    return false;
  }
  const received = Buffer.from(header.slice(SIGNATURE_PREFIX.length), 'hex');
  const expected = Buffer.from(signPayload(rawBody, secret), 'hex');
  if (received.length !== expected.length) {
    return false;
  }
  return timingSafeEqual(received, expected);
}

/**
 * JSON with object keys sorted at every level, so a stored payload always
 * serializes to the same bytes regardless of how the database returned it.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, inner]) => [key, sortKeys(inner)]),
    );
  }
  return value;
}
