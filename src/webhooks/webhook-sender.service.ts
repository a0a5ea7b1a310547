/**
 * Webhook Sender Service
 * Builds the signed request for an endpoint and performs exactly one POST.
 */

import { Injectable } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import { WebhookEndpoint } from './entities/webhook-endpoint.entity';
import { WebhookPayload } from './entities/webhook-delivery.entity';
import { canonicalJson, formatSignatureHeader, signPayload } from './webhook-signature';
import {
  DELIVERY_TIMEOUT_MS,
  TEST_DELIVERY_TIMEOUT_MS,
  TEST_RESPONSE_LIMIT,
  WEBHOOK_USER_AGENT,
} from './webhook.constants';

export interface SendResult {
  statusCode: number;
  body: string;
}

export interface TestDeliveryResult {
  success: boolean;
  statusCode?: number;
  response?: string;
  error?: string;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

export function isTimeoutError(error: unknown): boolean {
  return isAxiosError(error) && error.code !== undefined && TIMEOUT_CODES.has(error.code);
}

/**
 * Error detail stored on the delivery record for a failed attempt.
 */
export function describeDeliveryError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  if (isTimeoutError(error)) {
    return `Timeout: ${message}`;
  }
  if (isAxiosError(error)) {
    return `Request error: ${message}`;
  }
  return `Unexpected error: ${message}`;
}

function bodyAsText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  return JSON.stringify(data);
}

export function buildWebhookHeaders(event: string, body: string, secret: string, deliveryId: string): Record<string, string> {
  return {
    'Content-Type': 'application/json',
    'X-Webhook-Event': event,
    'X-Webhook-Signature': formatSignatureHeader(signPayload(body, secret)),
    'X-Webhook-Timestamp': String(Math.floor(Date.now() / 1000)),
    'X-Webhook-Delivery-ID': deliveryId,
    'User-Agent': WEBHOOK_USER_AGENT,
  };
}

@Injectable()
export class WebhookSenderService {
  constructor(private readonly httpService: HttpService) {}

  /**
   * Signs and POSTs the payload. Resolves with any HTTP response (2xx or not);
   * rejects only on timeout or transport failure.
   */
  async send(endpoint: WebhookEndpoint, deliveryId: string, payload: WebhookPayload, timeoutMs = DELIVERY_TIMEOUT_MS): Promise<SendResult> {
    const body = canonicalJson(payload);
    const response = await firstValueFrom(
      this.httpService.post<unknown>(endpoint.url, body, {
        headers: buildWebhookHeaders(payload.event, body, endpoint.secret, deliveryId),
        timeout: timeoutMs,
        responseType: 'text',
        maxRedirects: 0,
        validateStatus: () => true,
      }),
    );
    return { statusCode: response.status, body: bodyAsText(response.data) };
  }

  /**
   * Fire-once synthetic delivery for verifying an endpoint's configuration.
   * Nothing is recorded and nothing is retried.
   */
  async sendTest(endpoint: WebhookEndpoint, event: string): Promise<TestDeliveryResult> {
    const testEvent = `${event}.test`;
    const payload = {
      event: testEvent,
      timestamp: new Date().toISOString(),
      data: {
        message: 'This is a test webhook',
        endpoint_id: endpoint.id,
        endpoint_name: endpoint.name,
      },
    };
    const body = canonicalJson(payload);

    try {
      const response = await firstValueFrom(
        this.httpService.post<unknown>(endpoint.url, body, {
          headers: buildWebhookHeaders(testEvent, body, endpoint.secret, 'test'),
          timeout: TEST_DELIVERY_TIMEOUT_MS,
          responseType: 'text',
          maxRedirects: 0,
          validateStatus: () => true,
        }),
      );
      return {
        success: isSuccessStatus(response.status),
        statusCode: response.status,
        response: bodyAsText(response.data).slice(0, TEST_RESPONSE_LIMIT),
      };
    } catch (error: unknown) {
      if (isTimeoutError(error)) {
        return { success: false, error: 'Request timed out' };
      }
      return { success: false, error: error instanceof Error ? error.message : String(error) };
    }
  }
}
