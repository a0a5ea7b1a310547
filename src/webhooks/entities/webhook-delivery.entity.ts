/**
 * Webhook delivery entity: one event instance sent (or to be sent) to one endpoint,
 * with the outcome of its most recent attempt.
 */

import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
  ManyToOne,
  JoinColumn,
} from 'typeorm';
import { WebhookEndpoint } from './webhook-endpoint.entity';
import type { WebhookEventName } from '../webhook-events';

/**
 * `in_progress` marks a claimed attempt; `success` and `failed` are terminal.
 */
export type WebhookDeliveryStatus = 'pending' | 'in_progress' | 'success' | 'failed' | 'retrying';

export const TERMINAL_DELIVERY_STATUSES: readonly WebhookDeliveryStatus[] = ['success', 'failed'];
export const CLAIMABLE_DELIVERY_STATUSES: readonly WebhookDeliveryStatus[] = ['pending', 'retrying'];

export interface WebhookPayload {
  event: WebhookEventName;
  timestamp: string;
  data: Record<string, unknown>;
}

@Entity('webhook_deliveries')
@Index('idx_webhook_deliveries_status_next_retry', ['status', 'nextRetryAt'])
@Index('idx_webhook_deliveries_endpoint_created', ['endpointId', 'createdAt'])
export class WebhookDelivery {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid', name: 'endpoint_id' })
  endpointId!: string;

  @Column({ type: 'varchar', length: 50 })
  event!: WebhookEventName;

  @Column({ type: 'jsonb' })
  payload!: WebhookPayload;

  @Column({ type: 'varchar', length: 20, default: 'pending' })
  status!: WebhookDeliveryStatus;

  @Column({ type: 'int', default: 0, name: 'attempt_count' })
  attemptCount!: number;

  @Column({ type: 'int', default: 3, name: 'max_attempts' })
  maxAttempts!: number;

  @Column({ type: 'int', nullable: true, name: 'response_status_code' })
  responseStatusCode!: number | null;

  @Column({ type: 'text', default: '', name: 'response_body' })
  responseBody!: string;

  @Column({ type: 'text', default: '', name: 'error_message' })
  errorMessage!: string;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  @Column({ type: 'timestamptz', nullable: true, name: 'delivered_at' })
  deliveredAt!: Date | null;

  @Column({ type: 'timestamptz', nullable: true, name: 'next_retry_at' })
  nextRetryAt!: Date | null;

  @Column({ type: 'timestamptz', nullable: true, name: 'claimed_at' })
  claimedAt!: Date | null;

  @ManyToOne(() => WebhookEndpoint, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'endpoint_id' })
  endpoint?: WebhookEndpoint;
}
