import { Entity, PrimaryGeneratedColumn, Column, Index, CreateDateColumn, UpdateDateColumn } from 'typeorm';
import type { WebhookEventName } from '../webhook-events';

/**
 * A user's webhook target: URL, signing secret and subscribed events.
 */
@Entity('webhook_endpoints')
@Index('idx_webhook_endpoints_owner_active', ['ownerId', 'isActive'])
export class WebhookEndpoint {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 64, name: 'owner_id' })
  ownerId!: string;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ type: 'varchar', length: 500 })
  url!: string;

  @Column({ type: 'varchar', length: 64 })
  secret!: string; // hex, needed in plaintext for outbound signing

  @Column({ type: 'jsonb', default: () => "'[]'" })
  events!: WebhookEventName[];

  @Column({ type: 'boolean', default: true, name: 'is_active' })
  isActive!: boolean;

  @Column({ type: 'int', default: 0, name: 'failure_count' })
  failureCount!: number; // consecutive terminal failures

  @Column({ type: 'timestamptz', nullable: true, name: 'last_failure_at' })
  lastFailureAt!: Date | null;

  @Column({ type: 'timestamptz', nullable: true, name: 'last_success_at' })
  lastSuccessAt!: Date | null;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;
}
