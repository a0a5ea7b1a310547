/**
 * Webhook Event Publisher
 * Entry point for the rest of the application. Each method is called at the
 * point a record is committed and picks the event name from the change it is told about.
 */

import { Inject, Injectable } from '@nestjs/common';
import { LoggerService } from '../../shared/logger/logger.service';
import { WebhookDispatcherService } from './webhook-dispatcher.service';
import { WebhookEventName } from './webhook-events';

export interface StatusChange {
  previousStatus?: string | null;
  status?: string | null;
}

type EventData = Record<string, unknown>;

function statusChanged(change: StatusChange): boolean {
  return change.previousStatus !== undefined && change.previousStatus !== null && change.previousStatus !== change.status;
}

export function resolveApplicationUpdateEvent(
  data: EventData,
  change: StatusChange,
): { event: WebhookEventName; data: EventData } {
  if (statusChanged(change)) {
    return {
      event: 'application.status_changed',
      data: { ...data, previous_status: change.previousStatus, new_status: change.status },
    };
  }
  return { event: 'application.updated', data };
}

export function resolveInterviewUpdateEvent(change: StatusChange): WebhookEventName {
  if (statusChanged(change)) {
    if (change.status === 'completed') return 'interview.completed';
    if (change.status === 'cancelled') return 'interview.cancelled';
  }
  return 'interview.updated';
}

@Injectable()
export class WebhookEventPublisher {
  constructor(
    private readonly dispatcher: WebhookDispatcherService,
    @Inject(LoggerService)
    private readonly logger: LoggerService,
  ) {}

  applicationCreated(ownerId: string, data: EventData): Promise<string[]> {
    return this.publish('application.created', data, ownerId);
  }

  applicationUpdated(ownerId: string, data: EventData, change: StatusChange): Promise<string[]> {
    const resolved = resolveApplicationUpdateEvent(data, change);
    return this.publish(resolved.event, resolved.data, ownerId);
  }

  applicationDeleted(ownerId: string, data: EventData): Promise<string[]> {
    return this.publish('application.deleted', data, ownerId);
  }

  interviewCreated(ownerId: string, data: EventData): Promise<string[]> {
    return this.publish('interview.created', data, ownerId);
  }

  interviewUpdated(ownerId: string, data: EventData, change: StatusChange): Promise<string[]> {
    return this.publish(resolveInterviewUpdateEvent(change), data, ownerId);
  }

  companyCreated(ownerId: string, data: EventData): Promise<string[]> {
    return this.publish('company.created', data, ownerId);
  }

  private async publish(event: WebhookEventName, data: EventData, ownerId: string): Promise<string[]> {
    try {
      return await this.dispatcher.dispatch(event, data, ownerId);
    } catch (error: unknown) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`[WEBHOOK_DISPATCH] Failed to publish ${event}: ${errorMessage}`, undefined, 'WebhookEventPublisher');
      return [];
    }
  }
}
