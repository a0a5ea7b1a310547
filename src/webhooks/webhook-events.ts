/**
 * Closed catalog of events an endpoint can subscribe to.
 * Adding an event is a code change; endpoints cannot subscribe to anything else.
 */

export const WEBHOOK_EVENTS = [
  { name: 'application.created', description: 'Application Created' },
  { name: 'application.updated', description: 'Application Updated' },
  { name: 'application.deleted', description: 'Application Deleted' },
  { name: 'application.status_changed', description: 'Application Status Changed' },
  { name: 'interview.created', description: 'Interview Created' },
  { name: 'interview.updated', description: 'Interview Updated' },
  { name: 'interview.completed', description: 'Interview Completed' },
  { name: 'interview.cancelled', description: 'Interview Cancelled' },
  { name: 'company.created', description: 'Company Created' },
] as const;

export type WebhookEventName = (typeof WEBHOOK_EVENTS)[number]['name'];

export const WEBHOOK_EVENT_NAMES: readonly WebhookEventName[] = WEBHOOK_EVENTS.map((e) => e.name);

export function isWebhookEventName(value: string): value is WebhookEventName {
  return WEBHOOK_EVENT_NAMES.some((name) => name === value);
}
