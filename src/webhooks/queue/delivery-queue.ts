/**
 * Work queue carrying delivery ids to the delivery worker.
 * At-least-once: a delivery id may arrive more than once, and the worker's
 * claim step makes repeats harmless.
 */
export abstract class DeliveryQueue {
  /**
   * @param delayMs run no earlier than this many milliseconds from now
   */
  abstract enqueue(deliveryId: string, delayMs?: number): Promise<void>;
}

export interface DeliveryJobData {
  deliveryId: string;
}
