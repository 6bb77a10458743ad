/**
 * Sync event publisher.
 *
 * Emits versioned engine events to subscribers and keeps a bounded
 * in-memory history that the status API serves.
 */

import { v4 as uuid } from 'uuid';
import { EventSubscription, SyncEvent, SyncEventType } from '../domain/events';
import { logger } from '../logger';

const SCHEMA_VERSION = '1.0.0';
const DEFAULT_HISTORY_LIMIT = 500;

/** Fields of an event the caller provides. */
export interface PublishInput {
  type: SyncEventType;
  accountId?: string;
  serviceId?: string;
  cycleId?: string;
  payload?: Record<string, unknown>;
}

export class SyncEventPublisher {
  private subscriptions: EventSubscription[] = [];
  private history: SyncEvent[] = [];
  private readonly log = logger.child({ module: 'publisher' });

  constructor(private readonly historyLimit: number = DEFAULT_HISTORY_LIMIT) {}

  /** Publish an event. */
  publish(input: PublishInput): SyncEvent {
    const event: SyncEvent = {
      id: `evt_${uuid()}`,
      type: input.type,
      schemaVersion: SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      accountId: input.accountId,
      serviceId: input.serviceId,
      cycleId: input.cycleId,
      payload: input.payload ?? {},
    };

    this.history.push(event);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }

    for (const sub of this.subscriptions) {
      if (!this.matchesSubscription(event, sub)) continue;
      try {
        sub.callback(event);
      } catch (err) {
        // A failing subscriber must not affect the cycle that published.
        this.log.warn('Event subscriber failed', {
          subscriptionId: sub.id,
          eventType: event.type,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    return event;
  }

  /** Subscribe to events. Returns the unsubscribe function. */
  subscribe(subscription: Omit<EventSubscription, 'id'> & { id?: string }): () => void {
    const sub: EventSubscription = { ...subscription, id: subscription.id ?? `sub_${uuid()}` };
    this.subscriptions.push(sub);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== sub.id);
    };
  }

  /** Most recent events, newest last. */
  recent(limit = 50, serviceId?: string): SyncEvent[] {
    const matching = serviceId ? this.history.filter((e) => e.serviceId === serviceId) : this.history;
    return matching.slice(-limit);
  }

  private matchesSubscription(event: SyncEvent, sub: EventSubscription): boolean {
    if (sub.serviceId && event.serviceId !== sub.serviceId) return false;
    if (sub.eventTypes?.length && !sub.eventTypes.includes(event.type)) return false;
    return true;
  }
}
