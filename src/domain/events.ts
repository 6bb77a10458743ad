/**
 * Synchronization event domain model.
 *
 * Every version transition and cycle outcome is emitted as a versioned
 * event so that operators and tooling can follow what the engine did.
 */

/** Event types emitted by the engine. */
export type SyncEventType =
  | 'version.transition'
  | 'cycle.completed'
  | 'cycle.failed'
  | 'cycle.skipped'
  | 'decision.rejected'
  | 'drift.detected'
  | 'service.unavailable'
  | 'cache.saved';

/** An event with stable schema. */
export interface SyncEvent {
  id: string;
  type: SyncEventType;
  /** Event schema version for forward compatibility. */
  schemaVersion: string;
  timestamp: string;
  accountId?: string;
  serviceId?: string;
  /** Identifier of the cycle that produced the event. */
  cycleId?: string;
  payload: Record<string, unknown>;
}

/** Event stream subscription. */
export interface EventSubscription {
  id: string;
  /** Only events for this service. */
  serviceId?: string;
  /** Filter by event types. */
  eventTypes?: SyncEventType[];
  callback: (event: SyncEvent) => void;
}
