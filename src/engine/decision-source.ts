/**
 * Decision source capability.
 *
 * The engine pulls decision events; a full pull returns every currently
 * active decision, an incremental pull only what changed since the last one.
 */

import { RawDecisionEvent } from '../domain/decision';

export interface PullOptions {
  full: boolean;
}

export interface DecisionSource {
  pull(options: PullOptions): Promise<RawDecisionEvent[]>;
}

/**
 * Serves queued batches, one per pull. A full pull returns the snapshot set
 * with `setSnapshot` when one exists.
 */
export class StaticDecisionSource implements DecisionSource {
  private batches: RawDecisionEvent[][] = [];
  private snapshot: RawDecisionEvent[] | null = null;
  private failure: Error | null = null;
  readonly pulls: PullOptions[] = [];

  /** Queue a batch for a later pull. */
  push(...events: RawDecisionEvent[]): this {
    this.batches.push(events);
    return this;
  }

  /** Events returned by full pulls. */
  setSnapshot(events: RawDecisionEvent[]): this {
    this.snapshot = events;
    return this;
  }

  /** Make the next pull fail. */
  failNextPull(error: Error): this {
    this.failure = error;
    return this;
  }

  async pull(options: PullOptions): Promise<RawDecisionEvent[]> {
    this.pulls.push({ ...options });
    if (this.failure) {
      const error = this.failure;
      this.failure = null;
      throw error;
    }
    if (options.full && this.snapshot) {
      this.batches = [];
      return [...this.snapshot];
    }
    return this.batches.shift() ?? [];
  }
}
