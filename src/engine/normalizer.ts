/**
 * Decision normalizer.
 *
 * Turns raw decision-feed events into canonical add/remove operations.
 * Filtered events are dropped silently; malformed events are reported and
 * skipped while the rest of the batch continues.
 */

import { isIP } from 'net';
import {
  Decision,
  DecisionAction,
  DecisionOperation,
  RawDecisionEvent,
  ScopeType,
  SUPPORTED_ACTIONS,
  decisionId,
} from '../domain/decision';
import { DecisionFilters } from '../domain/config';
import { TypedError, malformedDecisionError } from '../domain/errors';

/** Output of one normalization pass. */
export interface NormalizationResult {
  operations: DecisionOperation[];
  rejected: TypedError[];
  /** Events removed by filters or carrying an unsupported action. */
  dropped: number;
}

const SCOPE_ALIASES: Record<string, ScopeType> = {
  ip: ScopeType.Ip,
  range: ScopeType.IpRange,
  ip_range: ScopeType.IpRange,
  country: ScopeType.Country,
  as: ScopeType.AsNumber,
  asn: ScopeType.AsNumber,
  as_number: ScopeType.AsNumber,
};

/** Resolve a feed scope name. */
export function parseScope(scope: string): ScopeType | undefined {
  return SCOPE_ALIASES[scope.trim().toLowerCase()];
}

const MAX_AS_NUMBER = BigInt(4294967295);

/** Validate and canonicalize a value for its scope. Returns undefined when invalid. */
export function canonicalValue(scopeType: ScopeType, raw: string): string | undefined {
  const value = raw.trim();
  switch (scopeType) {
    case ScopeType.Ip:
      return isIP(value) !== 0 ? value.toLowerCase() : undefined;
    case ScopeType.IpRange: {
      const [address, prefix, ...rest] = value.split('/');
      if (rest.length > 0 || prefix === undefined || !/^\d{1,3}$/.test(prefix)) return undefined;
      const family = isIP(address);
      if (family === 0) return undefined;
      const bits = Number(prefix);
      if (bits > (family === 4 ? 32 : 128)) return undefined;
      return `${address.toLowerCase()}/${bits}`;
    }
    case ScopeType.Country:
      return /^[a-zA-Z]{2}$/.test(value) ? value.toUpperCase() : undefined;
    case ScopeType.AsNumber: {
      const digits = value.replace(/^as/i, '');
      if (!/^\d+$/.test(digits)) return undefined;
      // AS numbers are 32-bit; Number() would round anything past 2^53.
      const asn = BigInt(digits);
      return asn <= MAX_AS_NUMBER ? asn.toString() : undefined;
    }
  }
}

/** Whether an event's origin and scenario pass the filters. */
export function passesFilters(event: RawDecisionEvent, filters: DecisionFilters): boolean {
  const origin = event.origin ?? '';
  const scenario = event.scenario ?? '';
  if (filters.origins.length > 0 && !filters.origins.includes(origin)) return false;
  if (
    filters.scenariosContaining.length > 0 &&
    !filters.scenariosContaining.some((needle) => scenario.includes(needle))
  ) {
    return false;
  }
  return !filters.scenariosNotContaining.some((needle) => scenario.includes(needle));
}

function resolveExpiry(event: RawDecisionEvent, now: Date): string | null | undefined {
  if (event.expiresAt) {
    const ts = Date.parse(event.expiresAt);
    return Number.isNaN(ts) ? undefined : new Date(ts).toISOString();
  }
  if (event.durationSeconds !== undefined) {
    if (!Number.isFinite(event.durationSeconds)) return undefined;
    return new Date(now.getTime() + event.durationSeconds * 1000).toISOString();
  }
  return null;
}

/** Normalize a batch of raw events in feed order. */
export function normalizeDecisions(
  events: RawDecisionEvent[],
  filters: DecisionFilters,
  now: Date = new Date(),
): NormalizationResult {
  const operations: DecisionOperation[] = [];
  const rejected: TypedError[] = [];
  let dropped = 0;

  events.forEach((event, position) => {
    if (event.type !== 'add' && event.type !== 'remove') {
      rejected.push(malformedDecisionError(`Unknown decision event type "${event.type}"`, { position, type: event.type }));
      return;
    }
    if (!event.scope || !event.value) {
      rejected.push(malformedDecisionError('Decision event is missing its scope or value', { position, scope: event.scope, value: event.value }));
      return;
    }
    const scopeType = parseScope(event.scope);
    if (!scopeType) {
      rejected.push(malformedDecisionError(`Unsupported decision scope "${event.scope}"`, { position, scope: event.scope }));
      return;
    }
    const value = canonicalValue(scopeType, event.value);
    if (!value) {
      rejected.push(malformedDecisionError(`Invalid ${scopeType} value "${event.value}"`, { position, scope: scopeType, value: event.value }));
      return;
    }
    const id = decisionId(scopeType, value);

    if (!passesFilters(event, filters)) {
      dropped++;
      return;
    }

    if (event.type === 'remove') {
      operations.push({ kind: 'remove', decisionId: id, scopeType, value });
      return;
    }

    const action = SUPPORTED_ACTIONS.find((a) => a === event.action?.toLowerCase());
    if (!action) {
      dropped++;
      return;
    }

    const expiresAt = resolveExpiry(event, now);
    if (expiresAt === undefined) {
      rejected.push({ ...malformedDecisionError(`Invalid expiry on ${id}`, { position, expiresAt: event.expiresAt }), decisionId: id });
      return;
    }
    if (expiresAt !== null && Date.parse(expiresAt) <= now.getTime()) {
      operations.push({ kind: 'remove', decisionId: id, scopeType, value });
      return;
    }

    const decision: Decision = {
      id,
      scopeType,
      value,
      action: action satisfies DecisionAction,
      origin: event.origin ?? '',
      scenario: event.scenario ?? '',
      expiresAt,
      receivedAt: now.toISOString(),
    };
    operations.push({ kind: 'add', decision });
  });

  return { operations, rejected, dropped };
}

/**
 * Fold operations into a desired decision map. With `replace`, the map is
 * rebuilt from the operations alone (full pull).
 */
export function applyOperations(
  current: Map<string, Decision>,
  operations: DecisionOperation[],
  replace = false,
): Map<string, Decision> {
  const next = replace ? new Map<string, Decision>() : new Map(current);
  for (const op of operations) {
    if (op.kind === 'add') {
      next.delete(op.decision.id);
      next.set(op.decision.id, op.decision);
    } else {
      next.delete(op.decisionId);
    }
  }
  return next;
}

/** Drop decisions whose expiry has passed. */
export function pruneExpired(decisions: Map<string, Decision>, now: Date = new Date()): string[] {
  const expired: string[] = [];
  for (const [id, decision] of decisions) {
    if (decision.expiresAt !== null && Date.parse(decision.expiresAt) <= now.getTime()) {
      decisions.delete(id);
      expired.push(id);
    }
  }
  return expired;
}
