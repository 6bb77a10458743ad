/**
 * Decision domain model.
 *
 * A decision is a scoped instruction to block or challenge traffic. The
 * decision engine emits add/remove events; the normalizer turns them into
 * canonical operations keyed by `(scopeType, value)`.
 */

/** What a decision applies to. */
export enum ScopeType {
  Ip = 'ip',
  IpRange = 'ip_range',
  Country = 'country',
  AsNumber = 'as_number',
}

/** Enforcement action. */
export enum DecisionAction {
  Ban = 'ban',
  Captcha = 'captcha',
}

export const SUPPORTED_ACTIONS: readonly DecisionAction[] = [DecisionAction.Ban, DecisionAction.Captcha];

/** Canonical decision record. */
export interface Decision {
  /** `<scopeType>:<value>`, unique per decision. */
  id: string;
  scopeType: ScopeType;
  value: string;
  action: DecisionAction;
  origin: string;
  scenario: string;
  /** ISO timestamp; null means permanent. */
  expiresAt: string | null;
  receivedAt: string;
}

/** Raw event as delivered by the decision feed. */
export interface RawDecisionEvent {
  /** `add` or `remove`; feeds are untyped JSON, so anything else is malformed. */
  type: string;
  scope?: string;
  value?: string;
  action?: string;
  origin?: string;
  scenario?: string;
  /** Absolute expiry (ISO timestamp). */
  expiresAt?: string | null;
  /** Relative expiry in seconds, used when `expiresAt` is absent. */
  durationSeconds?: number;
}

/** A normalized mutation of the desired decision set. */
export type DecisionOperation =
  | { kind: 'add'; decision: Decision }
  | { kind: 'remove'; decisionId: string; scopeType: ScopeType; value: string };

/** Build the identifier of a decision. */
export function decisionId(scopeType: ScopeType, value: string): string {
  return `${scopeType}:${value}`;
}

/** Split an identifier back into scope and value. Returns undefined for foreign ids. */
export function parseDecisionId(id: string): { scopeType: ScopeType; value: string } | undefined {
  const sep = id.indexOf(':');
  if (sep <= 0) return undefined;
  const scope = id.slice(0, sep);
  const scopeType = Object.values(ScopeType).find((s) => s === scope);
  if (!scopeType) return undefined;
  return { scopeType, value: id.slice(sep + 1) };
}

/** Whether the decision targets client addresses (as opposed to geo/network attributes). */
export function isAddressScope(scopeType: ScopeType): boolean {
  return scopeType === ScopeType.Ip || scopeType === ScopeType.IpRange;
}
