/**
 * Capacity-aware partitioner.
 *
 * Places each decision into one of a service's fixed-capacity containers.
 * Existing placements are kept, freed slots are reused before a new
 * container is allocated, and the per-kind container count is bounded.
 */

import { Decision, DecisionAction, ScopeType } from '../domain/decision';
import {
  CONTAINER_KIND_SLUG,
  ContainerKind,
  EnforcementContainer,
  ServiceState,
  cloneContainers,
} from '../domain/service';
import { TypedError, capacityExhaustedError } from '../domain/errors';

/** Bounds applied to one service. */
export interface PartitionLimits {
  serviceId: string;
  /** Entries per container. */
  capacity: number;
  /** Containers per kind. */
  maxContainers: number;
  namePrefix: string;
}

export type AssignResult =
  | { success: true; container: EnforcementContainer; created: boolean }
  | { success: false; error: TypedError };

/** Output of a full partitioning pass. */
export interface PartitionResult {
  containers: EnforcementContainer[];
  rejected: TypedError[];
}

/** The container kind a decision is enforced through. */
export function containerKindFor(decision: Pick<Decision, 'scopeType' | 'action'>): ContainerKind {
  switch (decision.scopeType) {
    case ScopeType.Country:
      return ContainerKind.CountryList;
    case ScopeType.AsNumber:
      return ContainerKind.AsnList;
    default:
      return decision.action === DecisionAction.Captcha ? ContainerKind.CaptchaList : ContainerKind.BlockList;
  }
}

/** Remote name of a container. */
export function containerName(prefix: string, kind: ContainerKind, index: number): string {
  return `${prefix}_${CONTAINER_KIND_SLUG[kind]}_${index}`;
}

/** A cached container never takes more than the configured capacity, even if it was created larger. */
function effectiveCapacity(container: EnforcementContainer, limits: PartitionLimits): number {
  return Math.min(container.capacity, limits.capacity);
}

/** Assign a decision to a container, allocating one if every container of its kind is full. */
export function assignDecision(
  decision: Decision,
  state: Pick<ServiceState, 'containers'>,
  limits: PartitionLimits,
): AssignResult {
  const kind = containerKindFor(decision);
  const ofKind = state.containers.filter((c) => c.kind === kind).sort((a, b) => a.index - b.index);

  const holder = ofKind.find((c) => c.members.has(decision.id));
  if (holder) {
    holder.members.set(decision.id, decision.action);
    return { success: true, container: holder, created: false };
  }

  const withRoom = ofKind.find((c) => c.members.size < effectiveCapacity(c, limits));
  if (withRoom) {
    withRoom.members.set(decision.id, decision.action);
    return { success: true, container: withRoom, created: false };
  }

  if (ofKind.length >= limits.maxContainers) {
    return {
      success: false,
      error: capacityExhaustedError(limits.serviceId, decision.id, kind, limits.maxContainers, limits.capacity),
    };
  }

  const index = ofKind.length === 0 ? 0 : ofKind[ofKind.length - 1].index + 1;
  const container: EnforcementContainer = {
    id: '',
    name: containerName(limits.namePrefix, kind, index),
    serviceId: limits.serviceId,
    kind,
    index,
    capacity: limits.capacity,
    members: new Map([[decision.id, decision.action]]),
    provisional: true,
  };
  state.containers.push(container);
  return { success: true, container, created: true };
}

/** Remove a decision from whichever container holds it. */
export function releaseDecision(id: string, state: Pick<ServiceState, 'containers'>): boolean {
  for (const container of state.containers) {
    if (container.members.delete(id)) return true;
  }
  return false;
}

/**
 * Compute the container layout for a desired decision set. Works on a copy:
 * every stale, misplaced or over-capacity member is released first so its
 * slot can be reused, then decisions are assigned in map order.
 */
export function partitionDecisions(
  current: EnforcementContainer[],
  desired: Map<string, Decision>,
  limits: PartitionLimits,
): PartitionResult {
  const working = { containers: cloneContainers(current) };
  const rejected: TypedError[] = [];

  for (const container of working.containers) {
    for (const id of [...container.members.keys()]) {
      const decision = desired.get(id);
      if (!decision || containerKindFor(decision) !== container.kind) {
        container.members.delete(id);
      }
    }
    // Capacity lowered since this container was filled: the overflow is re-placed.
    for (const id of [...container.members.keys()].slice(effectiveCapacity(container, limits))) {
      container.members.delete(id);
    }
  }

  for (const decision of desired.values()) {
    const result = assignDecision(decision, working, limits);
    if (!result.success) rejected.push(result.error);
  }

  return { containers: working.containers, rejected };
}
