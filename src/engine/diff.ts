/**
 * Diff engine.
 *
 * Compares the enforced container layout with the desired one and produces
 * a staged plan: containers to create, per-container removals and additions,
 * and snippets whose content changed. The comparison runs against cached
 * state, never against a fresh remote read.
 */

import { DecisionAction, parseDecisionId } from '../domain/decision';
import { EnforcementContainer, isDictionaryKind } from '../domain/service';
import { ContainerEntry, EdgeSnippet } from '../edge/edge-api';
import { snippetDigest } from './snippets';

/** One member moving in or out of a container. */
export interface MemberChange {
  decisionId: string;
  action: DecisionAction;
}

export interface MemberDiff {
  toAdd: MemberChange[];
  toRemove: MemberChange[];
}

/** Changes to one container. */
export interface ContainerChange {
  container: EnforcementContainer;
  toAdd: MemberChange[];
  toRemove: MemberChange[];
}

/** Everything one service needs to reach the desired state. */
export interface ServicePlan {
  /** Desired layout after the plan is applied. */
  desired: EnforcementContainer[];
  /** Containers that must be created remotely. */
  create: EnforcementContainer[];
  /** Containers with entry changes, in layout order. */
  changes: ContainerChange[];
  /** Snippets whose digest differs from the recorded one. */
  snippets: EdgeSnippet[];
}

/**
 * Set difference of two member maps. A member present on both sides with a
 * different action is removed and re-added.
 */
export function diffMembers(
  oldMembers: Map<string, DecisionAction>,
  newMembers: Map<string, DecisionAction>,
): MemberDiff {
  const toAdd: MemberChange[] = [];
  const toRemove: MemberChange[] = [];

  for (const [decisionId, action] of oldMembers) {
    const next = newMembers.get(decisionId);
    if (next === undefined || next !== action) toRemove.push({ decisionId, action });
  }
  for (const [decisionId, action] of newMembers) {
    const prev = oldMembers.get(decisionId);
    if (prev === undefined || prev !== action) toAdd.push({ decisionId, action });
  }

  return { toAdd, toRemove };
}

/** Apply a diff to a member map: removals first, then additions. */
export function applyMemberDiff(
  members: Map<string, DecisionAction>,
  diff: MemberDiff,
): Map<string, DecisionAction> {
  const result = new Map(members);
  for (const change of diff.toRemove) result.delete(change.decisionId);
  for (const change of diff.toAdd) result.set(change.decisionId, change.action);
  return result;
}

/** Build the staged plan for one service. */
export function buildPlan(
  current: EnforcementContainer[],
  desired: EnforcementContainer[],
  renderedSnippets: EdgeSnippet[],
  snippetDigests: Record<string, string>,
): ServicePlan {
  const currentByName = new Map(current.map((c) => [c.name, c]));
  const create: EnforcementContainer[] = [];
  const changes: ContainerChange[] = [];

  for (const container of desired) {
    const existing = currentByName.get(container.name);
    if (!existing) create.push(container);
    const diff = diffMembers(existing?.members ?? new Map(), container.members);
    if (diff.toAdd.length > 0 || diff.toRemove.length > 0) {
      changes.push({ container, ...diff });
    }
  }

  const snippets = renderedSnippets.filter((s) => snippetDigests[s.name] !== snippetDigest(s));

  return { desired, create, changes, snippets };
}

export function isPlanEmpty(plan: ServicePlan): boolean {
  return plan.create.length === 0 && plan.changes.length === 0 && plan.snippets.length === 0;
}

/** Whether applying the plan edits versioned configuration. */
export function planNeedsVersion(plan: ServicePlan): boolean {
  return plan.create.length > 0 || plan.snippets.length > 0;
}

/** Remote entry for a member of a container of the given kind. */
export function toEntry(change: MemberChange, container: Pick<EnforcementContainer, 'kind'>): ContainerEntry {
  const value = parseDecisionId(change.decisionId)?.value ?? change.decisionId;
  return isDictionaryKind(container.kind) ? { value, action: change.action } : { value };
}

/** Count of member changes across a plan. */
export function countChanges(plan: ServicePlan): { added: number; removed: number } {
  let added = 0;
  let removed = 0;
  for (const change of plan.changes) {
    added += change.toAdd.length;
    removed += change.toRemove.length;
  }
  return { added, removed };
}
