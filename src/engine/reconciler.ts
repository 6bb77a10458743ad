/**
 * Full reconciliation against the remote service.
 *
 * Incremental cycles diff against cached state only. Periodically, and
 * whenever a service has no cached state, the engine reads what the remote
 * actually holds, reports every discrepancy as drift and adopts the remote
 * truth before the next diff.
 */

import { DecisionAction, ScopeType, decisionId } from '../domain/decision';
import { RetryPolicy } from '../domain/config';
import {
  CONTAINER_KINDS,
  CONTAINER_KIND_SLUG,
  ContainerKind,
  EnforcementContainer,
  ServiceState,
} from '../domain/service';
import { ContainerEntry, EdgeApi, RemoteContainer } from '../edge/edge-api';
import { Logger } from '../logger';
import { callRemote } from './retry';

export type DriftKind =
  | 'active_version_changed'
  | 'container_missing'
  | 'container_adopted'
  | 'entry_added'
  | 'entry_removed'
  | 'entry_changed';

/** One discrepancy between cached and remote state. */
export interface DriftRecord {
  kind: DriftKind;
  container?: string;
  decisionId?: string;
  cached?: string | number | null;
  remote?: string | number | null;
}

export interface ReconcileOptions {
  api: EdgeApi;
  retry: RetryPolicy;
  namePrefix: string;
  /** Capacity given to adopted containers. */
  containerCapacity: number;
  shouldAbort?: () => boolean;
  log: Logger;
  now?: Date;
}

export interface ReconcileResult {
  drift: DriftRecord[];
  /** Remote read calls made. */
  reads: number;
}

/** Parse an engine-owned container name back into kind and index. */
export function parseContainerName(prefix: string, name: string): { kind: ContainerKind; index: number } | undefined {
  if (!name.startsWith(`${prefix}_`)) return undefined;
  const rest = name.slice(prefix.length + 1);
  const sep = rest.lastIndexOf('_');
  if (sep <= 0) return undefined;
  const slug = rest.slice(0, sep);
  const index = rest.slice(sep + 1);
  if (!/^\d+$/.test(index)) return undefined;
  const kind = CONTAINER_KINDS.find((k) => CONTAINER_KIND_SLUG[k] === slug);
  return kind === undefined ? undefined : { kind, index: Number(index) };
}

const DICTIONARY_SCOPES: Partial<Record<ContainerKind, ScopeType>> = {
  [ContainerKind.CountryList]: ScopeType.Country,
  [ContainerKind.AsnList]: ScopeType.AsNumber,
};

/** Map a remote entry to the decision it enforces. Undefined for entries the engine cannot own. */
export function entryToMember(kind: ContainerKind, entry: ContainerEntry): [string, DecisionAction] | undefined {
  const dictionaryScope = DICTIONARY_SCOPES[kind];
  if (dictionaryScope !== undefined) {
    const action = Object.values(DecisionAction).find((a) => a === entry.action);
    return action === undefined ? undefined : [decisionId(dictionaryScope, entry.value), action];
  }
  const scopeType = entry.value.includes('/') ? ScopeType.IpRange : ScopeType.Ip;
  const action = kind === ContainerKind.CaptchaList ? DecisionAction.Captcha : DecisionAction.Ban;
  return [decisionId(scopeType, entry.value), action];
}

/**
 * Replace the cached view of a service with what the remote holds. Mutates
 * `state` and returns the discrepancies found.
 */
export async function reconcileService(state: ServiceState, options: ReconcileOptions): Promise<ReconcileResult> {
  const { api, log } = options;
  const drift: DriftRecord[] = [];
  let reads = 0;
  const read = <T>(operation: string, fn: () => Promise<T>): Promise<T> => {
    reads++;
    return callRemote(fn, {
      serviceId: state.serviceId,
      operation,
      policy: options.retry,
      shouldAbort: options.shouldAbort,
      log,
    });
  };

  const activeVersion = await read('readActiveVersion', () => api.readActiveVersion(state.serviceId));
  if (state.activeVersion !== null && state.activeVersion !== activeVersion) {
    drift.push({ kind: 'active_version_changed', cached: state.activeVersion, remote: activeVersion });
    if (state.workingVersion !== null) {
      // Someone else activated a version: the working version is stale.
      log.warn('Dropping working version after remote activation', { workingVersion: state.workingVersion });
      state.workingVersion = null;
      state.pendingActivation = false;
    }
  }
  state.activeVersion = activeVersion;

  const version = state.workingVersion ?? activeVersion;
  const remoteContainers = await read('listContainers', () => api.listContainers(state.serviceId, version));
  const owned: Array<{ remote: RemoteContainer; kind: ContainerKind; index: number }> = [];
  for (const remote of remoteContainers) {
    const parsed = parseContainerName(options.namePrefix, remote.name);
    if (parsed && parsed.kind === remote.kind) owned.push({ remote, ...parsed });
  }

  const cachedByName = new Map(state.containers.map((c) => [c.name, c]));
  const containers: EnforcementContainer[] = [];

  for (const { remote, kind, index } of owned) {
    const entries = await read('readContainer', () => api.readContainer(state.serviceId, remote.id));
    const members = new Map<string, DecisionAction>();
    for (const entry of entries) {
      const member = entryToMember(kind, entry);
      if (!member) {
        log.warn('Ignoring remote entry the engine cannot map', { container: remote.name, value: entry.value });
        continue;
      }
      members.set(member[0], member[1]);
    }

    const cached = cachedByName.get(remote.name);
    cachedByName.delete(remote.name);
    if (!cached) {
      drift.push({ kind: 'container_adopted', container: remote.name });
    } else {
      drift.push(...diffContainerMembers(remote.name, cached.members, members));
    }

    containers.push({
      id: remote.id,
      name: remote.name,
      serviceId: state.serviceId,
      kind,
      index,
      capacity: Math.max(options.containerCapacity, members.size),
      members,
      provisional: cached?.provisional ?? version !== activeVersion,
    });
  }

  for (const missing of cachedByName.values()) {
    if (missing.id === '') continue;
    drift.push({ kind: 'container_missing', container: missing.name });
  }

  for (const record of drift) {
    log.warn('Drift detected', { ...record });
  }

  // Snippets are not read back. When the version under them changed or lost
  // a container, the recorded digests no longer describe it, so the next
  // plan rewrites every snippet.
  if (drift.some((d) => d.kind === 'active_version_changed' || d.kind === 'container_missing')) {
    state.snippetDigests = {};
  }

  state.containers = containers.sort((a, b) => a.kind.localeCompare(b.kind) || a.index - b.index);
  state.lastFullReconcileAt = (options.now ?? new Date()).toISOString();
  return { drift, reads };
}

function diffContainerMembers(
  container: string,
  cached: Map<string, DecisionAction>,
  remote: Map<string, DecisionAction>,
): DriftRecord[] {
  const drift: DriftRecord[] = [];
  for (const [id, action] of cached) {
    const remoteAction = remote.get(id);
    if (remoteAction === undefined) {
      drift.push({ kind: 'entry_removed', container, decisionId: id, cached: action, remote: null });
    } else if (remoteAction !== action) {
      drift.push({ kind: 'entry_changed', container, decisionId: id, cached: action, remote: remoteAction });
    }
  }
  for (const [id, action] of remote) {
    if (!cached.has(id)) {
      drift.push({ kind: 'entry_added', container, decisionId: id, cached: null, remote: action });
    }
  }
  return drift;
}
