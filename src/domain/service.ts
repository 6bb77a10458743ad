/**
 * Service state domain model.
 *
 * Describes what the engine believes is enforced on one remote service:
 * its versions, its capacity-bounded containers, and the digests of the
 * logic snippets it owns.
 */

import { DecisionAction } from './decision';

/** Remote access-control primitive kinds. */
export enum ContainerKind {
  BlockList = 'block-list',
  CaptchaList = 'captcha-list',
  CountryList = 'country-list',
  AsnList = 'asn-list',
}

export const CONTAINER_KINDS: readonly ContainerKind[] = [
  ContainerKind.BlockList,
  ContainerKind.CaptchaList,
  ContainerKind.CountryList,
  ContainerKind.AsnList,
];

/** Short name used when naming remote containers. */
export const CONTAINER_KIND_SLUG: Record<ContainerKind, string> = {
  [ContainerKind.BlockList]: 'block',
  [ContainerKind.CaptchaList]: 'captcha',
  [ContainerKind.CountryList]: 'country',
  [ContainerKind.AsnList]: 'asn',
};

/** Whether entries of this kind carry the action as their value (edge dictionaries). */
export function isDictionaryKind(kind: ContainerKind): boolean {
  return kind === ContainerKind.CountryList || kind === ContainerKind.AsnList;
}

/** One capacity-bounded container on one service. */
export interface EnforcementContainer {
  /** Remote identifier. Empty until the container has been created remotely. */
  id: string;
  name: string;
  serviceId: string;
  kind: ContainerKind;
  /** Creation order within its kind. */
  index: number;
  capacity: number;
  /** Decision id → action. */
  members: Map<string, DecisionAction>;
  /** True while the container only exists on a version that has not been activated. */
  provisional: boolean;
}

/** Version lifecycle phases within one cycle. */
export enum VersionPhase {
  Idle = 'idle',
  Cloned = 'cloned',
  Mutating = 'mutating',
  ReadyToActivate = 'ready_to_activate',
  Active = 'active',
  Failed = 'failed',
}

/** Valid version phase transitions. */
export const VALID_VERSION_TRANSITIONS: Record<VersionPhase, VersionPhase[]> = {
  [VersionPhase.Idle]: [VersionPhase.Cloned, VersionPhase.Mutating, VersionPhase.ReadyToActivate, VersionPhase.Failed],
  [VersionPhase.Cloned]: [VersionPhase.Mutating, VersionPhase.Failed],
  [VersionPhase.Mutating]: [VersionPhase.ReadyToActivate, VersionPhase.Failed],
  [VersionPhase.ReadyToActivate]: [VersionPhase.Active, VersionPhase.Failed],
  [VersionPhase.Active]: [],
  [VersionPhase.Failed]: [],
};

/** In-memory model of one remote service. */
export interface ServiceState {
  serviceId: string;
  accountId: string;
  /** Last known active version; null until read from the remote. */
  activeVersion: number | null;
  /** Version being mutated, kept across cycles while not activated. */
  workingVersion: number | null;
  /** The working version has all mutations applied and awaits activation. */
  pendingActivation: boolean;
  lastActivatedVersion: number | null;
  /** Phase the last cycle ended in. */
  phase: VersionPhase;
  containers: EnforcementContainer[];
  /** Snippet name → sha256 of the content last written. */
  snippetDigests: Record<string, string>;
  /** Signing secret for captcha cookies; generated once and persisted. */
  captchaSecret: string;
  lastFullReconcileAt: string | null;
}

/** Create an empty state for a service that has never been synchronized. */
export function createServiceState(serviceId: string, accountId: string, captchaSecret: string): ServiceState {
  return {
    serviceId,
    accountId,
    activeVersion: null,
    workingVersion: null,
    pendingActivation: false,
    lastActivatedVersion: null,
    phase: VersionPhase.Idle,
    containers: [],
    snippetDigests: {},
    captchaSecret,
    lastFullReconcileAt: null,
  };
}

/** Containers of one kind in creation order. */
export function containersOfKind(state: ServiceState, kind: ContainerKind): EnforcementContainer[] {
  return state.containers
    .filter((c) => c.kind === kind)
    .sort((a, b) => a.index - b.index);
}

/** Deep copy of a container list; member maps are not shared. */
export function cloneContainers(containers: EnforcementContainer[]): EnforcementContainer[] {
  return containers.map((c) => ({ ...c, members: new Map(c.members) }));
}
