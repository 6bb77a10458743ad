/**
 * In-memory EdgeApi implementation.
 *
 * Reference implementation for development and testing. Models versioned
 * service configuration the way CDNs expose it: activated versions are
 * locked, containers and snippets belong to versions and follow clones,
 * container entries are shared by every version that sees the container.
 */

import { ContainerKind } from '../domain/service';
import {
  ContainerEntry,
  EdgeApi,
  EdgeApiError,
  EdgeSnippet,
  RemoteContainer,
} from './edge-api';

/** Operations that can be observed and failed on purpose. */
export type EdgeOperation =
  | 'readActiveVersion'
  | 'cloneVersion'
  | 'listContainers'
  | 'createContainer'
  | 'readContainer'
  | 'writeContainer'
  | 'updateSnippet'
  | 'activateVersion';

const MUTATING_OPERATIONS = new Set<EdgeOperation>([
  'cloneVersion',
  'createContainer',
  'writeContainer',
  'updateSnippet',
  'activateVersion',
]);

/** A recorded call. */
export interface EdgeCall {
  operation: EdgeOperation;
  serviceId: string;
  args: Record<string, unknown>;
}

interface StoredContainer {
  id: string;
  name: string;
  kind: ContainerKind;
  versions: Set<number>;
  entries: Map<string, string | undefined>;
}

interface StoredService {
  activeVersion: number;
  latestVersion: number;
  locked: Set<number>;
  containers: Map<string, StoredContainer>;
  /** version → snippet name → snippet */
  snippets: Map<number, Map<string, EdgeSnippet>>;
}

interface InjectedFailure {
  operation: EdgeOperation;
  error: EdgeApiError;
  remaining: number;
}

export class MemoryEdgeApi implements EdgeApi {
  readonly calls: EdgeCall[] = [];
  private services = new Map<string, StoredService>();
  private failures: InjectedFailure[] = [];
  private nextContainerId = 1;

  /**
   * Register a service whose active version is `activeVersion`. With
   * `editableActive` the active version accepts edits, as on accounts that
   * permit in-place changes.
   */
  addService(serviceId: string, activeVersion = 1, options: { editableActive?: boolean } = {}): this {
    const locked = new Set<number>();
    for (let v = 1; v <= activeVersion; v++) locked.add(v);
    if (options.editableActive) locked.delete(activeVersion);
    this.services.set(serviceId, {
      activeVersion,
      latestVersion: activeVersion,
      locked,
      containers: new Map(),
      snippets: new Map([[activeVersion, new Map()]]),
    });
    return this;
  }

  /** Make the next `times` calls of an operation throw `error`. */
  failNext(operation: EdgeOperation, error: EdgeApiError, times = 1): this {
    this.failures.push({ operation, error, remaining: times });
    return this;
  }

  clearFailures(): void {
    this.failures = [];
  }

  /** Calls that change remote state. */
  mutationCalls(): EdgeCall[] {
    return this.calls.filter((c) => MUTATING_OPERATIONS.has(c.operation));
  }

  /** Calls that only read remote state. */
  readCalls(): EdgeCall[] {
    return this.calls.filter((c) => !MUTATING_OPERATIONS.has(c.operation));
  }

  resetCalls(): void {
    this.calls.length = 0;
  }

  activeVersionOf(serviceId: string): number {
    return this.service(serviceId).activeVersion;
  }

  /** Entries of a container by name, as value → action. */
  entriesOf(serviceId: string, containerName: string): Map<string, string | undefined> {
    for (const c of this.service(serviceId).containers.values()) {
      if (c.name === containerName) return new Map(c.entries);
    }
    throw new Error(`Unknown container ${containerName}`);
  }

  containerNamesOn(serviceId: string, version: number): string[] {
    return [...this.service(serviceId).containers.values()]
      .filter((c) => c.versions.has(version))
      .map((c) => c.name)
      .sort();
  }

  snippetOn(serviceId: string, version: number, name: string): EdgeSnippet | undefined {
    return this.service(serviceId).snippets.get(version)?.get(name);
  }

  /** Simulate a change made outside the engine. */
  tamperEntries(serviceId: string, containerName: string, add: ContainerEntry[], remove: string[]): void {
    for (const c of this.service(serviceId).containers.values()) {
      if (c.name !== containerName) continue;
      for (const value of remove) c.entries.delete(value);
      for (const entry of add) c.entries.set(entry.value, entry.action);
    }
  }

  async readActiveVersion(serviceId: string): Promise<number> {
    this.record('readActiveVersion', serviceId, {});
    return this.service(serviceId).activeVersion;
  }

  async cloneVersion(serviceId: string, sourceVersion: number): Promise<number> {
    this.record('cloneVersion', serviceId, { sourceVersion });
    const svc = this.service(serviceId);
    if (sourceVersion > svc.latestVersion) {
      throw new EdgeApiError('not_found', `Version ${sourceVersion} does not exist`, 404);
    }
    const version = ++svc.latestVersion;
    for (const c of svc.containers.values()) {
      if (c.versions.has(sourceVersion)) c.versions.add(version);
    }
    svc.snippets.set(version, new Map(svc.snippets.get(sourceVersion) ?? []));
    return version;
  }

  async listContainers(serviceId: string, version: number): Promise<RemoteContainer[]> {
    this.record('listContainers', serviceId, { version });
    return [...this.service(serviceId).containers.values()]
      .filter((c) => c.versions.has(version))
      .map((c) => ({ id: c.id, name: c.name, kind: c.kind }));
  }

  async createContainer(serviceId: string, version: number, name: string, kind: ContainerKind): Promise<RemoteContainer> {
    this.record('createContainer', serviceId, { version, name, kind });
    const svc = this.service(serviceId);
    this.assertEditable(svc, version);
    for (const c of svc.containers.values()) {
      if (c.name === name && c.versions.has(version)) {
        throw new EdgeApiError('conflict', `Container ${name} already exists on version ${version}`, 409);
      }
    }
    const stored: StoredContainer = {
      id: `ctr_${this.nextContainerId++}`,
      name,
      kind,
      versions: new Set([version]),
      entries: new Map(),
    };
    svc.containers.set(stored.id, stored);
    return { id: stored.id, name, kind };
  }

  async readContainer(serviceId: string, containerId: string): Promise<ContainerEntry[]> {
    this.record('readContainer', serviceId, { containerId });
    const c = this.container(serviceId, containerId);
    return [...c.entries.entries()].map(([value, action]) => (action === undefined ? { value } : { value, action }));
  }

  async writeContainer(
    serviceId: string,
    containerId: string,
    additions: ContainerEntry[],
    removals: ContainerEntry[],
  ): Promise<void> {
    this.record('writeContainer', serviceId, {
      containerId,
      additions: additions.map((e) => e.value),
      removals: removals.map((e) => e.value),
    });
    const c = this.container(serviceId, containerId);
    for (const entry of removals) c.entries.delete(entry.value);
    for (const entry of additions) c.entries.set(entry.value, entry.action);
  }

  async updateSnippet(serviceId: string, version: number, snippet: EdgeSnippet): Promise<void> {
    this.record('updateSnippet', serviceId, { version, name: snippet.name });
    const svc = this.service(serviceId);
    this.assertEditable(svc, version);
    const snippets = svc.snippets.get(version) ?? new Map<string, EdgeSnippet>();
    snippets.set(snippet.name, { ...snippet });
    svc.snippets.set(version, snippets);
  }

  async activateVersion(serviceId: string, version: number): Promise<void> {
    this.record('activateVersion', serviceId, { version });
    const svc = this.service(serviceId);
    if (version > svc.latestVersion) {
      throw new EdgeApiError('not_found', `Version ${version} does not exist`, 404);
    }
    svc.activeVersion = version;
    svc.locked.add(version);
  }

  private record(operation: EdgeOperation, serviceId: string, args: Record<string, unknown>): void {
    this.calls.push({ operation, serviceId, args });
    const failure = this.failures.find((f) => f.operation === operation && f.remaining > 0);
    if (failure) {
      failure.remaining--;
      this.failures = this.failures.filter((f) => f.remaining > 0);
      throw failure.error;
    }
  }

  private service(serviceId: string): StoredService {
    const svc = this.services.get(serviceId);
    if (!svc) throw new EdgeApiError('not_found', `Service ${serviceId} not found`, 404);
    return svc;
  }

  private container(serviceId: string, containerId: string): StoredContainer {
    const c = this.service(serviceId).containers.get(containerId);
    if (!c) throw new EdgeApiError('not_found', `Container ${containerId} not found`, 404);
    return c;
  }

  private assertEditable(svc: StoredService, version: number): void {
    if (version > svc.latestVersion) {
      throw new EdgeApiError('not_found', `Version ${version} does not exist`, 404);
    }
    if (svc.locked.has(version)) {
      throw new EdgeApiError('conflict', `Version ${version} is locked`, 409);
    }
  }
}
