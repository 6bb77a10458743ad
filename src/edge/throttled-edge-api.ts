/**
 * Per-account request spacing.
 *
 * Every service of an account shares one credential and therefore one
 * remote rate limit. Calls made through the same ThrottledEdgeApi start at
 * least `minIntervalMs` apart, whichever service they belong to.
 */

import { ContainerKind } from '../domain/service';
import { ContainerEntry, EdgeApi, EdgeSnippet, RemoteContainer } from './edge-api';

export class ThrottledEdgeApi implements EdgeApi {
  private queue: Promise<void> = Promise.resolve();
  private lastStart = 0;

  constructor(
    private readonly inner: EdgeApi,
    private readonly minIntervalMs: number,
  ) {}

  readActiveVersion(serviceId: string): Promise<number> {
    return this.schedule(() => this.inner.readActiveVersion(serviceId));
  }

  cloneVersion(serviceId: string, sourceVersion: number): Promise<number> {
    return this.schedule(() => this.inner.cloneVersion(serviceId, sourceVersion));
  }

  listContainers(serviceId: string, version: number): Promise<RemoteContainer[]> {
    return this.schedule(() => this.inner.listContainers(serviceId, version));
  }

  createContainer(serviceId: string, version: number, name: string, kind: ContainerKind): Promise<RemoteContainer> {
    return this.schedule(() => this.inner.createContainer(serviceId, version, name, kind));
  }

  readContainer(serviceId: string, containerId: string): Promise<ContainerEntry[]> {
    return this.schedule(() => this.inner.readContainer(serviceId, containerId));
  }

  writeContainer(
    serviceId: string,
    containerId: string,
    additions: ContainerEntry[],
    removals: ContainerEntry[],
  ): Promise<void> {
    return this.schedule(() => this.inner.writeContainer(serviceId, containerId, additions, removals));
  }

  updateSnippet(serviceId: string, version: number, snippet: EdgeSnippet): Promise<void> {
    return this.schedule(() => this.inner.updateSnippet(serviceId, version, snippet));
  }

  activateVersion(serviceId: string, version: number): Promise<void> {
    return this.schedule(() => this.inner.activateVersion(serviceId, version));
  }

  private schedule<T>(call: () => Promise<T>): Promise<T> {
    if (this.minIntervalMs <= 0) return call();

    // Only the start of each call is serialized; calls may overlap once started.
    const started = this.queue.then(async () => {
      const wait = this.lastStart + this.minIntervalMs - Date.now();
      if (wait > 0) await new Promise((resolve) => setTimeout(resolve, wait));
      this.lastStart = Date.now();
    });
    this.queue = started;
    return started.then(call);
  }
}
