/**
 * Edge API capability.
 *
 * The engine talks to a CDN through this interface only. Every call is
 * scoped to one service and authenticated with the owning account's
 * credential; the transport behind it is supplied by the embedder.
 */

import { ContainerKind } from '../domain/service';
import { TypedError, createTypedError } from '../domain/errors';

/** An entry of a remote container. `action` is set for dictionary kinds. */
export interface ContainerEntry {
  value: string;
  action?: string;
}

/** Remote container descriptor. */
export interface RemoteContainer {
  id: string;
  name: string;
  kind: ContainerKind;
}

/** Where in the request lifecycle a snippet runs. */
export type SnippetType = 'init' | 'recv' | 'deliver' | 'error';

/** A logic snippet owned by the engine. */
export interface EdgeSnippet {
  name: string;
  type: SnippetType;
  priority: number;
  content: string;
}

/** Capability to read and write one account's services. */
export interface EdgeApi {
  readActiveVersion(serviceId: string): Promise<number>;
  cloneVersion(serviceId: string, sourceVersion: number): Promise<number>;
  /** Containers visible on a version. */
  listContainers(serviceId: string, version: number): Promise<RemoteContainer[]>;
  createContainer(serviceId: string, version: number, name: string, kind: ContainerKind): Promise<RemoteContainer>;
  readContainer(serviceId: string, containerId: string): Promise<ContainerEntry[]>;
  writeContainer(
    serviceId: string,
    containerId: string,
    additions: ContainerEntry[],
    removals: ContainerEntry[],
  ): Promise<void>;
  /** Create or replace a snippet on a version. */
  updateSnippet(serviceId: string, version: number, snippet: EdgeSnippet): Promise<void>;
  activateVersion(serviceId: string, version: number): Promise<void>;
}

/** Failure classes reported by an EdgeApi implementation. */
export type EdgeApiErrorKind = 'transient' | 'rate_limited' | 'auth' | 'conflict' | 'not_found' | 'invalid';

/** Error thrown by EdgeApi implementations. */
export class EdgeApiError extends Error {
  constructor(
    public readonly kind: EdgeApiErrorKind,
    message: string,
    public readonly statusCode?: number,
    public readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'EdgeApiError';
  }

  /** Classify an HTTP status the way CDN APIs use them. */
  static fromStatus(statusCode: number, message: string, retryAfterMs?: number): EdgeApiError {
    if (statusCode === 401 || statusCode === 403) return new EdgeApiError('auth', message, statusCode);
    if (statusCode === 404) return new EdgeApiError('not_found', message, statusCode);
    if (statusCode === 409) return new EdgeApiError('conflict', message, statusCode);
    if (statusCode === 429) return new EdgeApiError('rate_limited', message, statusCode, retryAfterMs);
    if (statusCode >= 500) return new EdgeApiError('transient', message, statusCode);
    return new EdgeApiError('invalid', message, statusCode);
  }

  get retryable(): boolean {
    return this.kind === 'transient' || this.kind === 'rate_limited';
  }
}

const KIND_CODES: Record<EdgeApiErrorKind, string> = {
  transient: 'REMOTE.TRANSIENT',
  rate_limited: 'REMOTE.TRANSIENT',
  auth: 'REMOTE.AUTH_FAILURE',
  conflict: 'REMOTE.CONFLICT',
  not_found: 'REMOTE.NOT_FOUND',
  invalid: 'REMOTE.INVALID',
};

/**
 * Convert anything thrown by a remote call into a typed error. Errors that
 * are not EdgeApiError (network resets, timeouts) count as transient.
 */
export function remoteError(
  err: unknown,
  context: { serviceId: string; operation: string; attempts?: number },
): TypedError {
  const kind: EdgeApiErrorKind = err instanceof EdgeApiError ? err.kind : 'transient';
  const message = err instanceof Error ? err.message : String(err);
  const suggestedFixes = kind === 'auth'
    ? [{ type: 'CHECK_API_TOKEN', params: { serviceId: context.serviceId }, description: 'Verify the account token has write access to the service' }]
    : kind === 'conflict'
      ? [{ type: 'RECLONE', params: {}, description: 'The working version is re-cloned on the next cycle' }]
      : [];

  return createTypedError({
    code: KIND_CODES[kind],
    message: `${context.operation} failed: ${message}`,
    serviceId: context.serviceId,
    retryable: kind === 'transient' || kind === 'rate_limited',
    details: {
      operation: context.operation,
      kind,
      ...(err instanceof EdgeApiError && err.statusCode !== undefined ? { statusCode: err.statusCode } : {}),
      ...(context.attempts !== undefined ? { attempts: context.attempts } : {}),
    },
    suggestedFixes,
  });
}
