/**
 * Typed error model for machine-actionable error handling.
 *
 * Per-decision and per-service failures are returned as typed values in
 * cycle results rather than thrown, so one failing decision or service never
 * aborts the work of the others.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'DECISION'
  | 'DECISION_SOURCE'
  | 'CAPACITY'
  | 'REMOTE'
  | 'CACHE'
  | 'CONFIG'
  | 'VERSION'
  | 'SYNC'
  | 'VALIDATION'
  | 'RATE_LIMIT'
  | 'SYSTEM';

/** Typed suggested fix that operators or tooling can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure. */
export interface TypedError {
  /** Namespaced error code (e.g., "REMOTE.TRANSIENT"). */
  code: string;
  message: string;
  serviceId?: string;
  decisionId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  serviceId?: string;
  decisionId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    serviceId: params.serviceId,
    decisionId: params.decisionId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

// --- Error factory functions ---

export function malformedDecisionError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'DECISION.MALFORMED',
    message,
    retryable: false,
    details,
  });
}

export function capacityExhaustedError(
  serviceId: string,
  decisionId: string,
  kind: string,
  maxContainers: number,
  capacity: number,
): TypedError {
  return createTypedError({
    code: 'CAPACITY.EXHAUSTED',
    message: `No room for ${decisionId} in any ${kind} container (${maxContainers} x ${capacity})`,
    serviceId,
    decisionId,
    retryable: false,
    details: { kind, maxContainers, capacity },
    suggestedFixes: [
      { type: 'INCREASE_MAX_ITEMS', params: { serviceId, maxItems: maxContainers * capacity * 2 } },
    ],
  });
}

export function cacheCorruptError(path: string, reason: string): TypedError {
  return createTypedError({
    code: 'CACHE.CORRUPT',
    message: `Cache file ${path} is unusable: ${reason}`,
    retryable: false,
    details: { path, reason },
    suggestedFixes: [
      { type: 'FULL_RECONCILIATION', params: {}, description: 'State is rebuilt from the remote services' },
    ],
  });
}

export function configError(message: string, field?: string): TypedError {
  return createTypedError({
    code: 'CONFIG.INVALID',
    message,
    retryable: false,
    details: field ? { field } : undefined,
    suggestedFixes: field ? [{ type: 'FIX_FIELD', params: { field } }] : [],
  });
}

export function invalidVersionTransition(serviceId: string, from: string, to: string): TypedError {
  return createTypedError({
    code: 'VERSION.INVALID_TRANSITION',
    message: `Cannot transition service version from "${from}" to "${to}"`,
    serviceId,
    retryable: false,
    details: { from, to },
  });
}

export function syncAbortedError(serviceId: string): TypedError {
  return createTypedError({
    code: 'SYNC.ABORTED',
    message: 'Cycle abandoned during shutdown',
    serviceId,
    retryable: true,
  });
}

export function decisionSourceError(message: string): TypedError {
  return createTypedError({
    code: 'DECISION_SOURCE.UNAVAILABLE',
    message,
    retryable: true,
  });
}

export function validationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'VALIDATION.INVALID_INPUT',
    message,
    retryable: false,
    details,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
  });
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/** Replace every occurrence of each secret in a message with its masked form. */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** Error wrapper for paths that throw. */
export class SyncError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'SyncError';
  }
}

/** Extract a message from anything thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
