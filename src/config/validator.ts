/**
 * Configuration validator.
 *
 * Validates a raw configuration document once, applies defaults and returns
 * a frozen SyncConfig. Every problem is collected rather than stopping at
 * the first one. Tokens and secrets never appear in messages.
 */

import {
  AccountConfig,
  CaptchaConfig,
  DEFAULT_RETRY_POLICY,
  DEFAULT_SYNC_SETTINGS,
  DecisionFilters,
  RetryPolicy,
  ServiceConfig,
  SyncConfig,
} from '../domain/config';
import { TypedError, configError } from '../domain/errors';

/** Validation result. */
export interface ConfigValidationResult {
  valid: boolean;
  config?: Readonly<SyncConfig>;
  errors: TypedError[];
  warnings: string[];
}

const NAME_PREFIX_PATTERN = /^[A-Za-z][A-Za-z0-9]{0,31}$/;

type Raw = Record<string, unknown>;

function isRaw(value: unknown): value is Raw {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Collects errors under dotted field paths. */
class FieldReader {
  constructor(readonly errors: TypedError[]) {}

  object(value: unknown, field: string): Raw | undefined {
    if (value === undefined) return undefined;
    if (!isRaw(value)) {
      this.errors.push(configError(`${field} must be an object`, field));
      return undefined;
    }
    return value;
  }

  string(obj: Raw, key: string, field: string, fallback?: string): string {
    const value = obj[key];
    if (value === undefined && fallback !== undefined) return fallback;
    if (typeof value !== 'string' || value.trim() === '') {
      this.errors.push(configError(`${field} must be a non-empty string`, field));
      return '';
    }
    return value;
  }

  integer(obj: Raw, key: string, field: string, min: number, fallback?: number): number {
    const value = obj[key];
    if (value === undefined && fallback !== undefined) return fallback;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
      this.errors.push(configError(`${field} must be an integer >= ${min}`, field));
      return fallback ?? min;
    }
    return value;
  }

  boolean(obj: Raw, key: string, field: string, fallback: boolean): boolean {
    const value = obj[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'boolean') {
      this.errors.push(configError(`${field} must be a boolean`, field));
      return fallback;
    }
    return value;
  }

  strings(obj: Raw, key: string, field: string): string[] {
    const value = obj[key];
    if (value === undefined) return [];
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
      this.errors.push(configError(`${field} must be an array of strings`, field));
      return [];
    }
    return [...value];
  }
}

/** Validate a raw configuration document. */
export function validateConfig(raw: unknown): ConfigValidationResult {
  const errors: TypedError[] = [];
  const warnings: string[] = [];
  const read = new FieldReader(errors);

  if (!isRaw(raw)) {
    errors.push(configError('Configuration must be a JSON object'));
    return { valid: false, errors, warnings };
  }

  const intervalMs = read.integer(raw, 'intervalMs', 'intervalMs', 1, DEFAULT_SYNC_SETTINGS.intervalMs);
  const fullReconcileIntervalMs = read.integer(
    raw,
    'fullReconcileIntervalMs',
    'fullReconcileIntervalMs',
    1,
    DEFAULT_SYNC_SETTINGS.fullReconcileIntervalMs,
  );
  if (fullReconcileIntervalMs < intervalMs) {
    warnings.push('fullReconcileIntervalMs is shorter than intervalMs; every tick will be a full reconciliation');
  }

  const namePrefix = read.string(raw, 'namePrefix', 'namePrefix', DEFAULT_SYNC_SETTINGS.namePrefix);
  if (namePrefix !== '' && !NAME_PREFIX_PATTERN.test(namePrefix)) {
    errors.push(configError('namePrefix must start with a letter and contain at most 32 letters or digits', 'namePrefix'));
  }

  const accounts = validateAccounts(raw.accounts, read, warnings);

  const config: SyncConfig = {
    intervalMs,
    fullReconcileIntervalMs,
    cachePath: read.string(raw, 'cachePath', 'cachePath', DEFAULT_SYNC_SETTINGS.cachePath),
    maxConcurrency: read.integer(raw, 'maxConcurrency', 'maxConcurrency', 1, DEFAULT_SYNC_SETTINGS.maxConcurrency),
    namePrefix,
    statusPort: read.integer(raw, 'statusPort', 'statusPort', 0, DEFAULT_SYNC_SETTINGS.statusPort),
    retry: validateRetry(read.object(raw.retry, 'retry'), read),
    filters: validateFilters(read.object(raw.filters, 'filters'), read),
    accounts,
  };

  if (errors.length > 0) {
    return { valid: false, errors, warnings };
  }
  return { valid: true, config: deepFreeze(config), errors, warnings };
}

function validateRetry(raw: Raw | undefined, read: FieldReader): RetryPolicy {
  if (!raw) return { ...DEFAULT_RETRY_POLICY };
  const policy: RetryPolicy = {
    maxAttempts: read.integer(raw, 'maxAttempts', 'retry.maxAttempts', 1, DEFAULT_RETRY_POLICY.maxAttempts),
    baseDelayMs: read.integer(raw, 'baseDelayMs', 'retry.baseDelayMs', 0, DEFAULT_RETRY_POLICY.baseDelayMs),
    maxDelayMs: read.integer(raw, 'maxDelayMs', 'retry.maxDelayMs', 0, DEFAULT_RETRY_POLICY.maxDelayMs),
  };
  if (policy.maxDelayMs < policy.baseDelayMs) {
    read.errors.push(configError('retry.maxDelayMs must not be smaller than retry.baseDelayMs', 'retry.maxDelayMs'));
  }
  return policy;
}

function validateFilters(raw: Raw | undefined, read: FieldReader): DecisionFilters {
  if (!raw) return { origins: [], scenariosContaining: [], scenariosNotContaining: [] };
  return {
    origins: read.strings(raw, 'origins', 'filters.origins'),
    scenariosContaining: read.strings(raw, 'scenariosContaining', 'filters.scenariosContaining'),
    scenariosNotContaining: read.strings(raw, 'scenariosNotContaining', 'filters.scenariosNotContaining'),
  };
}

function validateAccounts(value: unknown, read: FieldReader, warnings: string[]): AccountConfig[] {
  if (!Array.isArray(value) || value.length === 0) {
    read.errors.push(configError('accounts must be a non-empty array', 'accounts'));
    return [];
  }

  const accountIds = new Set<string>();
  const serviceIds = new Set<string>();
  const accounts: AccountConfig[] = [];

  value.forEach((entry, i) => {
    const field = `accounts[${i}]`;
    const raw = read.object(entry, field);
    if (!raw) return;

    const id = read.string(raw, 'id', `${field}.id`);
    if (id && accountIds.has(id)) {
      read.errors.push(configError(`Duplicate account id "${id}"`, `${field}.id`));
    }
    accountIds.add(id);

    const services: ServiceConfig[] = [];
    if (!Array.isArray(raw.services) || raw.services.length === 0) {
      read.errors.push(configError(`${field}.services must be a non-empty array`, `${field}.services`));
    } else {
      raw.services.forEach((svc, j) => {
        const service = validateService(svc, `${field}.services[${j}]`, read, warnings);
        if (!service) return;
        if (serviceIds.has(service.id)) {
          read.errors.push(configError(`Service "${service.id}" is configured more than once`, `${field}.services[${j}].id`));
        }
        serviceIds.add(service.id);
        services.push(service);
      });
    }

    accounts.push({
      id,
      token: read.string(raw, 'token', `${field}.token`),
      minRequestIntervalMs: read.integer(
        raw,
        'minRequestIntervalMs',
        `${field}.minRequestIntervalMs`,
        0,
        DEFAULT_SYNC_SETTINGS.minRequestIntervalMs,
      ),
      services,
    });
  });

  return accounts;
}

function validateService(value: unknown, field: string, read: FieldReader, warnings: string[]): ServiceConfig | undefined {
  const raw = read.object(value, field);
  if (!raw) return undefined;

  const service: ServiceConfig = {
    id: read.string(raw, 'id', `${field}.id`),
    activate: read.boolean(raw, 'activate', `${field}.activate`, true),
    allowInPlaceEdits: read.boolean(raw, 'allowInPlaceEdits', `${field}.allowInPlaceEdits`, false),
    containerCapacity: read.integer(
      raw,
      'containerCapacity',
      `${field}.containerCapacity`,
      1,
      DEFAULT_SYNC_SETTINGS.containerCapacity,
    ),
    maxItems: read.integer(raw, 'maxItems', `${field}.maxItems`, 1, DEFAULT_SYNC_SETTINGS.maxItems),
  };

  if (raw.referenceVersion !== undefined) {
    service.referenceVersion = read.integer(raw, 'referenceVersion', `${field}.referenceVersion`, 1);
  }
  if (service.maxItems < service.containerCapacity) {
    warnings.push(`${field}: maxItems is smaller than containerCapacity; one container per kind will be used`);
  }

  const captcha = read.object(raw.captcha, `${field}.captcha`);
  if (captcha) service.captcha = validateCaptcha(captcha, `${field}.captcha`, read);

  return service;
}

function validateCaptcha(raw: Raw, field: string, read: FieldReader): CaptchaConfig {
  return {
    siteKey: read.string(raw, 'siteKey', `${field}.siteKey`),
    cookieExpirySeconds: read.integer(
      raw,
      'cookieExpirySeconds',
      `${field}.cookieExpirySeconds`,
      1,
      DEFAULT_SYNC_SETTINGS.cookieExpirySeconds,
    ),
  };
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}
