/**
 * Reconciliation cache.
 *
 * Persists every service's believed enforced state so a restart resumes
 * without reading the remote services. The file is replaced atomically
 * (write to a temporary file, then rename) and writes are serialized.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { v4 as uuid } from 'uuid';
import { DecisionAction, SUPPORTED_ACTIONS } from '../domain/decision';
import {
  CONTAINER_KINDS,
  ContainerKind,
  EnforcementContainer,
  ServiceState,
  VersionPhase,
} from '../domain/service';
import { TypedError, cacheCorruptError, errorMessage } from '../domain/errors';
import { logger } from '../logger';

export const CACHE_SCHEMA_VERSION = 1;

/** A container as written to disk. */
export interface PersistedContainer {
  id: string;
  name: string;
  kind: ContainerKind;
  index: number;
  capacity: number;
  provisional: boolean;
  members: Record<string, DecisionAction>;
}

/** A service state as written to disk. */
export interface PersistedServiceState extends Omit<ServiceState, 'containers'> {
  containers: PersistedContainer[];
}

export interface ReconciliationCache {
  schemaVersion: number;
  savedAt: string;
  services: Record<string, PersistedServiceState>;
}

export interface CacheLoadResult {
  cache: ReconciliationCache;
  /** The file existed but could not be used; callers must reconcile from the remote. */
  corrupt: boolean;
  error?: TypedError;
}

/** Persistence backend for the reconciliation cache. */
export interface CacheStore {
  load(): Promise<CacheLoadResult>;
  save(cache: ReconciliationCache): Promise<void>;
}

export function emptyCache(): ReconciliationCache {
  return { schemaVersion: CACHE_SCHEMA_VERSION, savedAt: new Date().toISOString(), services: {} };
}

export function serializeServiceState(state: ServiceState): PersistedServiceState {
  return {
    ...state,
    snippetDigests: { ...state.snippetDigests },
    containers: state.containers.map((c) => ({
      id: c.id,
      name: c.name,
      kind: c.kind,
      index: c.index,
      capacity: c.capacity,
      provisional: c.provisional,
      members: Object.fromEntries(c.members),
    })),
  };
}

export function deserializeServiceState(persisted: PersistedServiceState): ServiceState {
  return {
    ...persisted,
    snippetDigests: { ...persisted.snippetDigests },
    containers: persisted.containers.map(
      (c): EnforcementContainer => ({
        id: c.id,
        name: c.name,
        serviceId: persisted.serviceId,
        kind: c.kind,
        index: c.index,
        capacity: c.capacity,
        provisional: c.provisional,
        members: new Map(Object.entries(c.members)),
      }),
    ),
  };
}

/**
 * Drop services that are no longer configured. Returns the ids that were
 * discarded.
 */
export function discardUnknownServices(cache: ReconciliationCache, known: ReadonlySet<string>): string[] {
  const discarded = Object.keys(cache.services).filter((id) => !known.has(id));
  for (const id of discarded) {
    delete cache.services[id];
  }
  return discarded;
}

// --- Shape validation ---

class InvalidShapeError extends Error {}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectRecord(value: unknown, where: string): Record<string, unknown> {
  if (!isRecord(value)) throw new InvalidShapeError(`${where} must be an object`);
  return value;
}

function expectString(obj: Record<string, unknown>, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== 'string') throw new InvalidShapeError(`${where}.${key} must be a string`);
  return value;
}

function expectNumber(obj: Record<string, unknown>, key: string, where: string): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidShapeError(`${where}.${key} must be a number`);
  }
  return value;
}

function expectNullableNumber(obj: Record<string, unknown>, key: string, where: string): number | null {
  return obj[key] === null ? null : expectNumber(obj, key, where);
}

function expectNullableString(obj: Record<string, unknown>, key: string, where: string): string | null {
  return obj[key] === null ? null : expectString(obj, key, where);
}

function expectBoolean(obj: Record<string, unknown>, key: string, where: string): boolean {
  const value = obj[key];
  if (typeof value !== 'boolean') throw new InvalidShapeError(`${where}.${key} must be a boolean`);
  return value;
}

function expectEnum<T extends string>(values: readonly T[], value: unknown, where: string): T {
  const match = values.find((v) => v === value);
  if (match === undefined) throw new InvalidShapeError(`${where} has unknown value ${String(value)}`);
  return match;
}

const VERSION_PHASES: readonly VersionPhase[] = Object.values(VersionPhase);

function parseContainer(value: unknown, where: string): PersistedContainer {
  const obj = expectRecord(value, where);
  const rawMembers = expectRecord(obj.members, `${where}.members`);
  const members: Record<string, DecisionAction> = {};
  for (const [id, action] of Object.entries(rawMembers)) {
    members[id] = expectEnum(SUPPORTED_ACTIONS, action, `${where}.members.${id}`);
  }
  const capacity = expectNumber(obj, 'capacity', where);
  if (Object.keys(members).length > capacity) {
    throw new InvalidShapeError(`${where} holds more members than its capacity`);
  }
  return {
    id: expectString(obj, 'id', where),
    name: expectString(obj, 'name', where),
    kind: expectEnum(CONTAINER_KINDS, obj.kind, `${where}.kind`),
    index: expectNumber(obj, 'index', where),
    capacity,
    provisional: expectBoolean(obj, 'provisional', where),
    members,
  };
}

function parseServiceState(value: unknown, where: string): PersistedServiceState {
  const obj = expectRecord(value, where);
  const rawDigests = expectRecord(obj.snippetDigests, `${where}.snippetDigests`);
  const snippetDigests: Record<string, string> = {};
  for (const key of Object.keys(rawDigests)) {
    snippetDigests[key] = expectString(rawDigests, key, `${where}.snippetDigests`);
  }
  if (!Array.isArray(obj.containers)) throw new InvalidShapeError(`${where}.containers must be an array`);

  return {
    serviceId: expectString(obj, 'serviceId', where),
    accountId: expectString(obj, 'accountId', where),
    activeVersion: expectNullableNumber(obj, 'activeVersion', where),
    workingVersion: expectNullableNumber(obj, 'workingVersion', where),
    pendingActivation: expectBoolean(obj, 'pendingActivation', where),
    lastActivatedVersion: expectNullableNumber(obj, 'lastActivatedVersion', where),
    phase: expectEnum(VERSION_PHASES, obj.phase, `${where}.phase`),
    containers: obj.containers.map((c, i) => parseContainer(c, `${where}.containers[${i}]`)),
    snippetDigests,
    captchaSecret: expectString(obj, 'captchaSecret', where),
    lastFullReconcileAt: expectNullableString(obj, 'lastFullReconcileAt', where),
  };
}

/** Parse and validate cache file content. Throws InvalidShapeError. */
function parseCacheDocument(text: string): ReconciliationCache {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new InvalidShapeError(`not valid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
  const doc = expectRecord(raw, 'cache');
  const schemaVersion = expectNumber(doc, 'schemaVersion', 'cache');
  if (schemaVersion !== CACHE_SCHEMA_VERSION) {
    throw new InvalidShapeError(`unsupported schemaVersion ${schemaVersion}`);
  }
  const rawServices = expectRecord(doc.services, 'cache.services');
  const services: Record<string, PersistedServiceState> = {};
  for (const [id, state] of Object.entries(rawServices)) {
    const parsed = parseServiceState(state, `cache.services.${id}`);
    if (parsed.serviceId !== id) {
      throw new InvalidShapeError(`cache.services.${id} is keyed under the wrong service`);
    }
    services[id] = parsed;
  }
  return { schemaVersion, savedAt: expectString(doc, 'savedAt', 'cache'), services };
}

/** Validate a cache document, classifying failures as CACHE.CORRUPT. */
export function parseCache(text: string, source: string): CacheLoadResult {
  try {
    return { cache: parseCacheDocument(text), corrupt: false };
  } catch (err) {
    if (!(err instanceof InvalidShapeError)) throw err;
    return { cache: emptyCache(), corrupt: true, error: cacheCorruptError(source, err.message) };
  }
}

/** Cache persisted as one JSON file. */
export class FileCacheStore implements CacheStore {
  private writeChain: Promise<void> = Promise.resolve();
  private readonly log = logger.child({ module: 'cache-store' });

  constructor(private readonly filePath: string) {}

  async load(): Promise<CacheLoadResult> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) {
        this.log.info('No cache file; starting empty', { path: this.filePath });
        return { cache: emptyCache(), corrupt: false };
      }
      // Unreadable counts as corrupt: start empty, rebuild from the remote.
      const error = cacheCorruptError(this.filePath, `unreadable: ${errorMessage(err)}`);
      this.log.error('Cache file is unreadable; state will be rebuilt from the remote', {
        path: this.filePath,
        code: error.code,
        reason: error.details?.reason,
      });
      return { cache: emptyCache(), corrupt: true, error };
    }

    const result = parseCache(text, this.filePath);
    if (result.error) {
      this.log.error('Cache file is corrupt; state will be rebuilt from the remote', {
        path: this.filePath,
        code: result.error.code,
        reason: result.error.details?.reason,
      });
    }
    return result;
  }

  /** Queue an atomic write. Resolves once this snapshot is on disk. */
  save(cache: ReconciliationCache): Promise<void> {
    const payload = `${JSON.stringify({ ...cache, schemaVersion: CACHE_SCHEMA_VERSION }, null, 2)}\n`;
    const next = this.writeChain.then(() => this.write(payload));
    this.writeChain = next.catch((err: unknown) => {
      this.log.error('Cache write failed', {
        path: this.filePath,
        error: err instanceof Error ? err.message : String(err),
      });
    });
    return next;
  }

  private async write(payload: string): Promise<void> {
    const temporaryPath = `${this.filePath}.${uuid()}.tmp`;
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(temporaryPath, payload, 'utf8');
    try {
      await fs.rename(temporaryPath, this.filePath);
    } catch (err) {
      await fs.rm(temporaryPath, { force: true });
      throw err;
    }
  }
}

/** In-memory cache for tests and embedding. Round-trips through JSON like the file store. */
export class MemoryCacheStore implements CacheStore {
  private content: string | null;
  saves = 0;

  constructor(initial?: ReconciliationCache | string) {
    this.content = initial === undefined ? null : typeof initial === 'string' ? initial : JSON.stringify(initial);
  }

  async load(): Promise<CacheLoadResult> {
    if (this.content === null) return { cache: emptyCache(), corrupt: false };
    return parseCache(this.content, 'memory');
  }

  async save(cache: ReconciliationCache): Promise<void> {
    this.content = JSON.stringify({ ...cache, schemaVersion: CACHE_SCHEMA_VERSION });
    this.saves++;
  }

  /** Last saved document, parsed. */
  snapshot(): ReconciliationCache | null {
    return this.content === null ? null : parseCache(this.content, 'memory').cache;
  }
}

function isMissingFile(err: unknown): boolean {
  return isRecord(err) && err.code === 'ENOENT';
}
