/**
 * Synchronization orchestrator.
 *
 * Owns the desired decision set and every service's state. Each tick pulls
 * decisions once, then runs one reconciliation cycle per service through a
 * bounded worker pool:
 *
 *   full reconciliation (when due) → partition → plan → version manager → persist
 *
 * Per-service failures are reported in the cycle result and never affect
 * other services. Only the orchestrator knows about multiple accounts.
 */

import { v4 as uuid } from 'uuid';
import { AccountConfig, ServiceConfig, SyncConfig, maxContainersPerKind } from '../domain/config';
import { Decision, DecisionAction, RawDecisionEvent } from '../domain/decision';
import { ContainerKind, ServiceState, VersionPhase, createServiceState } from '../domain/service';
import { TypedError, SyncError, decisionSourceError, errorMessage, maskSecretsInMessage } from '../domain/errors';
import { EdgeApi, remoteError } from '../edge/edge-api';
import { ThrottledEdgeApi } from '../edge/throttled-edge-api';
import { SyncEventPublisher } from '../data-plane/publisher';
import {
  CacheStore,
  ReconciliationCache,
  deserializeServiceState,
  discardUnknownServices,
  serializeServiceState,
  CACHE_SCHEMA_VERSION,
} from '../storage/cache-store';
import { logger } from '../logger';
import { DecisionSource } from './decision-source';
import { applyOperations, normalizeDecisions, pruneExpired } from './normalizer';
import { partitionDecisions } from './partitioner';
import { buildPlan, countChanges } from './diff';
import { renderSnippets } from './snippets';
import { DriftRecord, reconcileService } from './reconciler';
import { EdgeVersionManager } from './version-manager';
import { WorkerPool } from './worker-pool';
import { Scheduler } from './scheduler';

export interface OrchestratorDeps {
  source: DecisionSource;
  /** Builds the edge client of an account; called once per account. */
  edgeApiFor: (account: AccountConfig) => EdgeApi;
  cache: CacheStore;
  publisher?: SyncEventPublisher;
  now?: () => Date;
}

export type ServiceCycleStatus = 'completed' | 'failed';

/** Outcome of one service cycle. */
export interface ServiceCycleResult {
  serviceId: string;
  accountId: string;
  cycleId: string;
  status: ServiceCycleStatus;
  phase: VersionPhase;
  fullReconcile: boolean;
  containersCreated: number;
  entriesAdded: number;
  entriesRemoved: number;
  snippetsUpdated: number;
  /** Remote calls that changed state. */
  mutations: number;
  activatedVersion: number | null;
  rejected: TypedError[];
  drift: DriftRecord[];
  error?: TypedError;
  startedAt: string;
  completedAt: string;
}

/** Outcome of one tick. */
export interface TickResult {
  tickId: string;
  full: boolean;
  pulled: number;
  dropped: number;
  rejected: TypedError[];
  /** Services whose cycle was started. */
  dispatched: string[];
  /** Services skipped because their previous cycle is still running. */
  skipped: string[];
  /** Services of accounts whose credential was refused. */
  unavailable: string[];
  results: ServiceCycleResult[];
  error?: TypedError;
}

/** A dispatched tick whose service cycles may still be running. */
export interface TickDispatch extends Omit<TickResult, 'results'> {
  done: Promise<ServiceCycleResult[]>;
}

/** Per-service view served by the status API. */
export interface ServiceStatus {
  serviceId: string;
  accountId: string;
  available: boolean;
  inFlight: boolean;
  phase: VersionPhase;
  activeVersion: number | null;
  workingVersion: number | null;
  pendingActivation: boolean;
  lastActivatedVersion: number | null;
  lastFullReconcileAt: string | null;
  containers: Array<{ name: string; kind: ContainerKind; size: number; capacity: number; provisional: boolean }>;
  lastCycle?: ServiceCycleResult;
}

interface ServiceBinding {
  account: AccountConfig;
  service: ServiceConfig;
  api: EdgeApi;
}

export class SyncOrchestrator {
  private readonly bindings: ServiceBinding[] = [];
  private readonly states = new Map<string, ServiceState>();
  private readonly needsFullReconcile = new Set<string>();
  private readonly unavailableAccounts = new Set<string>();
  private readonly lastResults = new Map<string, ServiceCycleResult>();
  private readonly pool: WorkerPool;
  private readonly scheduler: Scheduler;
  private readonly publisher: SyncEventPublisher;
  private readonly now: () => Date;
  private readonly log = logger.child({ module: 'orchestrator' });

  private desired = new Map<string, Decision>();
  private lastFullPullAt: number | null = null;
  private initialized: Promise<void> | null = null;
  private stopping = false;

  constructor(
    private readonly config: SyncConfig,
    private readonly deps: OrchestratorDeps,
  ) {
    this.publisher = deps.publisher ?? new SyncEventPublisher();
    this.now = deps.now ?? (() => new Date());
    this.pool = new WorkerPool(config.maxConcurrency);
    this.scheduler = new Scheduler(config.intervalMs, async () => {
      await this.dispatchTick();
    });

    for (const account of config.accounts) {
      const client = deps.edgeApiFor(account);
      const api = account.minRequestIntervalMs > 0
        ? new ThrottledEdgeApi(client, account.minRequestIntervalMs)
        : client;
      for (const service of account.services) {
        this.bindings.push({ account, service, api });
      }
    }
  }

  get events(): SyncEventPublisher {
    return this.publisher;
  }

  /** Load the cache and start ticking. */
  async start(): Promise<void> {
    this.stopping = false;
    await this.initialize();
    this.scheduler.start();
    this.log.info('Orchestrator started', {
      services: this.bindings.length,
      intervalMs: this.config.intervalMs,
      maxConcurrency: this.config.maxConcurrency,
    });
  }

  /**
   * Stop ticking, make in-flight cycles abandon at their next remote call,
   * wait for them and persist the final state.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    await this.scheduler.stop();
    await this.pool.onIdle();
    if (this.initialized) await this.persist();
    this.log.info('Orchestrator stopped');
  }

  /** Run one tick and wait for every cycle it started. */
  async runTick(): Promise<TickResult> {
    const { done, ...dispatch } = await this.dispatchTick();
    return { ...dispatch, results: await done };
  }

  /** Run one tick without waiting for the service cycles. */
  async dispatchTick(): Promise<TickDispatch> {
    await this.initialize();
    const tickId = `tick_${uuid()}`;
    const now = this.now();
    const full = this.lastFullPullAt === null ||
      now.getTime() - this.lastFullPullAt >= this.config.fullReconcileIntervalMs;
    const base: Omit<TickDispatch, 'done'> = {
      tickId,
      full,
      pulled: 0,
      dropped: 0,
      rejected: [],
      dispatched: [],
      skipped: [],
      unavailable: [],
    };

    let events: RawDecisionEvent[];
    try {
      events = await this.deps.source.pull({ full });
    } catch (err) {
      const error = decisionSourceError(`Decision pull failed: ${errorMessage(err)}`);
      this.log.error('Decision pull failed; tick skipped', { tickId, code: error.code, error: errorMessage(err) });
      return { ...base, error, done: Promise.resolve([]) };
    }

    const normalized = normalizeDecisions(events, this.config.filters, now);
    this.desired = applyOperations(this.desired, normalized.operations, full);
    pruneExpired(this.desired, now);
    if (full) this.lastFullPullAt = now.getTime();

    for (const error of normalized.rejected) {
      this.log.warn('Decision rejected', { tickId, code: error.code, message: error.message, details: error.details });
      this.publisher.publish({ type: 'decision.rejected', payload: { tickId, error } });
    }

    const dispatched: string[] = [];
    const skipped: string[] = [];
    const unavailable: string[] = [];
    const running: Array<Promise<ServiceCycleResult>> = [];

    for (const binding of this.bindings) {
      const serviceId = binding.service.id;
      if (this.unavailableAccounts.has(binding.account.id)) {
        unavailable.push(serviceId);
        continue;
      }
      const submitted = this.pool.submit(serviceId, () => this.runServiceCycle(binding));
      if (!submitted.accepted) {
        skipped.push(serviceId);
        this.log.info('Service cycle still running; skipped for this tick', { tickId, serviceId });
        this.publisher.publish({
          type: 'cycle.skipped',
          accountId: binding.account.id,
          serviceId,
          payload: { tickId, reason: 'in_flight' },
        });
        continue;
      }
      dispatched.push(serviceId);
      running.push(submitted.done);
    }

    this.log.debug('Tick dispatched', {
      tickId,
      full,
      decisions: this.desired.size,
      dispatched: dispatched.length,
      skipped: skipped.length,
    });

    return {
      ...base,
      pulled: events.length,
      dropped: normalized.dropped,
      rejected: normalized.rejected,
      dispatched,
      skipped,
      unavailable,
      done: Promise.all(running),
    };
  }

  /** Status of every configured service. */
  getStatus(): ServiceStatus[] {
    return this.bindings.map((b) => this.statusOf(b));
  }

  /** Status of one service, or undefined when it is not configured. */
  getServiceStatus(serviceId: string): ServiceStatus | undefined {
    const binding = this.bindings.find((b) => b.service.id === serviceId);
    return binding ? this.statusOf(binding) : undefined;
  }

  /** Desired decisions currently known, in receipt order. */
  desiredDecisions(): Decision[] {
    return [...this.desired.values()];
  }

  private statusOf(binding: ServiceBinding): ServiceStatus {
    const state = this.stateOf(binding);
    return {
      serviceId: state.serviceId,
      accountId: state.accountId,
      available: !this.unavailableAccounts.has(binding.account.id),
      inFlight: this.pool.isBusy(state.serviceId),
      phase: state.phase,
      activeVersion: state.activeVersion,
      workingVersion: state.workingVersion,
      pendingActivation: state.pendingActivation,
      lastActivatedVersion: state.lastActivatedVersion,
      lastFullReconcileAt: state.lastFullReconcileAt,
      containers: state.containers.map((c) => ({
        name: c.name,
        kind: c.kind,
        size: c.members.size,
        capacity: c.capacity,
        provisional: c.provisional,
      })),
      lastCycle: this.lastResults.get(state.serviceId),
    };
  }

  private initialize(): Promise<void> {
    if (!this.initialized) this.initialized = this.loadCache();
    return this.initialized;
  }

  private async loadCache(): Promise<void> {
    const { cache, corrupt, error } = await this.deps.cache.load();
    if (corrupt) {
      this.log.error('Cache unusable; every service will be reconciled from the remote', {
        code: error?.code,
        message: error?.message,
      });
    }

    const known = new Set(this.bindings.map((b) => b.service.id));
    for (const serviceId of discardUnknownServices(cache, known)) {
      this.log.warn('Discarding cached state of a service that is no longer configured', { serviceId });
    }

    for (const { account, service } of this.bindings) {
      const persisted = cache.services[service.id];
      if (persisted && persisted.accountId === account.id) {
        this.states.set(service.id, deserializeServiceState(persisted));
        this.needsFullReconcile.delete(service.id);
        continue;
      }
      this.states.set(service.id, createServiceState(service.id, account.id, uuid()));
      this.needsFullReconcile.add(service.id);
    }
  }

  private stateOf(binding: ServiceBinding): ServiceState {
    const existing = this.states.get(binding.service.id);
    if (existing) return existing;
    const created = createServiceState(binding.service.id, binding.account.id, uuid());
    this.states.set(binding.service.id, created);
    this.needsFullReconcile.add(binding.service.id);
    return created;
  }

  private fullReconcileDue(state: ServiceState, now: Date): boolean {
    if (this.needsFullReconcile.has(state.serviceId) || state.lastFullReconcileAt === null) return true;
    return now.getTime() - Date.parse(state.lastFullReconcileAt) >= this.config.fullReconcileIntervalMs;
  }

  /** Desired decisions a service enforces. Captcha decisions need a captcha configuration. */
  private decisionsFor(service: ServiceConfig): Map<string, Decision> {
    if (service.captcha) return this.desired;
    const result = new Map<string, Decision>();
    for (const [id, decision] of this.desired) {
      if (decision.action !== DecisionAction.Captcha) result.set(id, decision);
    }
    return result;
  }

  private async runServiceCycle(binding: ServiceBinding): Promise<ServiceCycleResult> {
    const { account, service, api } = binding;
    const state = this.stateOf(binding);
    const cycleId = `cyc_${uuid()}`;
    const startedAt = this.now();
    const log = this.log.child({ accountId: account.id, serviceId: service.id, cycleId });
    const shouldAbort = () => this.stopping;

    const result: ServiceCycleResult = {
      serviceId: service.id,
      accountId: account.id,
      cycleId,
      status: 'completed',
      phase: VersionPhase.Idle,
      fullReconcile: false,
      containersCreated: 0,
      entriesAdded: 0,
      entriesRemoved: 0,
      snippetsUpdated: 0,
      mutations: 0,
      activatedVersion: null,
      rejected: [],
      drift: [],
      startedAt: startedAt.toISOString(),
      completedAt: startedAt.toISOString(),
    };

    try {
      if (this.fullReconcileDue(state, startedAt)) {
        const reconciled = await reconcileService(state, {
          api,
          retry: this.config.retry,
          namePrefix: this.config.namePrefix,
          containerCapacity: service.containerCapacity,
          shouldAbort,
          log,
          now: startedAt,
        });
        this.needsFullReconcile.delete(service.id);
        result.fullReconcile = true;
        result.drift = reconciled.drift;
        for (const record of reconciled.drift) {
          this.publisher.publish({
            type: 'drift.detected',
            accountId: account.id,
            serviceId: service.id,
            cycleId,
            payload: { ...record },
          });
        }
      }

      const partition = partitionDecisions(state.containers, this.decisionsFor(service), {
        serviceId: service.id,
        capacity: service.containerCapacity,
        maxContainers: maxContainersPerKind(service),
        namePrefix: this.config.namePrefix,
      });
      result.rejected = partition.rejected;
      for (const error of partition.rejected) {
        log.warn('Decision not enforced', { code: error.code, decisionId: error.decisionId, message: error.message });
        this.publisher.publish({
          type: 'decision.rejected',
          accountId: account.id,
          serviceId: service.id,
          cycleId,
          payload: { error },
        });
      }

      const snippets = renderSnippets({
        namePrefix: this.config.namePrefix,
        containers: partition.containers,
        captcha: service.captcha,
        captchaSecret: state.captchaSecret,
      });
      const plan = buildPlan(state.containers, partition.containers, snippets, state.snippetDigests);
      const changes = countChanges(plan);

      const manager = new EdgeVersionManager({ api, retry: this.config.retry, publisher: this.publisher, shouldAbort });
      const outcome = await manager.apply(state, plan, service, cycleId);

      result.phase = outcome.phase;
      result.mutations = outcome.mutations;
      result.activatedVersion = outcome.activatedVersion;
      if (outcome.error) {
        result.status = 'failed';
        result.error = this.redact(outcome.error, binding, state);
      } else {
        result.containersCreated = plan.create.length;
        result.entriesAdded = changes.added;
        result.entriesRemoved = changes.removed;
        result.snippetsUpdated = plan.snippets.length;
      }
    } catch (err) {
      const error = err instanceof SyncError
        ? err.typedError
        : remoteError(err, { serviceId: service.id, operation: 'cycle' });
      result.status = 'failed';
      result.phase = VersionPhase.Failed;
      result.error = this.redact(error, binding, state);
      log.error('Service cycle failed', { code: error.code, message: result.error.message });
    }

    if (result.error?.code === 'REMOTE.AUTH_FAILURE') {
      this.markAccountUnavailable(account, result.error);
    }

    result.completedAt = this.now().toISOString();
    this.lastResults.set(service.id, result);
    await this.persist();

    this.publisher.publish({
      type: result.status === 'completed' ? 'cycle.completed' : 'cycle.failed',
      accountId: account.id,
      serviceId: service.id,
      cycleId,
      payload: {
        phase: result.phase,
        mutations: result.mutations,
        containersCreated: result.containersCreated,
        entriesAdded: result.entriesAdded,
        entriesRemoved: result.entriesRemoved,
        activatedVersion: result.activatedVersion,
        ...(result.error ? { code: result.error.code, message: result.error.message } : {}),
      },
    });
    log.info('Service cycle finished', {
      status: result.status,
      phase: result.phase,
      mutations: result.mutations,
      code: result.error?.code,
    });
    return result;
  }

  /** Remote messages may echo request details; credentials never leave the cycle. */
  private redact(error: TypedError, binding: ServiceBinding, state: ServiceState): TypedError {
    const secrets = [binding.account.token, state.captchaSecret];
    const message = maskSecretsInMessage(error.message, secrets);
    return message === error.message ? error : { ...error, message };
  }

  private markAccountUnavailable(account: AccountConfig, error: TypedError): void {
    if (this.unavailableAccounts.has(account.id)) return;
    this.unavailableAccounts.add(account.id);
    this.log.error('Account credential refused; its services are unavailable until restart', {
      accountId: account.id,
      code: error.code,
    });
    for (const service of account.services) {
      this.publisher.publish({
        type: 'service.unavailable',
        accountId: account.id,
        serviceId: service.id,
        payload: { code: error.code, message: error.message },
      });
    }
  }

  private async persist(): Promise<void> {
    const cache: ReconciliationCache = {
      schemaVersion: CACHE_SCHEMA_VERSION,
      savedAt: this.now().toISOString(),
      services: {},
    };
    for (const [serviceId, state] of this.states) {
      cache.services[serviceId] = serializeServiceState(state);
    }
    try {
      await this.deps.cache.save(cache);
    } catch (err) {
      this.log.error('Failed to persist reconciliation cache', { error: errorMessage(err) });
      return;
    }
    this.publisher.publish({ type: 'cache.saved', payload: { services: this.states.size } });
  }
}
