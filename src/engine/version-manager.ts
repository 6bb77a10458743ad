/**
 * Edge Version Manager: clone → mutate → activate lifecycle of one service.
 *
 * Drives the version state machine for a single cycle. Every confirmed
 * remote call is written into the ServiceState immediately, so when a cycle
 * fails the state holds exactly what was applied and nothing more. The
 * working version is activated only after every mutation succeeded.
 */

import { ServiceConfig, RetryPolicy } from '../domain/config';
import { EnforcementContainer, ServiceState, VersionPhase } from '../domain/service';
import { TypedError, SyncError, invalidVersionTransition } from '../domain/errors';
import { EdgeApi, remoteError } from '../edge/edge-api';
import { SyncEventPublisher } from '../data-plane/publisher';
import { Logger, logger } from '../logger';
import { ServicePlan, isPlanEmpty, planNeedsVersion, toEntry } from './diff';
import { snippetDigest } from './snippets';
import { transitionVersionPhase } from './state-machine';
import { callRemote } from './retry';

export interface VersionManagerDeps {
  api: EdgeApi;
  retry: RetryPolicy;
  publisher?: SyncEventPublisher;
  /** Checked before every remote call; true abandons the cycle. */
  shouldAbort?: () => boolean;
}

/** Outcome of one pass through the state machine. */
export interface VersionCycleResult {
  /** Phase the cycle ended in. */
  phase: VersionPhase;
  /** Every phase visited, starting with idle. */
  transitions: VersionPhase[];
  workingVersion: number | null;
  activatedVersion: number | null;
  /** Remote calls that changed state. */
  mutations: number;
  error?: TypedError;
}

interface CycleContext {
  state: ServiceState;
  cycleId: string;
  phase: VersionPhase;
  transitions: VersionPhase[];
  mutations: number;
  log: Logger;
}

export class EdgeVersionManager {
  constructor(private readonly deps: VersionManagerDeps) {}

  /**
   * Apply a plan to a service. Returns without remote calls when the plan is
   * empty and no working version is outstanding.
   */
  async apply(state: ServiceState, plan: ServicePlan, service: ServiceConfig, cycleId: string): Promise<VersionCycleResult> {
    const ctx: CycleContext = {
      state,
      cycleId,
      phase: VersionPhase.Idle,
      transitions: [VersionPhase.Idle],
      mutations: 0,
      log: logger.child({ module: 'version-manager', serviceId: state.serviceId, cycleId }),
    };

    if (isPlanEmpty(plan) && state.workingVersion === null) {
      return this.result(ctx, null);
    }

    let activatedVersion: number | null = null;
    try {
      const activeVersion = await this.ensureActiveVersion(ctx);
      const working = await this.obtainWorkingVersion(ctx, plan, service, activeVersion);

      if (!isPlanEmpty(plan)) {
        this.transition(ctx, VersionPhase.Mutating, { version: working });
        await this.mutate(ctx, plan, working, activeVersion);
      }

      this.transition(ctx, VersionPhase.ReadyToActivate, { version: working });
      state.pendingActivation = working !== activeVersion;

      if (!state.pendingActivation) {
        state.workingVersion = null;
        this.transition(ctx, VersionPhase.Active, { version: working });
      } else if (service.activate) {
        await this.call(ctx, 'activateVersion', () => this.deps.api.activateVersion(state.serviceId, working), true);
        this.markActivated(state, working);
        activatedVersion = working;
        this.transition(ctx, VersionPhase.Active, { version: working });
        ctx.log.info('Activated service version', { version: working });
      } else {
        ctx.log.info('Working version staged; activation disabled', { version: working });
      }
    } catch (err) {
      const error = this.toTypedError(err, state.serviceId);
      this.fail(ctx, error);
      return this.result(ctx, activatedVersion, error);
    }

    return this.result(ctx, activatedVersion);
  }

  private async ensureActiveVersion(ctx: CycleContext): Promise<number> {
    const { state } = ctx;
    if (state.activeVersion !== null) return state.activeVersion;
    const active = await this.call(ctx, 'readActiveVersion', () => this.deps.api.readActiveVersion(state.serviceId), false);
    state.activeVersion = active;
    return active;
  }

  /**
   * Pick the version this cycle edits: an outstanding working version, the
   * active version for entry-only plans or in-place edits, or a fresh clone.
   */
  private async obtainWorkingVersion(
    ctx: CycleContext,
    plan: ServicePlan,
    service: ServiceConfig,
    activeVersion: number,
  ): Promise<number> {
    const { state } = ctx;
    if (state.workingVersion !== null) {
      ctx.log.debug('Resuming outstanding working version', { version: state.workingVersion });
      return state.workingVersion;
    }
    if (!planNeedsVersion(plan) || service.allowInPlaceEdits) {
      return activeVersion;
    }

    const source = this.cloneSource(state, service, activeVersion);
    const cloned = await this.call(ctx, 'cloneVersion', () => this.deps.api.cloneVersion(state.serviceId, source), true);
    state.workingVersion = cloned;
    this.transition(ctx, VersionPhase.Cloned, { version: cloned, sourceVersion: source });
    return cloned;
  }

  /**
   * The reference version only seeds a service the engine has never
   * activated and holds nothing on. After that the active version carries
   * the engine's containers and snippets, and cloning anything else would
   * drop them.
   */
  private cloneSource(state: ServiceState, service: ServiceConfig, activeVersion: number): number {
    const bootstrapping = state.lastActivatedVersion === null && state.containers.every((c) => c.provisional);
    return bootstrapping ? service.referenceVersion ?? activeVersion : activeVersion;
  }

  /** Creations, then every removal, then every addition, then snippets. */
  private async mutate(ctx: CycleContext, plan: ServicePlan, working: number, activeVersion: number): Promise<void> {
    const { state } = ctx;
    const api = this.deps.api;
    const byName = new Map(state.containers.map((c) => [c.name, c]));

    for (const planned of plan.create) {
      const remote = await this.call(
        ctx,
        'createContainer',
        () => api.createContainer(state.serviceId, working, planned.name, planned.kind),
        true,
      );
      const created: EnforcementContainer = {
        ...planned,
        id: remote.id,
        members: new Map(),
        provisional: working !== activeVersion,
      };
      state.containers.push(created);
      byName.set(created.name, created);
      ctx.log.info('Created container', { container: created.name, kind: created.kind, version: working });
    }

    const target = (name: string): EnforcementContainer => {
      const container = byName.get(name);
      if (!container) throw new Error(`Container ${name} is not known to the service state`);
      return container;
    };

    for (const change of plan.changes) {
      if (change.toRemove.length === 0) continue;
      const container = target(change.container.name);
      const removals = change.toRemove.map((m) => toEntry(m, container));
      await this.call(ctx, 'writeContainer', () => api.writeContainer(state.serviceId, container.id, [], removals), true);
      for (const m of change.toRemove) container.members.delete(m.decisionId);
      ctx.log.debug('Removed container entries', { container: container.name, count: removals.length });
    }

    for (const change of plan.changes) {
      if (change.toAdd.length === 0) continue;
      const container = target(change.container.name);
      const additions = change.toAdd.map((m) => toEntry(m, container));
      await this.call(ctx, 'writeContainer', () => api.writeContainer(state.serviceId, container.id, additions, []), true);
      for (const m of change.toAdd) container.members.set(m.decisionId, m.action);
      ctx.log.debug('Added container entries', { container: container.name, count: additions.length });
    }

    for (const snippet of plan.snippets) {
      await this.call(ctx, 'updateSnippet', () => api.updateSnippet(state.serviceId, working, snippet), true);
      state.snippetDigests[snippet.name] = snippetDigest(snippet);
      ctx.log.debug('Updated snippet', { snippet: snippet.name, version: working });
    }
  }

  private markActivated(state: ServiceState, version: number): void {
    state.activeVersion = version;
    state.lastActivatedVersion = version;
    state.workingVersion = null;
    state.pendingActivation = false;
    for (const container of state.containers) container.provisional = false;
  }

  private async call<T>(ctx: CycleContext, operation: string, fn: () => Promise<T>, mutating: boolean): Promise<T> {
    const result = await callRemote(fn, {
      serviceId: ctx.state.serviceId,
      operation,
      policy: this.deps.retry,
      shouldAbort: this.deps.shouldAbort,
      log: ctx.log,
    });
    if (mutating) ctx.mutations++;
    return result;
  }

  private toTypedError(err: unknown, serviceId: string): TypedError {
    if (err instanceof SyncError) return err.typedError;
    return remoteError(err, { serviceId, operation: 'apply' });
  }

  private fail(ctx: CycleContext, error: TypedError): void {
    const { state } = ctx;
    if (error.code === 'REMOTE.CONFLICT') {
      // The working version was changed or locked elsewhere: drop it and
      // everything that only existed on it. The next cycle re-clones.
      const abandoned = state.workingVersion;
      state.workingVersion = null;
      state.pendingActivation = false;
      state.containers = state.containers.filter((c) => !c.provisional);
      state.snippetDigests = {};
      ctx.log.warn('Abandoned working version after conflict', { version: abandoned });
    }

    this.transition(ctx, VersionPhase.Failed, { code: error.code, message: error.message });
    ctx.log.error('Service cycle failed', { code: error.code, message: error.message, details: error.details });
  }

  private transition(ctx: CycleContext, target: VersionPhase, payload: Record<string, unknown>): void {
    const from = ctx.phase;
    const result = transitionVersionPhase(ctx.state.serviceId, from, target);
    if (!result.success || !result.newStatus) {
      throw new SyncError(result.error ?? invalidVersionTransition(ctx.state.serviceId, from, target));
    }
    ctx.phase = result.newStatus;
    ctx.transitions.push(result.newStatus);
    ctx.log.info('Version phase transition', { from, to: target, ...payload });
    this.deps.publisher?.publish({
      type: 'version.transition',
      accountId: ctx.state.accountId,
      serviceId: ctx.state.serviceId,
      cycleId: ctx.cycleId,
      payload: { from, to: target, ...payload },
    });
  }

  private result(ctx: CycleContext, activatedVersion: number | null, error?: TypedError): VersionCycleResult {
    const { state } = ctx;
    // A failed activation leaves the working version staged for the next cycle.
    state.phase = ctx.phase === VersionPhase.Failed && state.pendingActivation
      ? VersionPhase.ReadyToActivate
      : ctx.phase;
    return {
      phase: ctx.phase,
      transitions: ctx.transitions,
      workingVersion: state.workingVersion,
      activatedVersion,
      mutations: ctx.mutations,
      error,
    };
  }
}
