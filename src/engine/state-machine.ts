/**
 * Version lifecycle state machine.
 *
 * Enforces valid phase transitions of a service's edge version within one
 * cycle, producing typed errors on invalid transitions.
 */

import { VALID_VERSION_TRANSITIONS, VersionPhase } from '../domain/service';
import { TypedError, invalidVersionTransition } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

/** Attempt a version phase transition. */
export function transitionVersionPhase(
  serviceId: string,
  current: VersionPhase,
  target: VersionPhase,
): TransitionResult<VersionPhase> {
  const validTargets = VALID_VERSION_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: invalidVersionTransition(serviceId, current, target),
    };
  }
  return { success: true, newStatus: target };
}

/** Phases that end a cycle. `ready_to_activate` ends a cycle in staging mode. */
export function isTerminalPhase(phase: VersionPhase): boolean {
  return phase === VersionPhase.Active || phase === VersionPhase.Failed;
}
