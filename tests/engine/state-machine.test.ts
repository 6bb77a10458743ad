import { transitionVersionPhase, isTerminalPhase } from '../../src/engine/state-machine';
import { VersionPhase } from '../../src/domain/service';

describe('Version State Machine', () => {
  test('valid transition: idle -> cloned', () => {
    const result = transitionVersionPhase('svc1', VersionPhase.Idle, VersionPhase.Cloned);
    expect(result.success).toBe(true);
    expect(result.newStatus).toBe(VersionPhase.Cloned);
  });

  test('valid transition: idle -> mutating for entry-only changes', () => {
    const result = transitionVersionPhase('svc1', VersionPhase.Idle, VersionPhase.Mutating);
    expect(result.success).toBe(true);
  });

  test('valid transition: idle -> ready_to_activate for a pending activation', () => {
    const result = transitionVersionPhase('svc1', VersionPhase.Idle, VersionPhase.ReadyToActivate);
    expect(result.success).toBe(true);
  });

  test('valid transition: cloned -> mutating -> ready_to_activate -> active', () => {
    expect(transitionVersionPhase('svc1', VersionPhase.Cloned, VersionPhase.Mutating).success).toBe(true);
    expect(transitionVersionPhase('svc1', VersionPhase.Mutating, VersionPhase.ReadyToActivate).success).toBe(true);
    expect(transitionVersionPhase('svc1', VersionPhase.ReadyToActivate, VersionPhase.Active).success).toBe(true);
  });

  test('every non-terminal phase may fail', () => {
    for (const phase of [VersionPhase.Idle, VersionPhase.Cloned, VersionPhase.Mutating, VersionPhase.ReadyToActivate]) {
      expect(transitionVersionPhase('svc1', phase, VersionPhase.Failed).success).toBe(true);
    }
  });

  test('invalid transition: mutating -> active skips activation readiness', () => {
    const result = transitionVersionPhase('svc1', VersionPhase.Mutating, VersionPhase.Active);
    expect(result.success).toBe(false);
    expect(result.error?.code).toBe('VERSION.INVALID_TRANSITION');
    expect(result.error?.serviceId).toBe('svc1');
    expect(result.error?.details).toEqual({ from: 'mutating', to: 'active' });
  });

  test('invalid transition: cloned -> active', () => {
    expect(transitionVersionPhase('svc1', VersionPhase.Cloned, VersionPhase.Active).success).toBe(false);
  });

  test('terminal phases accept no transition', () => {
    expect(transitionVersionPhase('svc1', VersionPhase.Active, VersionPhase.Idle).success).toBe(false);
    expect(transitionVersionPhase('svc1', VersionPhase.Failed, VersionPhase.Mutating).success).toBe(false);
  });

  test('terminal phase detection', () => {
    expect(isTerminalPhase(VersionPhase.Active)).toBe(true);
    expect(isTerminalPhase(VersionPhase.Failed)).toBe(true);
    expect(isTerminalPhase(VersionPhase.ReadyToActivate)).toBe(false);
    expect(isTerminalPhase(VersionPhase.Idle)).toBe(false);
  });
});
