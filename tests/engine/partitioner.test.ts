import {
  assignDecision,
  containerKindFor,
  containerName,
  partitionDecisions,
  releaseDecision,
  PartitionLimits,
} from '../../src/engine/partitioner';
import { Decision, DecisionAction, ScopeType, decisionId } from '../../src/domain/decision';
import { ContainerKind, EnforcementContainer } from '../../src/domain/service';

const LIMITS: PartitionLimits = { serviceId: 'svc1', capacity: 2, maxContainers: 3, namePrefix: 'edgesync' };

function ip(value: string, action: DecisionAction = DecisionAction.Ban): Decision {
  return {
    id: decisionId(ScopeType.Ip, value),
    scopeType: ScopeType.Ip,
    value,
    action,
    origin: 'crowdsec',
    scenario: 'http-probing',
    expiresAt: null,
    receivedAt: '2026-01-01T00:00:00.000Z',
  };
}

function country(value: string, action: DecisionAction): Decision {
  return { ...ip('192.0.2.1', action), id: decisionId(ScopeType.Country, value), scopeType: ScopeType.Country, value };
}

function container(kind: ContainerKind, index: number, members: Decision[]): EnforcementContainer {
  return {
    id: `ctr_${kind}_${index}`,
    name: containerName('edgesync', kind, index),
    serviceId: 'svc1',
    kind,
    index,
    capacity: 2,
    members: new Map(members.map((d) => [d.id, d.action])),
    provisional: false,
  };
}

function desiredOf(...decisions: Decision[]): Map<string, Decision> {
  return new Map(decisions.map((d) => [d.id, d]));
}

const A = ip('192.0.2.1');
const B = ip('192.0.2.2');
const C = ip('192.0.2.3');
const D = ip('192.0.2.4');
const E = ip('192.0.2.5');

describe('containerKindFor', () => {
  test('maps scope and action to the enforcing container kind', () => {
    expect(containerKindFor({ scopeType: ScopeType.Ip, action: DecisionAction.Ban })).toBe(ContainerKind.BlockList);
    expect(containerKindFor({ scopeType: ScopeType.IpRange, action: DecisionAction.Captcha })).toBe(ContainerKind.CaptchaList);
    expect(containerKindFor({ scopeType: ScopeType.Country, action: DecisionAction.Captcha })).toBe(ContainerKind.CountryList);
    expect(containerKindFor({ scopeType: ScopeType.AsNumber, action: DecisionAction.Ban })).toBe(ContainerKind.AsnList);
  });

  test('container names carry prefix, kind and index', () => {
    expect(containerName('edgesync', ContainerKind.CaptchaList, 2)).toBe('edgesync_captcha_2');
  });
});

describe('assignDecision', () => {
  test('reuses the container already holding the decision and updates its action', () => {
    const holder = container(ContainerKind.CountryList, 0, [country('FR', DecisionAction.Ban)]);
    const state = { containers: [holder] };

    const result = assignDecision(country('FR', DecisionAction.Captcha), state, LIMITS);

    expect(result.success).toBe(true);
    expect(result.success && result.container).toBe(holder);
    expect(result.success && result.created).toBe(false);
    expect(holder.members.get('country:FR')).toBe(DecisionAction.Captcha);
  });

  test('fills the first container with room before allocating', () => {
    const state = {
      containers: [container(ContainerKind.BlockList, 0, [A, B]), container(ContainerKind.BlockList, 1, [C])],
    };
    const result = assignDecision(D, state, LIMITS);
    expect(result.success && result.container.name).toBe('edgesync_block_1');
    expect(state.containers).toHaveLength(2);
  });

  test('allocates a provisional container at the next index when all are full', () => {
    const state = { containers: [container(ContainerKind.BlockList, 0, [A, B])] };
    const result = assignDecision(C, state, LIMITS);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.created).toBe(true);
    expect(result.container).toMatchObject({ id: '', name: 'edgesync_block_1', index: 1, provisional: true, capacity: 2 });
    expect([...result.container.members.keys()]).toEqual([C.id]);
  });

  test('reports CAPACITY.EXHAUSTED once the container limit is reached', () => {
    const state = { containers: [container(ContainerKind.BlockList, 0, [A, B])] };
    const result = assignDecision(C, state, { ...LIMITS, maxContainers: 1 });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('CAPACITY.EXHAUSTED');
    expect(result.error.decisionId).toBe(C.id);
    expect(result.error.serviceId).toBe('svc1');
  });
});

describe('releaseDecision', () => {
  test('removes the member from its container', () => {
    const state = { containers: [container(ContainerKind.BlockList, 0, [A, B])] };
    expect(releaseDecision(A.id, state)).toBe(true);
    expect(releaseDecision(A.id, state)).toBe(false);
    expect([...state.containers[0].members.keys()]).toEqual([B.id]);
  });
});

describe('partitionDecisions', () => {
  test('a freed slot is reused before a new container is allocated', () => {
    const current = [container(ContainerKind.BlockList, 0, [A, B]), container(ContainerKind.BlockList, 1, [C, D])];

    const result = partitionDecisions(current, desiredOf(A, C, D, E), LIMITS);

    expect(result.rejected).toEqual([]);
    expect(result.containers).toHaveLength(2);
    expect([...result.containers[0].members.keys()]).toEqual([A.id, E.id]);
    expect([...result.containers[1].members.keys()]).toEqual([C.id, D.id]);
    // The input layout is not modified.
    expect([...current[0].members.keys()]).toEqual([A.id, B.id]);
  });

  test('an address whose action changes moves to the other list kind', () => {
    const current = [container(ContainerKind.BlockList, 0, [A])];

    const result = partitionDecisions(current, desiredOf(ip(A.value, DecisionAction.Captcha)), LIMITS);

    expect(result.containers.map((c) => c.name)).toEqual(['edgesync_block_0', 'edgesync_captcha_0']);
    expect(result.containers[0].members.size).toBe(0);
    expect(result.containers[1].members.get(A.id)).toBe(DecisionAction.Captcha);
  });

  test('a country whose action changes stays in its container', () => {
    const current = [container(ContainerKind.CountryList, 0, [country('FR', DecisionAction.Ban)])];

    const result = partitionDecisions(current, desiredOf(country('FR', DecisionAction.Captcha)), LIMITS);

    expect(result.containers).toHaveLength(1);
    expect(result.containers[0].members.get('country:FR')).toBe(DecisionAction.Captcha);
  });

  test('decisions beyond the bound are rejected while the rest are placed', () => {
    const limits = { ...LIMITS, maxContainers: 2 };
    const result = partitionDecisions([], desiredOf(A, B, C, D, E), limits);

    expect(result.containers.map((c) => [...c.members.keys()])).toEqual([
      [A.id, B.id],
      [C.id, D.id],
    ]);
    expect(result.rejected.map((e) => e.decisionId)).toEqual([E.id]);
  });

  test('a lowered capacity bounds cached containers and re-places their overflow', () => {
    const cached = { ...container(ContainerKind.BlockList, 0, [A, B, C]), capacity: 3 };
    const result = partitionDecisions([cached], desiredOf(A, B, C, D), LIMITS);

    expect(result.containers.map((c) => [c.name, [...c.members.keys()]])).toEqual([
      ['edgesync_block_0', [A.id, B.id]],
      ['edgesync_block_1', [C.id, D.id]],
    ]);
    expect(result.containers[1].capacity).toBe(2);
    expect(result.rejected).toEqual([]);
  });

  test('assignDecision does not fill a cached container past the configured capacity', () => {
    const state = { containers: [{ ...container(ContainerKind.BlockList, 0, [A, B]), capacity: 5 }] };
    const result = assignDecision(C, state, LIMITS);

    expect(result.success && result.created).toBe(true);
    expect(state.containers.map((c) => c.members.size)).toEqual([2, 1]);
  });

  test('no container ever exceeds its capacity across successive layouts', () => {
    const pool = Array.from({ length: 12 }, (_, i) => ip(`198.51.100.${i + 1}`));
    let layout: EnforcementContainer[] = [];
    for (let round = 0; round < 6; round++) {
      const wanted = pool.filter((_, i) => (i * 7 + round * 3) % 5 !== 0);
      const result = partitionDecisions(layout, desiredOf(...wanted), { ...LIMITS, maxContainers: 6 });
      for (const c of result.containers) {
        expect(c.members.size).toBeLessThanOrEqual(c.capacity);
      }
      expect(result.rejected).toEqual([]);
      const placed = result.containers.flatMap((c) => [...c.members.keys()]);
      expect(new Set(placed).size).toBe(wanted.length);
      layout = result.containers;
    }
  });
});
