import {
  applyMemberDiff,
  buildPlan,
  countChanges,
  diffMembers,
  isPlanEmpty,
  planNeedsVersion,
  toEntry,
} from '../../src/engine/diff';
import { snippetDigest } from '../../src/engine/snippets';
import { DecisionAction } from '../../src/domain/decision';
import { ContainerKind, EnforcementContainer } from '../../src/domain/service';
import { EdgeSnippet } from '../../src/edge/edge-api';

const BAN = DecisionAction.Ban;
const CAPTCHA = DecisionAction.Captcha;

function members(entries: Array<[string, DecisionAction]>): Map<string, DecisionAction> {
  return new Map(entries);
}

function container(name: string, kind: ContainerKind, entries: Array<[string, DecisionAction]>): EnforcementContainer {
  return {
    id: name === 'edgesync_block_0' ? 'ctr_1' : '',
    name,
    serviceId: 'svc1',
    kind,
    index: 0,
    capacity: 10,
    members: members(entries),
    provisional: false,
  };
}

const RULE: EdgeSnippet = { name: 'edgesync_ban_rule', type: 'recv', priority: 10, content: 'if ( false ) {}\n' };

describe('diffMembers', () => {
  test('set difference in both directions', () => {
    const diff = diffMembers(
      members([['ip:192.0.2.1', BAN], ['ip:192.0.2.2', BAN]]),
      members([['ip:192.0.2.2', BAN], ['ip:192.0.2.3', BAN]]),
    );
    expect(diff.toAdd).toEqual([{ decisionId: 'ip:192.0.2.3', action: BAN }]);
    expect(diff.toRemove).toEqual([{ decisionId: 'ip:192.0.2.1', action: BAN }]);
  });

  test('an action change is a remove followed by an add of the same id', () => {
    const diff = diffMembers(members([['country:FR', BAN]]), members([['country:FR', CAPTCHA]]));
    expect(diff.toRemove).toEqual([{ decisionId: 'country:FR', action: BAN }]);
    expect(diff.toAdd).toEqual([{ decisionId: 'country:FR', action: CAPTCHA }]);
  });

  test('identical sets produce no changes', () => {
    const same = members([['ip:192.0.2.1', BAN]]);
    expect(diffMembers(same, new Map(same))).toEqual({ toAdd: [], toRemove: [] });
  });

  test('applying the diff to the old set yields the new set', () => {
    const cases: Array<[Array<[string, DecisionAction]>, Array<[string, DecisionAction]>]> = [
      [[], [['ip:192.0.2.1', BAN]]],
      [[['ip:192.0.2.1', BAN]], []],
      [[['ip:192.0.2.1', BAN], ['country:FR', BAN]], [['country:FR', CAPTCHA], ['as_number:64500', BAN]]],
      [[['ip:192.0.2.1', CAPTCHA]], [['ip:192.0.2.1', CAPTCHA], ['ip:192.0.2.9', CAPTCHA]]],
    ];
    for (const [before, after] of cases) {
      const oldMembers = members(before);
      const newMembers = members(after);
      const diff = diffMembers(oldMembers, newMembers);
      const applied = applyMemberDiff(oldMembers, diff);
      expect([...applied.entries()].sort()).toEqual([...newMembers.entries()].sort());
      for (const change of diff.toAdd) {
        expect(oldMembers.get(change.decisionId)).not.toBe(change.action);
      }
    }
  });
});

describe('buildPlan', () => {
  const current = [container('edgesync_block_0', ContainerKind.BlockList, [['ip:192.0.2.1', BAN]])];
  const desired = [
    container('edgesync_block_0', ContainerKind.BlockList, [['ip:192.0.2.1', BAN], ['ip:192.0.2.2', BAN]]),
    container('edgesync_captcha_0', ContainerKind.CaptchaList, [['ip:192.0.2.3', CAPTCHA]]),
  ];

  test('lists creations, per-container changes and changed snippets', () => {
    const plan = buildPlan(current, desired, [RULE], {});

    expect(plan.create.map((c) => c.name)).toEqual(['edgesync_captcha_0']);
    expect(plan.changes.map((c) => [c.container.name, c.toAdd.map((m) => m.decisionId), c.toRemove.length])).toEqual([
      ['edgesync_block_0', ['ip:192.0.2.2'], 0],
      ['edgesync_captcha_0', ['ip:192.0.2.3'], 0],
    ]);
    expect(plan.snippets).toEqual([RULE]);
    expect(countChanges(plan)).toEqual({ added: 2, removed: 0 });
    expect(planNeedsVersion(plan)).toBe(true);
  });

  test('snippets with a recorded digest are left alone', () => {
    const plan = buildPlan(current, current, [RULE], { [RULE.name]: snippetDigest(RULE) });
    expect(isPlanEmpty(plan)).toBe(true);
    expect(planNeedsVersion(plan)).toBe(false);
  });

  test('entry-only plans do not need a new version', () => {
    const plan = buildPlan(current, [desired[0]], [RULE], { [RULE.name]: snippetDigest(RULE) });
    expect(isPlanEmpty(plan)).toBe(false);
    expect(planNeedsVersion(plan)).toBe(false);
  });
});

describe('toEntry', () => {
  test('list kinds carry the address only', () => {
    expect(toEntry({ decisionId: 'ip_range:192.0.2.0/24', action: BAN }, { kind: ContainerKind.BlockList })).toEqual({
      value: '192.0.2.0/24',
    });
  });

  test('dictionary kinds carry the action as the entry value', () => {
    expect(toEntry({ decisionId: 'country:FR', action: CAPTCHA }, { kind: ContainerKind.CountryList })).toEqual({
      value: 'FR',
      action: 'captcha',
    });
  });
});
