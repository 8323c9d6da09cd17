import assert from 'node:assert/strict';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

const PROFILES = [{ name: 'support', agentName: 'support-agent' }];

function accept(id: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return { id, action: 'ACCEPT', match: {}, roomTemplate: 'room-{callId}', agentProfile: 'support', ...extra };
}

test('valid document loads with defaults applied', async () => {
  const { parseRuleSet } = await import('../src/dispatch/ruleLoader');
  const ruleSet = parseRuleSet({
    agentProfiles: PROFILES,
    rules: [accept('a'), { id: 'b', action: 'REJECT', match: { callers: ['anonymous'] } }],
  });

  assert.equal(ruleSet.rules.length, 2);
  assert.deepEqual(ruleSet.rules[0].match, { trunkIds: [], callers: [], callees: [] });
  const reject = ruleSet.rules[1];
  assert.equal(reject.action, 'REJECT');
  if (reject.action === 'REJECT') {
    assert.equal(reject.rejectCode, 'RULE_REJECTED');
  }
  assert.equal(Object.isFrozen(ruleSet.rules), true);
  assert.equal(ruleSet.profiles.get('support')?.agentName, 'support-agent');
});

test('room template without {callId} names the offending rule', async () => {
  const { parseRuleSet, RuleSetError } = await import('../src/dispatch/ruleLoader');

  assert.throws(
    () => parseRuleSet({ agentProfiles: PROFILES, rules: [accept('a'), accept('shared', { roomTemplate: 'lobby' })] }),
    (error: unknown) => {
      assert.ok(error instanceof RuleSetError);
      assert.equal(error.ruleIndex, 1);
      assert.equal(error.ruleId, 'shared');
      assert.equal(
        error.message,
        'invalid rule[1] (id "shared") in inline: roomTemplate: room template must contain {callId}',
      );
      return true;
    },
  );
});

test('unknown placeholder, unknown profile and duplicate ids are refused', async () => {
  const { parseRuleSet } = await import('../src/dispatch/ruleLoader');

  assert.throws(
    () => parseRuleSet({ agentProfiles: PROFILES, rules: [accept('a', { roomTemplate: '{tenant}-{callId}' })] }),
    /roomTemplate: unknown placeholder \{tenant\}/,
  );
  assert.throws(
    () => parseRuleSet({ agentProfiles: PROFILES, rules: [accept('a', { agentProfile: 'billing' })] }),
    /invalid rule\[0\] \(id "a"\) in inline: unknown agent profile "billing"/,
  );
  assert.throws(
    () => parseRuleSet({ agentProfiles: PROFILES, rules: [accept('a'), accept('a')] }),
    /invalid rule\[1\] \(id "a"\) in inline: duplicate rule id/,
  );
});

test('unknown fields and bad reject codes are refused', async () => {
  const { parseRuleSet } = await import('../src/dispatch/ruleLoader');

  assert.throws(
    () => parseRuleSet({ agentProfiles: PROFILES, rules: [accept('a', { priority: 3 })] }),
    /invalid rule\[0\] \(id "a"\)/,
  );
  assert.throws(
    () =>
      parseRuleSet({
        agentProfiles: PROFILES,
        rules: [{ id: 'r', action: 'REJECT', match: {}, rejectCode: 'busy now' }],
      }),
    /rejectCode: reject code must be UPPER_SNAKE_CASE/,
  );
  assert.throws(() => parseRuleSet({ agentProfiles: PROFILES, rules: [] }), /at least one rule is required/);
});

test('loadRuleSet reads a file and reports bad JSON with its path', async () => {
  const { loadRuleSet } = await import('../src/dispatch/ruleLoader');
  const dir = await mkdtemp(path.join(tmpdir(), 'dispatch-rules-'));

  const good = path.join(dir, 'rules.json');
  await writeFile(good, JSON.stringify({ agentProfiles: PROFILES, rules: [accept('a')] }));
  const ruleSet = await loadRuleSet(good);
  assert.equal(ruleSet.source, good);
  assert.equal(ruleSet.rules[0].id, 'a');

  const bad = path.join(dir, 'broken.json');
  await writeFile(bad, '{ "rules": ');
  await assert.rejects(loadRuleSet(bad), (error: unknown) => {
    assert.ok(error instanceof Error);
    assert.ok(error.message.startsWith(`rule file ${bad} is not valid JSON`));
    return true;
  });
});

test('example rule file in config is valid', async () => {
  const { loadRuleSet } = await import('../src/dispatch/ruleLoader');
  const ruleSet = await loadRuleSet(path.join(__dirname, '..', 'config', 'dispatch-rules.example.json'));
  assert.deepEqual(
    ruleSet.rules.map((rule) => rule.id),
    ['block-anonymous', 'sales-line', 'default-support'],
  );
});
