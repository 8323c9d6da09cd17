import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { CapacityStore } from '../src/limits/capacity';
import { setTestEnv } from './testEnv';

setTestEnv();

class MockStore implements CapacityStore {
  public evalshaCalls: Array<{ sha: string; numKeys: number; keys: string[]; args: string[] }> = [];
  public evalCalls: Array<{ numKeys: number; keys: string[]; args: string[] }> = [];
  public removed: Array<{ key: string; member: string }> = [];
  public loads = 0;
  public noScriptOnce = false;

  constructor(private readonly result: string) {}

  async loadScript(): Promise<string> {
    this.loads += 1;
    return 'mock-sha';
  }

  async evalsha(sha: string, numKeys: number, ...rest: string[]): Promise<unknown> {
    if (this.noScriptOnce) {
      this.noScriptOnce = false;
      throw new Error('NOSCRIPT No matching script');
    }
    this.evalshaCalls.push({ sha, numKeys, keys: rest.slice(0, numKeys), args: rest.slice(numKeys) });
    return this.result;
  }

  async eval(_script: string, numKeys: number, ...rest: string[]): Promise<unknown> {
    this.evalCalls.push({ numKeys, keys: rest.slice(0, numKeys), args: rest.slice(numKeys) });
    return this.result;
  }

  async srem(key: string, member: string): Promise<number> {
    this.removed.push({ key, member });
    return 1;
  }
}

const NOW = Date.UTC(2024, 0, 2, 3, 4, 5);

test('tryAcquire maps trunk_at_capacity result', async () => {
  const { RedisCapacityGuard, limitsFromEnv } = await import('../src/limits/capacity');
  const guard = new RedisCapacityGuard(new MockStore('trunk_at_capacity'), limitsFromEnv(), () => NOW);

  const result = await guard.tryAcquire({ trunkId: 'trunk-a', callId: 'call-1' });
  assert.deepEqual(result, { ok: false, reason: 'trunk_at_capacity' });
});

test('tryAcquire builds expected keys and args', async () => {
  const { RedisCapacityGuard, limitsFromEnv } = await import('../src/limits/capacity');
  const store = new MockStore('OK');
  const guard = new RedisCapacityGuard(store, limitsFromEnv(), () => NOW);

  const result = await guard.tryAcquire({ trunkId: 'trunk-a', callId: 'call-2' });

  assert.deepEqual(result, { ok: true });
  assert.equal(store.evalshaCalls.length, 1);
  const call = store.evalshaCalls[0];
  assert.equal(call.sha, 'mock-sha');
  assert.deepEqual(call.keys, [
    'cap:global:active',
    'cap:trunk:trunk-a:active',
    'cap:trunk:trunk-a:rpm:202401020304',
    'cap:trunk:trunk-a:cap:concurrency',
    'cap:trunk:trunk-a:cap:rpm',
  ]);
  assert.deepEqual(call.args, ['call-2', '30', '5', '10', '600']);
});

test('script is loaded once and reloaded after NOSCRIPT', async () => {
  const { RedisCapacityGuard, limitsFromEnv } = await import('../src/limits/capacity');
  const store = new MockStore('OK');
  const guard = new RedisCapacityGuard(store, limitsFromEnv(), () => NOW);

  await guard.tryAcquire({ trunkId: 'trunk-a', callId: 'call-1' });
  await guard.tryAcquire({ trunkId: 'trunk-a', callId: 'call-2' });
  assert.equal(store.loads, 1);

  store.noScriptOnce = true;
  await guard.tryAcquire({ trunkId: 'trunk-a', callId: 'call-3' });
  assert.equal(store.loads, 2);
  assert.equal(store.evalshaCalls.length, 3);
});

test('unknown script result is treated as rate limited', async () => {
  const { RedisCapacityGuard, limitsFromEnv } = await import('../src/limits/capacity');
  const guard = new RedisCapacityGuard(new MockStore('???'), limitsFromEnv(), () => NOW);

  assert.deepEqual(await guard.tryAcquire({ trunkId: 'trunk-a', callId: 'call-1' }), {
    ok: false,
    reason: 'trunk_rate_limited',
  });
});

test('release removes the call from global and trunk sets', async () => {
  const { RedisCapacityGuard, limitsFromEnv } = await import('../src/limits/capacity');
  const store = new MockStore('OK');
  const guard = new RedisCapacityGuard(store, limitsFromEnv(), () => NOW);

  await guard.release({ trunkId: 'trunk-a', callId: 'call-9' });
  assert.deepEqual(store.removed, [
    { key: 'cap:global:active', member: 'call-9' },
    { key: 'cap:trunk:trunk-a:active', member: 'call-9' },
  ]);
});
