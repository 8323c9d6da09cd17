import assert from 'node:assert/strict';
import http from 'node:http';
import { test } from 'node:test';
import { sleep } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

test('callbacks run in registration order and a failing one does not stop the rest', async () => {
  const { ShutdownManager } = await import('../src/shutdown');
  const exits: number[] = [];
  const ran: string[] = [];
  const shutdown = new ShutdownManager({ timeoutMs: 1_000, exit: (code) => exits.push(code) });

  shutdown.register('sessions', async () => {
    ran.push('sessions');
  });
  shutdown.register('broken', async () => {
    ran.push('broken');
    throw new Error('close failed');
  });
  shutdown.register('redis', async () => {
    ran.push('redis');
  });

  await shutdown.shutdown('SIGTERM');
  assert.deepEqual(ran, ['sessions', 'broken', 'redis']);
  assert.deepEqual(exits, [0]);

  await shutdown.shutdown('SIGINT');
  assert.deepEqual(ran, ['sessions', 'broken', 'redis']);
  assert.deepEqual(exits, [0]);
});

test('exit code is passed through', async () => {
  const { ShutdownManager } = await import('../src/shutdown');
  const exits: number[] = [];
  const shutdown = new ShutdownManager({ exit: (code) => exits.push(code) });

  await shutdown.shutdown('uncaughtException', 1);
  assert.deepEqual(exits, [1]);
});

test('a hanging callback is cut off by the hard timeout', async () => {
  const { ShutdownManager } = await import('../src/shutdown');
  const exits: number[] = [];
  const ran: string[] = [];
  const shutdown = new ShutdownManager({ timeoutMs: 30, exit: (code) => exits.push(code) });

  shutdown.register('stuck', () => new Promise<void>(() => undefined));
  shutdown.register('after', async () => {
    ran.push('after');
  });

  void shutdown.shutdown('SIGTERM');
  await sleep(80);
  assert.deepEqual(exits, [1]);
  assert.deepEqual(ran, []);
});

test('registered http server is closed', async () => {
  const { ShutdownManager } = await import('../src/shutdown');
  const exits: number[] = [];
  const shutdown = new ShutdownManager({ timeoutMs: 1_000, exit: (code) => exits.push(code) });
  const server = http.createServer();
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  assert.equal(server.listening, true);

  shutdown.registerServer(server);
  await shutdown.shutdown('SIGTERM');

  assert.equal(server.listening, false);
  assert.deepEqual(exits, [0]);
});
