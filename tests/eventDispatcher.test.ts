import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { SessionEvent } from '../src/calls/events';
import { setTestEnv } from './testEnv';

setTestEnv();

const INVITE: SessionEvent = {
  type: 'call.invite',
  callId: 'c1',
  trunkId: 'trunk-a',
  callerId: '+15550001',
  calleeId: '+15550100',
};

async function setup() {
  const { EventDispatcher } = await import('../src/calls/eventDispatcher');
  const { KeyedQueue } = await import('../src/calls/keyedQueue');
  const { SessionRegistry } = await import('../src/calls/sessionRegistry');

  const registry = new SessionRegistry();
  const queue = new KeyedQueue();
  const handled: Array<{ callId: string; type: string }> = [];
  const dropped: string[] = [];
  const dispatcher = new EventDispatcher({
    registry,
    queue,
    handle: async (callId, event) => {
      handled.push({ callId, type: event.type });
    },
    onDropped: (event, result) => {
      dropped.push(`${event.type}:${result}`);
    },
  });
  return { registry, queue, dispatcher, handled, dropped };
}

test('invite creates the session and queues it', async () => {
  const { registry, queue, dispatcher, handled } = await setup();

  assert.equal(dispatcher.dispatch(INVITE), 'delivered');
  assert.equal(registry.get('c1').state, 'ARRIVED');

  await new Promise((resolve) => setImmediate(resolve));
  await queue.whenIdle('c1');
  assert.deepEqual(handled, [{ callId: 'c1', type: 'call.invite' }]);
  registry.dispose();
});

test('duplicate and blank invites are dropped', async () => {
  const { registry, dispatcher, dropped } = await setup();

  dispatcher.dispatch(INVITE);
  assert.equal(dispatcher.dispatch(INVITE), 'dropped_duplicate');
  assert.equal(dispatcher.dispatch({ ...INVITE, callId: ' ' }), 'dropped_invalid');
  assert.deepEqual(dropped, ['call.invite:dropped_duplicate', 'call.invite:dropped_invalid']);
  registry.dispose();
});

test('room events resolve through the room binding', async () => {
  const { registry, queue, dispatcher, handled } = await setup();
  dispatcher.dispatch(INVITE);
  registry.transition('c1', 'MATCHING');
  registry.bindRoom('c1', 'room-c1');

  assert.equal(dispatcher.dispatch({ type: 'room.created', roomName: 'room-c1' }), 'delivered');
  assert.equal(dispatcher.dispatch({ type: 'room.created', roomName: 'room-zz' }), 'dropped_unknown');

  await new Promise((resolve) => setImmediate(resolve));
  await queue.whenIdle('c1');
  assert.deepEqual(handled.map((entry) => entry.type), ['call.invite', 'room.created']);
  registry.dispose();
});

test('events for unknown or terminal sessions are dropped', async () => {
  const { registry, dispatcher, dropped } = await setup();

  assert.equal(dispatcher.dispatch({ type: 'call.hangup', callId: 'nobody', reasonCode: 'normal_clearing' }), 'dropped_unknown');

  dispatcher.dispatch(INVITE);
  registry.transition('c1', 'MATCHING');
  registry.bindRoom('c1', 'room-c1');
  registry.transition('c1', 'REJECTED', 'STOPPED');

  assert.equal(dispatcher.dispatch({ type: 'call.hangup', callId: 'c1', reasonCode: 'normal_clearing' }), 'dropped_terminal');
  assert.equal(dispatcher.dispatch({ type: 'room.finished', roomName: 'room-c1' }), 'dropped_terminal');
  assert.deepEqual(dropped, [
    'call.hangup:dropped_unknown',
    'call.hangup:dropped_terminal',
    'room.finished:dropped_terminal',
  ]);
  registry.dispose();
});
