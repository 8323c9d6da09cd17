import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { AgentEvent } from '../src/calls/events';
import { FakeAgentRuntime, waitFor } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

const PROFILE = { name: 'support', agentName: 'support-agent' };

test('start, ready and stop drive the handle through its states', async () => {
  const { AgentSupervisor } = await import('../src/agents/agentSupervisor');
  const runtime = new FakeAgentRuntime();
  const supervisor = new AgentSupervisor(runtime);
  const events: AgentEvent[] = [];
  supervisor.onEvent((event) => events.push(event));

  const handle = supervisor.start('room-1', PROFILE);
  assert.equal(handle.state, 'STARTING');
  await waitFor(() => handle.dispatchId === 'dispatch-1');

  assert.equal(supervisor.markReady('room-1'), true);
  assert.equal(handle.state, 'READY');
  assert.deepEqual(events, [{ type: 'agent.ready', roomName: 'room-1', agentId: handle.agentId }]);

  await supervisor.stop('room-1');
  assert.equal(handle.state, 'STOPPED');
  assert.equal(supervisor.get('room-1'), undefined);
  assert.deepEqual(runtime.released, [{ roomName: 'room-1', dispatchId: 'dispatch-1' }]);
});

test('a room never gets a second agent', async () => {
  const { AgentSupervisor } = await import('../src/agents/agentSupervisor');
  const { isSessionError } = await import('../src/errors');
  const supervisor = new AgentSupervisor(new FakeAgentRuntime());

  supervisor.start('room-1', PROFILE);
  assert.throws(
    () => supervisor.start('room-1', PROFILE),
    (error: unknown) => isSessionError(error, 'AGENT_ALREADY_ASSIGNED'),
  );
  assert.equal(supervisor.list().length, 1);
});

test('failed dispatch reports agent.failed', async () => {
  const { AgentSupervisor } = await import('../src/agents/agentSupervisor');
  const runtime = new FakeAgentRuntime();
  runtime.dispatchBehavior = 'fail';
  const supervisor = new AgentSupervisor(runtime);
  const events: AgentEvent[] = [];
  supervisor.onEvent((event) => events.push(event));

  const handle = supervisor.start('room-1', PROFILE);
  await waitFor(() => events.length === 1);

  assert.equal(handle.state, 'FAILED');
  assert.deepEqual(events, [
    { type: 'agent.failed', roomName: 'room-1', agentId: handle.agentId, error: 'injected failure' },
  ]);
  assert.equal(supervisor.markReady('room-1'), false);
});

test('exit after ready is a crash, exit after stop is expected', async () => {
  const { AgentSupervisor } = await import('../src/agents/agentSupervisor');
  const runtime = new FakeAgentRuntime();
  runtime.releaseBehavior = 'hang';
  const supervisor = new AgentSupervisor(runtime);
  const events: AgentEvent[] = [];
  supervisor.onEvent((event) => events.push(event));

  const crashed = supervisor.start('room-1', PROFILE);
  supervisor.markReady('room-1');
  assert.equal(supervisor.markExited('room-1', 'gone'), true);
  assert.deepEqual(events[1], {
    type: 'agent.exited',
    roomName: 'room-1',
    agentId: crashed.agentId,
    expected: false,
    detail: 'gone',
  });

  const stopped = supervisor.start('room-2', PROFILE);
  supervisor.markReady('room-2');
  const first = supervisor.stop('room-2');
  assert.equal(supervisor.stop('room-2'), first);
  assert.equal(supervisor.markExited('room-2'), true);
  assert.deepEqual(events[3], {
    type: 'agent.exited',
    roomName: 'room-2',
    agentId: stopped.agentId,
    expected: true,
    detail: undefined,
  });
  await waitFor(() => runtime.released.length === 1);
  assert.deepEqual(runtime.released, [{ roomName: 'room-2', dispatchId: 'dispatch-2' }]);
});

test('exit before ready is a start failure', async () => {
  const { AgentSupervisor } = await import('../src/agents/agentSupervisor');
  const supervisor = new AgentSupervisor(new FakeAgentRuntime());
  const events: AgentEvent[] = [];
  supervisor.onEvent((event) => events.push(event));

  const handle = supervisor.start('room-1', PROFILE);
  supervisor.markExited('room-1');

  assert.equal(handle.state, 'FAILED');
  assert.deepEqual(events, [
    { type: 'agent.failed', roomName: 'room-1', agentId: handle.agentId, error: 'exited before ready' },
  ]);
});

test('stop during an in-flight dispatch releases the dispatch once it lands', async () => {
  const { AgentSupervisor } = await import('../src/agents/agentSupervisor');
  const runtime = new FakeAgentRuntime();
  runtime.dispatchBehavior = 'late';
  const supervisor = new AgentSupervisor(runtime);
  const events: AgentEvent[] = [];
  supervisor.onEvent((event) => events.push(event));

  const handle = supervisor.start('room-1', PROFILE);
  const stopped = supervisor.stop('room-1');
  assert.deepEqual(runtime.released, []);

  await stopped;
  assert.equal(handle.dispatchId, 'dispatch-1');
  assert.deepEqual(runtime.released, [{ roomName: 'room-1', dispatchId: 'dispatch-1' }]);
  assert.equal(handle.state, 'STOPPED');
  assert.deepEqual(events, []);
});

test('dispatch failing after stop reports nothing', async () => {
  const { AgentSupervisor } = await import('../src/agents/agentSupervisor');
  const runtime = new FakeAgentRuntime();
  runtime.dispatchBehavior = 'fail';
  const supervisor = new AgentSupervisor(runtime);
  const events: AgentEvent[] = [];
  supervisor.onEvent((event) => events.push(event));

  supervisor.start('room-1', PROFILE);
  await supervisor.stop('room-1');

  assert.deepEqual(events, []);
  assert.deepEqual(runtime.released, [{ roomName: 'room-1', dispatchId: undefined }]);
});
