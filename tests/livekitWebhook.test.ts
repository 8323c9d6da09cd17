import assert from 'node:assert/strict';
import { test } from 'node:test';
import { z } from 'zod';
import type { LiveKitWebhookEvent } from '../src/livekit/webhookEvents';
import type { LiveKitWebhookVerifier } from '../src/routes/livekitWebhook';
import { createHarness, listen, type Harness, type RunningServer } from './fakes';
import { setTestEnv } from './testEnv';

setTestEnv();

const EventSchema = z.object({
  event: z.string(),
  id: z.string().optional(),
  room: z.object({ name: z.string() }).optional(),
  participant: z.object({ identity: z.string() }).optional(),
});

class FakeReceiver implements LiveKitWebhookVerifier {
  async receive(body: string, authHeader?: string, skipAuth = false): Promise<LiveKitWebhookEvent> {
    if (!skipAuth && authHeader !== 'signed-token') {
      throw new Error('authorization header is invalid');
    }
    return EventSchema.parse(JSON.parse(body));
  }
}

async function startServer(harness: Harness): Promise<RunningServer> {
  const { buildServer } = await import('../src/server');
  const { app } = buildServer({
    runtime: harness.runtime,
    loadRules: async () => harness.runtime.matcher.current(),
    livekitReceiver: new FakeReceiver(),
    agentIdentityPrefix: 'agent-',
    livekitSkipSignature: false,
  });
  return listen(app);
}

function postWebhook(server: RunningServer, event: LiveKitWebhookEvent, authorization = 'signed-token'): Promise<Response> {
  return fetch(`${server.url}/v1/livekit/webhook`, {
    method: 'POST',
    headers: { 'content-type': 'application/webhook+json', authorization },
    body: JSON.stringify(event),
  });
}

test('classifies agent participants by identity prefix', async () => {
  const { classifyLiveKitEvent } = await import('../src/livekit/webhookEvents');

  assert.deepEqual(
    classifyLiveKitEvent({ event: 'participant_joined', room: { name: 'room-1' }, participant: { identity: 'agent-7' } }, 'agent-'),
    { kind: 'agent_joined', roomName: 'room-1', identity: 'agent-7' },
  );
  assert.deepEqual(
    classifyLiveKitEvent({ event: 'participant_left', room: { name: 'room-1' }, participant: { identity: 'agent-7' } }, 'agent-'),
    { kind: 'agent_left', roomName: 'room-1', identity: 'agent-7' },
  );
  assert.deepEqual(
    classifyLiveKitEvent({ event: 'participant_joined', room: { name: 'room-1' }, participant: { identity: 'sip_caller' } }, 'agent-'),
    { kind: 'ignored', reason: 'non_agent_participant' },
  );
  assert.deepEqual(classifyLiveKitEvent({ event: 'room_finished', room: { name: 'room-1' } }, 'agent-'), {
    kind: 'room_finished',
    roomName: 'room-1',
  });
  assert.deepEqual(classifyLiveKitEvent({ event: 'room_started' }, 'agent-'), { kind: 'ignored', reason: 'missing_room' });
  assert.deepEqual(classifyLiveKitEvent({ event: 'track_published', room: { name: 'room-1' } }, 'agent-'), {
    kind: 'ignored',
    reason: 'unsupported_event',
  });
});

test('agent join webhook activates the session and room_finished ends it', async () => {
  const harness = await createHarness({ timeouts: { agentStartMs: 5_000 } });
  const server = await startServer(harness);
  try {
    harness.invite('c1');
    await harness.waitForState('c1', 'AGENT_STARTING');

    const caller = await postWebhook(server, {
      event: 'participant_joined',
      room: { name: 'room-c1' },
      participant: { identity: 'sip_+15550001' },
    });
    assert.equal(caller.status, 200);
    assert.equal(harness.stateOf('c1'), 'AGENT_STARTING');

    const joined = await postWebhook(server, {
      event: 'participant_joined',
      room: { name: 'room-c1' },
      participant: { identity: 'agent-1' },
    });
    assert.equal(joined.status, 200);
    assert.deepEqual(await joined.json(), { ok: true });
    await harness.waitForState('c1', 'ACTIVE');

    await postWebhook(server, { event: 'room_finished', room: { name: 'room-c1' } });
    await harness.waitForState('c1', 'ENDED');

    assert.equal(harness.runtime.registry.get('c1').terminationReason, 'ROOM_CLOSED');
    assert.deepEqual(harness.rooms.closed, []);
  } finally {
    await server.close();
    harness.dispose();
  }
});

test('agent leaving an active room ends the session as a crash', async () => {
  const harness = await createHarness({ timeouts: { agentStartMs: 5_000 } });
  const server = await startServer(harness);
  try {
    harness.invite('c2');
    await harness.waitForState('c2', 'AGENT_STARTING');
    await postWebhook(server, { event: 'participant_joined', room: { name: 'room-c2' }, participant: { identity: 'agent-1' } });
    await harness.waitForState('c2', 'ACTIVE');

    await postWebhook(server, { event: 'participant_left', room: { name: 'room-c2' }, participant: { identity: 'agent-1' } });
    await harness.waitForState('c2', 'ENDED');

    assert.equal(harness.runtime.registry.get('c2').terminationReason, 'AGENT_CRASH');
  } finally {
    await server.close();
    harness.dispose();
  }
});

test('unsigned webhooks are refused', async () => {
  const harness = await createHarness();
  const server = await startServer(harness);
  try {
    const response = await postWebhook(server, { event: 'room_finished', room: { name: 'room-x' } }, 'forged');
    assert.equal(response.status, 401);
    assert.deepEqual(await response.json(), { error: 'invalid_signature' });
  } finally {
    await server.close();
    harness.dispose();
  }
});
