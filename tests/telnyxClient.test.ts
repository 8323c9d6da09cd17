import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

interface RecordedCall {
  url: string;
  body?: string;
  authorization: string | null;
}

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

async function withFetch(
  responses: Response[],
  run: (calls: RecordedCall[]) => Promise<void>,
): Promise<void> {
  const originalFetch = globalThis.fetch;
  const calls: RecordedCall[] = [];
  globalThis.fetch = async (input, init) => {
    calls.push({
      url: String(input),
      body: typeof init?.body === 'string' ? init.body : undefined,
      authorization: new Headers(init?.headers).get('authorization'),
    });
    const next = responses.shift();
    if (!next) {
      throw new Error('unexpected fetch');
    }
    return next;
  };
  try {
    await run(calls);
  } finally {
    globalThis.fetch = originalFetch;
  }
}

test('call commands post to the call-control action urls', async () => {
  const { TelnyxClient } = await import('../src/telnyx/telnyxClient');
  const client = new TelnyxClient({ apiKey: 'test-secret', baseUrl: 'http://telnyx.test/v2' });

  await withFetch(
    [jsonResponse(200, { data: {} }), jsonResponse(200, { data: {} }), jsonResponse(200, { data: {} })],
    async (calls) => {
      await client.answer('v3:call/1');
      await client.reject('c2', 'AT_CAPACITY');
      await client.hangup('c3', 'CALLER_HANGUP');

      assert.deepEqual(
        calls.map((call) => call.url),
        [
          'http://telnyx.test/v2/calls/v3%3Acall%2F1/actions/answer',
          'http://telnyx.test/v2/calls/c2/actions/reject',
          'http://telnyx.test/v2/calls/c3/actions/hangup',
        ],
      );
      assert.equal(calls[0].body, undefined);
      assert.equal(calls[1].body, JSON.stringify({ cause: 'USER_BUSY' }));
      assert.equal(calls[0].authorization, 'Bearer test-secret');
    },
  );
});

test('reject cause depends on the termination reason', async () => {
  const { rejectCauseFor } = await import('../src/telnyx/telnyxClient');

  assert.equal(rejectCauseFor('AT_CAPACITY'), 'USER_BUSY');
  assert.equal(rejectCauseFor('CAPACITY_UNAVAILABLE'), 'USER_BUSY');
  assert.equal(rejectCauseFor('NO_MATCHING_RULE'), 'CALL_REJECTED');
});

test('commands against an ended call resolve', async () => {
  const { TelnyxClient } = await import('../src/telnyx/telnyxClient');
  const client = new TelnyxClient({ apiKey: 'test-secret', baseUrl: 'http://telnyx.test/v2' });

  await withFetch(
    [jsonResponse(422, { errors: [{ detail: 'Call has already ended' }] })],
    async (calls) => {
      await client.hangup('c1', 'STOPPED');
      assert.equal(calls.length, 1);
    },
  );
});

test('server errors are retried and then surface', async () => {
  const { TelnyxClient, TelnyxCallControlError } = await import('../src/telnyx/telnyxClient');
  const client = new TelnyxClient({
    apiKey: 'test-secret',
    baseUrl: 'http://telnyx.test/v2',
    maxRetries: 1,
    retryBaseMs: 1,
  });

  await withFetch([jsonResponse(500, { error: 'boom' }), jsonResponse(200, { data: {} })], async (calls) => {
    await client.answer('c1');
    assert.equal(calls.length, 2);
  });

  await withFetch([jsonResponse(503, { error: 'down' }), jsonResponse(503, { error: 'down' })], async (calls) => {
    await assert.rejects(client.answer('c1'), (error: unknown) => {
      assert.ok(error instanceof TelnyxCallControlError);
      assert.equal(error.status, 503);
      return true;
    });
    assert.equal(calls.length, 2);
  });
});

test('client errors are not retried', async () => {
  const { TelnyxClient } = await import('../src/telnyx/telnyxClient');
  const client = new TelnyxClient({ apiKey: 'test-secret', baseUrl: 'http://telnyx.test/v2', retryBaseMs: 1 });

  await withFetch([jsonResponse(404, { error: 'missing' })], async (calls) => {
    await assert.rejects(client.hangup('c1', 'STOPPED'), /Telnyx call-control hangup failed: 404/);
    assert.equal(calls.length, 1);
  });
});
