import { WebhookReceiver } from 'livekit-server-sdk';
import { LiveKitAgentRuntime } from './agents/livekitAgentRuntime';
import { loadRuleSet, RuleSetError } from './dispatch/ruleLoader';
import { env } from './env';
import { RedisCapacityGuard, storeFromRedis } from './limits/capacity';
import { log } from './log';
import { bindSessionMetrics, incDroppedEvent } from './metrics';
import { createRedisClient } from './redis/client';
import { LiveKitRoomService } from './rooms/livekitRoomService';
import { DispatchRuntime } from './runtime';
import { buildServer } from './server';
import { ShutdownManager } from './shutdown';
import { TelnyxClient } from './telnyx/telnyxClient';

async function main(): Promise<void> {
  const loadRules = () => loadRuleSet(env.DISPATCH_RULES_PATH);
  const ruleSet = await loadRules();

  const redis = env.REDIS_URL ? createRedisClient(env.REDIS_URL) : null;
  if (!redis) {
    log.warn({ event: 'capacity_disabled' }, 'REDIS_URL not set; capacity limits disabled');
  }

  const runtime = new DispatchRuntime({
    ruleSet,
    trunk: new TelnyxClient(),
    rooms: new LiveKitRoomService(),
    agentRuntime: new LiveKitAgentRuntime(),
    capacity: redis ? new RedisCapacityGuard(storeFromRedis(redis)) : undefined,
    graceMs: env.SESSION_GRACE_MS,
    timeouts: {
      roomCreateMs: env.ROOM_CREATE_TIMEOUT_MS,
      agentStartMs: env.AGENT_START_TIMEOUT_MS,
      teardownMs: env.TEARDOWN_TIMEOUT_MS,
      capacityMs: env.CAPACITY_TIMEOUT_MS,
      maxSessionMs: env.MAX_SESSION_MS,
    },
    onDropped: incDroppedEvent,
  });
  bindSessionMetrics(runtime.events, runtime.registry);

  const { server } = buildServer({
    runtime,
    loadRules,
    livekitReceiver: new WebhookReceiver(env.LIVEKIT_API_KEY, env.LIVEKIT_API_SECRET),
    agentIdentityPrefix: env.AGENT_IDENTITY_PREFIX,
    livekitSkipSignature: env.LIVEKIT_SKIP_SIGNATURE,
    adminToken: env.ADMIN_TOKEN,
  });

  process.on('SIGHUP', () => {
    void runtime.reloadRules(loadRules);
  });

  const shutdown = new ShutdownManager({ timeoutMs: env.TEARDOWN_TIMEOUT_MS * 2 + 10_000 });
  shutdown.register('sessions', async () => {
    const asked = runtime.stopAll('SHUTDOWN');
    const drained = await runtime.drain(env.TEARDOWN_TIMEOUT_MS + 1_000);
    log.info({ event: 'sessions_drained', asked, drained, remaining: runtime.registry.stats().live }, 'sessions drained');
    runtime.dispose();
  });
  shutdown.registerServer(server);
  if (redis) {
    shutdown.register('redis', async () => {
      await redis.quit();
    });
  }
  shutdown.installSignalHandlers();

  server.listen(env.PORT, () => {
    log.info({ port: env.PORT, rules: ruleSet.rules.length }, 'server listening');
  });
}

main().catch((error: unknown) => {
  if (error instanceof RuleSetError) {
    log.fatal({ err: error, event: 'dispatch_rules_invalid', source: error.source, rule_id: error.ruleId }, 'refusing to start');
  } else {
    log.fatal({ err: error, event: 'startup_failed' }, 'startup failed');
  }
  process.exit(1);
});
