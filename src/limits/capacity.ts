import type Redis from 'ioredis';
import { env } from '../env';
import { log } from '../log';
import type { CapacityFailureReason, CapacityGuard, CapacityRequest, CapacityResult } from './types';

const LUA_CAPACITY_SCRIPT = `
local globalKey = KEYS[1]
local trunkKey = KEYS[2]
local rpmKey = KEYS[3]
local trunkConcurrencyKey = KEYS[4]
local trunkRpmKey = KEYS[5]

local callId = ARGV[1]
local globalCap = tonumber(ARGV[2])
local trunkCapDefault = tonumber(ARGV[3])
local trunkRpmDefault = tonumber(ARGV[4])
local ttlSeconds = tonumber(ARGV[5])

local function readCap(key, fallback)
  local value = redis.call('GET', key)
  if value then
    local parsed = tonumber(value)
    if parsed and parsed > 0 then
      return parsed
    end
  end
  return fallback
end

local trunkCap = readCap(trunkConcurrencyKey, trunkCapDefault)
local trunkRpmCap = readCap(trunkRpmKey, trunkRpmDefault)

local inGlobal = redis.call('SISMEMBER', globalKey, callId)
local inTrunk = redis.call('SISMEMBER', trunkKey, callId)
if inGlobal == 1 or inTrunk == 1 then
  redis.call('SADD', globalKey, callId)
  redis.call('SADD', trunkKey, callId)
  redis.call('EXPIRE', globalKey, ttlSeconds)
  redis.call('EXPIRE', trunkKey, ttlSeconds)
  return 'OK'
end

local globalCount = redis.call('SCARD', globalKey)
if globalCount >= globalCap then
  return 'global_at_capacity'
end

local trunkCount = redis.call('SCARD', trunkKey)
if trunkCount >= trunkCap then
  return 'trunk_at_capacity'
end

local rpmCount = tonumber(redis.call('GET', rpmKey) or '0')
if rpmCount >= trunkRpmCap then
  return 'trunk_rate_limited'
end

redis.call('SADD', globalKey, callId)
redis.call('SADD', trunkKey, callId)
redis.call('EXPIRE', globalKey, ttlSeconds)
redis.call('EXPIRE', trunkKey, ttlSeconds)
local nextCount = redis.call('INCR', rpmKey)
if nextCount == 1 then
  redis.call('EXPIRE', rpmKey, 120)
end

return 'OK'
`;

const FAILURE_REASONS: readonly CapacityFailureReason[] = [
  'global_at_capacity',
  'trunk_at_capacity',
  'trunk_rate_limited',
];

/** The slice of the Redis command set the guard needs. */
export interface CapacityStore {
  evalsha(sha: string, numKeys: number, ...args: string[]): Promise<unknown>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
  loadScript(script: string): Promise<string>;
  srem(key: string, member: string): Promise<number>;
}

export interface CapacityLimits {
  globalConcurrency: number;
  trunkConcurrency: number;
  trunkRpm: number;
  ttlSeconds: number;
  prefix: string;
}

export function storeFromRedis(redis: Redis): CapacityStore {
  return {
    evalsha: (sha, numKeys, ...args) => redis.evalsha(sha, numKeys, ...args),
    eval: (script, numKeys, ...args) => redis.eval(script, numKeys, ...args),
    loadScript: async (script) => String(await redis.script('LOAD', script)),
    srem: (key, member) => redis.srem(key, member),
  };
}

export function limitsFromEnv(): CapacityLimits {
  return {
    globalConcurrency: env.GLOBAL_CONCURRENCY_CAP,
    trunkConcurrency: env.TRUNK_CONCURRENCY_CAP_DEFAULT,
    trunkRpm: env.TRUNK_CALLS_PER_MIN_CAP_DEFAULT,
    ttlSeconds: env.CAPACITY_TTL_SECONDS,
    prefix: env.CAP_PREFIX,
  };
}

function formatMinuteKey(epochMs: number): string {
  const date = new Date(epochMs);
  const pad = (value: number): string => value.toString().padStart(2, '0');
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}${pad(
    date.getUTCHours(),
  )}${pad(date.getUTCMinutes())}`;
}

export function buildCapacityKeys(prefix: string, trunkId: string, epochMs: number): {
  globalActiveKey: string;
  trunkActiveKey: string;
  trunkRpmKey: string;
  trunkConcurrencyCapKey: string;
  trunkRpmCapKey: string;
} {
  return {
    globalActiveKey: `${prefix}:global:active`,
    trunkActiveKey: `${prefix}:trunk:${trunkId}:active`,
    trunkRpmKey: `${prefix}:trunk:${trunkId}:rpm:${formatMinuteKey(epochMs)}`,
    trunkConcurrencyCapKey: `${prefix}:trunk:${trunkId}:cap:concurrency`,
    trunkRpmCapKey: `${prefix}:trunk:${trunkId}:cap:rpm`,
  };
}

function isNoScriptError(error: unknown): boolean {
  return error instanceof Error && error.message.toUpperCase().includes('NOSCRIPT');
}

function isFailureReason(value: string): value is CapacityFailureReason {
  return FAILURE_REASONS.some((reason) => reason === value);
}

/**
 * Global and per-trunk admission control shared across runtime instances.
 * Per-trunk caps can be overridden in Redis under the trunk's cap keys.
 */
export class RedisCapacityGuard implements CapacityGuard {
  private scriptSha: string | null = null;

  constructor(
    private readonly store: CapacityStore,
    private readonly limits: CapacityLimits = limitsFromEnv(),
    private readonly now: () => number = Date.now,
  ) {}

  public async tryAcquire(request: CapacityRequest): Promise<CapacityResult> {
    const keys = buildCapacityKeys(this.limits.prefix, request.trunkId, this.now());
    const args = [
      request.callId,
      this.limits.globalConcurrency.toString(),
      this.limits.trunkConcurrency.toString(),
      this.limits.trunkRpm.toString(),
      this.limits.ttlSeconds.toString(),
    ];

    let result: string;
    try {
      result = await this.evalScript(
        [keys.globalActiveKey, keys.trunkActiveKey, keys.trunkRpmKey, keys.trunkConcurrencyCapKey, keys.trunkRpmCapKey],
        args,
      );
    } catch (error) {
      log.error(
        {
          err: error,
          event: 'capacity_eval_failed',
          trunk_id: request.trunkId,
          call_id: request.callId,
          requestId: request.requestId,
        },
        'capacity evaluation failed',
      );
      throw error;
    }

    if (result === 'OK') {
      log.info(
        { event: 'capacity_acquired', trunk_id: request.trunkId, call_id: request.callId, requestId: request.requestId },
        'capacity acquired',
      );
      return { ok: true };
    }

    if (isFailureReason(result)) {
      log.warn(
        {
          event: 'capacity_denied',
          reason: result,
          trunk_id: request.trunkId,
          call_id: request.callId,
          requestId: request.requestId,
        },
        'capacity denied',
      );
      return { ok: false, reason: result };
    }

    log.error(
      {
        event: 'capacity_unknown_result',
        result,
        trunk_id: request.trunkId,
        call_id: request.callId,
        requestId: request.requestId,
      },
      'capacity returned unknown result',
    );
    return { ok: false, reason: 'trunk_rate_limited' };
  }

  public async release(request: CapacityRequest): Promise<void> {
    const keys = buildCapacityKeys(this.limits.prefix, request.trunkId, this.now());

    try {
      const [removedGlobal, removedTrunk] = await Promise.all([
        this.store.srem(keys.globalActiveKey, request.callId),
        this.store.srem(keys.trunkActiveKey, request.callId),
      ]);

      log.info(
        {
          event: 'capacity_released',
          trunk_id: request.trunkId,
          call_id: request.callId,
          removed_global: removedGlobal,
          removed_trunk: removedTrunk,
          requestId: request.requestId,
        },
        'capacity released',
      );
    } catch (error) {
      log.error(
        {
          event: 'capacity_release_failed',
          err: error,
          trunk_id: request.trunkId,
          call_id: request.callId,
          requestId: request.requestId,
        },
        'capacity release failed',
      );
    }
  }

  private async evalScript(keys: string[], args: string[]): Promise<string> {
    const numKeys = keys.length;

    if (this.scriptSha) {
      try {
        return String(await this.store.evalsha(this.scriptSha, numKeys, ...keys, ...args));
      } catch (error) {
        if (!isNoScriptError(error)) {
          throw error;
        }
      }
    }

    try {
      const loadedSha = await this.store.loadScript(LUA_CAPACITY_SCRIPT);
      this.scriptSha = loadedSha;
      return String(await this.store.evalsha(loadedSha, numKeys, ...keys, ...args));
    } catch (error) {
      log.debug({ err: error, event: 'capacity_script_load_failed' }, 'falling back to EVAL');
      return String(await this.store.eval(LUA_CAPACITY_SCRIPT, numKeys, ...keys, ...args));
    }
  }
}
