import Redis from 'ioredis';
import { log } from '../log';

export type RedisClient = Redis;

export function createRedisClient(url: string): Redis {
  const client = new Redis(url, {
    maxRetriesPerRequest: 2,
    enableReadyCheck: true,
  });

  client.on('connect', () => {
    log.info({ event: 'redis_connect' }, 'redis connect');
  });

  client.on('ready', () => {
    log.info({ event: 'redis_ready' }, 'redis ready');
  });

  client.on('error', (error) => {
    log.error({ err: error }, 'redis error');
  });

  client.on('end', () => {
    log.warn({ event: 'redis_end' }, 'redis connection ended');
  });

  return client;
}
