/**
 * Redis client for the rate limiter store.
 * Sessions are process-local and never stored here.
 */

import Redis from 'ioredis';
import { config } from './index';
import { createServiceLogger } from '../observability/logger';

const log = createServiceLogger('redis');

const MAX_RECONNECT_ATTEMPTS = 3;

let redisClient: Redis | null = null;

/**
 * Backoff between reconnect attempts; null stops reconnecting so the
 * limiter's pending commands fail instead of queueing
 */
export const reconnectDelay = (attempt: number): number | null => {
  if (attempt > MAX_RECONNECT_ATTEMPTS) {
    return null;
  }
  return Math.min(attempt * 100, 3000);
};

export const getRedisClient = (): Redis => {
  if (redisClient) {
    return redisClient;
  }

  const client = new Redis({
    host: config.redis.host,
    port: config.redis.port,
    password: config.redis.password,
    connectionName: 'cashpoint-rate-limit',
    maxRetriesPerRequest: MAX_RECONNECT_ATTEMPTS,
    retryStrategy: reconnectDelay,
    lazyConnect: true,
  });

  client.on('error', (err: Error) => log.error({ err }, 'Redis client error'));
  client.on('ready', () => log.info('Redis client ready'));

  redisClient = client;
  return client;
};

export const connectRedis = async (): Promise<void> => {
  const client = getRedisClient();
  if (client.status === 'ready' || client.status === 'connecting') {
    return;
  }
  await client.connect();
};

export const disconnectRedis = async (): Promise<void> => {
  if (!redisClient) {
    return;
  }
  const client = redisClient;
  redisClient = null;
  await client.quit();
};
