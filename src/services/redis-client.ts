/**
 * Redis connection for the catalog and embedding stores.
 *
 * The stores depend on the narrow `RedisKeyValueClient` interface rather than
 * the full client type, so tests can hand them an in-process fake.
 *
 * @module services/redis-client
 */

import { createClient } from 'redis';
import { logger } from '../utils/logger';

export interface RedisKeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  keys(pattern: string): Promise<string[]>;
  mGet(keys: string[]): Promise<Array<string | null>>;
}

export interface RedisConnection {
  client: RedisKeyValueClient;
  close(): Promise<void>;
}

export const connectRedis = async (url: string): Promise<RedisConnection> => {
  const redis = createClient({ url });

  redis.on('error', (error: Error) => {
    logger.warn('Redis connection error', { error: error.message });
  });

  await redis.connect();
  logger.info('Redis connected', { url: url.replace(/\/\/[^@]*@/, '//***@') });

  const client: RedisKeyValueClient = {
    get: (key) => redis.get(key),
    set: (key, value) => redis.set(key, value),
    keys: (pattern) => redis.keys(pattern),
    mGet: (keys) => redis.mGet(keys)
  };

  return {
    client,
    close: async () => {
      await redis.quit();
      logger.info('Redis connection closed');
    }
  };
};
