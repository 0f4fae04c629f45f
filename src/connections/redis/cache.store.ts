import type { RedisClient } from './redis.connection';
import { logger } from '../../utils/logging';

/**
 * Key-value side cache with per-entry TTL. Values are serialized strings;
 * callers own the encoding and validate what they read back.
 * Backend failures are logged and never reach the caller: reads count as
 * misses, and a failed evict leaves the entry to expire on its TTL.
 */
export interface CacheStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  del(key: string): Promise<void>;
}

export class RedisCacheStore implements CacheStore {
  constructor(private readonly client: RedisClient, private readonly prefix: string = 'address-book:') {}

  async get(key: string): Promise<string | null> {
    try {
      return await this.client.get(this.prefix + key);
    } catch (error: unknown) {
      logger.warn('[Cache] Read failed, treating as miss', {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    try {
      await this.client.set(this.prefix + key, value, { EX: ttlSeconds });
    } catch (error: unknown) {
      logger.warn('[Cache] Write failed', {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async del(key: string): Promise<void> {
    try {
      await this.client.del(this.prefix + key);
    } catch (error: unknown) {
      logger.warn('[Cache] Evict failed, entry lives until its TTL', {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/**
 * Used when REDIS_ENABLED is off.
 */
export class NullCacheStore implements CacheStore {
  async get(_key: string): Promise<string | null> {
    return null;
  }

  async set(_key: string, _value: string, _ttlSeconds: number): Promise<void> {
    // nothing to store
  }

  async del(_key: string): Promise<void> {
    // nothing to evict
  }
}
