// Database
export { createPool, connectDatabase } from './db/connection';
export { migrate, rollback } from './db/migrate';
export { withSession } from './db/session';
export type { Queryable, SessionClient, SessionPool } from './db/session';
export { runWrite, translateDatabaseError } from './db/integrity';

// Redis
export { createRedisClient, connectRedis } from './redis/redis.connection';
export { RedisCacheStore, NullCacheStore } from './redis/cache.store';
export type { CacheStore } from './redis/cache.store';

// Config - All configurations in one place
export { loadConfig } from './config';
export type { AppConfig } from './config';
