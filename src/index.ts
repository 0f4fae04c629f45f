import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './connections/config/app.config';
import { connectDatabase, createPool, migrate, createRedisClient, connectRedis } from './connections';
import type { CacheStore } from './connections';
import { NullCacheStore, RedisCacheStore } from './connections';
import { PasswordHasher } from './modules/auth/password';
import { TokenService } from './modules/auth/token.service';
import { createAvatarStorage } from './modules/upload/storage.service';
import { EmailService } from './utils/email.service';
import { logger } from './utils/logging';

dotenv.config();

/**
 * Initialize connections and start server
 */
const startServer = async () => {
  const config = loadConfig();

  logger.info('Connecting to database...');
  const pool = createPool(config.db);
  await connectDatabase(pool);

  const applied = await migrate(pool);
  logger.info(`Applied ${applied.length} pending migrations`);

  let cache: CacheStore = new NullCacheStore();
  if (config.redis.enabled) {
    logger.info('Connecting to Redis...');
    const redis = createRedisClient(config.redis);
    await connectRedis(redis);
    cache = new RedisCacheStore(redis);
  }

  const app = createApp({
    config,
    pool,
    cache,
    cacheTtlSeconds: config.redis.userTtlSeconds,
    hasher: new PasswordHasher(config.bcryptRounds),
    tokens: new TokenService(config.jwt),
    mailer: new EmailService(config.email),
    storage: createAvatarStorage(config.storage),
  });

  app.listen(config.port, () => {
    logger.info(`Server is running on port ${config.port}`);
    logger.info(`Environment: ${config.nodeEnv}`);
  });
};

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
