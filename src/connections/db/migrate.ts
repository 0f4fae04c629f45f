import dotenv from 'dotenv';
import type { Queryable, SessionPool } from './session';
import { withSession } from './session';
import { migrations as defaultMigrations } from './migrations';
import type { Migration, MigrationInfo } from './migrations/types';
import { logger } from '../../utils/logging';
import { loadConfig } from '../config/app.config';
import { createPool } from './connection';

const createMigrationsTable = async (db: Queryable) => {
  await db.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) UNIQUE NOT NULL,
      executed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    )
  `);
};

const isMigrationExecuted = async (db: Queryable, name: string): Promise<boolean> => {
  const result = await db.query('SELECT id FROM migrations WHERE name = $1', [name]);
  return result.rows.length > 0;
};

const runMigration = async (pool: SessionPool, name: string, migration: Migration) => {
  await withSession(pool, async (client) => {
    try {
      await client.query('BEGIN');
      await migration.up(client);
      await client.query('INSERT INTO migrations (name) VALUES ($1)', [name]);
      await client.query('COMMIT');
      logger.info(`Migration ${name} executed successfully`);
    } catch (error) {
      await client.query('ROLLBACK');
      logger.error(`Migration ${name} failed`, { error: error instanceof Error ? error.message : String(error) });
      throw error;
    }
  });
};

const rollbackMigration = async (pool: SessionPool, name: string, migration: Migration) => {
  await withSession(pool, async (client) => {
    try {
      await client.query('BEGIN');
      await migration.down(client);
      await client.query('DELETE FROM migrations WHERE name = $1', [name]);
      await client.query('COMMIT');
      logger.info(`Migration ${name} rolled back successfully`);
    } catch (error) {
      await client.query('ROLLBACK');
      logger.error(`Migration ${name} rollback failed`, { error: error instanceof Error ? error.message : String(error) });
      throw error;
    }
  });
};

/**
 * Run all pending migrations, in order. Returns the names that were applied.
 */
export const migrate = async (
  pool: SessionPool,
  migrations: MigrationInfo[] = defaultMigrations
): Promise<string[]> => {
  const applied: string[] = [];

  await withSession(pool, createMigrationsTable);
  logger.info(`Found ${migrations.length} migration files`);

  for (const { name, migration } of migrations) {
    const executed = await withSession(pool, (client) => isMigrationExecuted(client, name));
    if (executed) {
      logger.debug(`Migration ${name} already executed, skipping`);
      continue;
    }

    await runMigration(pool, name, migration);
    applied.push(name);
  }

  return applied;
};

/**
 * Roll back the most recently executed migration. Returns its name, or null when there is none.
 */
export const rollback = async (
  pool: SessionPool,
  migrations: MigrationInfo[] = defaultMigrations
): Promise<string | null> => {
  await withSession(pool, createMigrationsTable);

  const result = await withSession(pool, (client) =>
    client.query<{ name: string }>('SELECT name FROM migrations ORDER BY executed_at DESC, id DESC LIMIT 1')
  );

  if (result.rows.length === 0) {
    logger.info('No migrations to rollback');
    return null;
  }

  const lastMigrationName = result.rows[0].name;
  const migrationInfo = migrations.find(m => m.name === lastMigrationName);

  if (!migrationInfo) {
    throw new Error(`Migration ${lastMigrationName} not found in migrations list`);
  }

  await rollbackMigration(pool, lastMigrationName, migrationInfo.migration);
  return lastMigrationName;
};

if (typeof require !== 'undefined' && require.main === module) {
  dotenv.config();

  const pool = createPool(loadConfig().db);
  const command = process.argv[2];
  const task = command === 'rollback' ? rollback(pool) : migrate(pool);

  void task
    .then(() => logger.info('Migration command completed'))
    .catch((error: unknown) => {
      logger.error('Migration command failed', { error: error instanceof Error ? error.message : String(error) });
      process.exitCode = 1;
    })
    .finally(() => pool.end());
}
