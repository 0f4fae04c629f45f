import { Pool, types } from 'pg';
import type { DbConfig } from '../config/app.config';
import { logger } from '../../utils/logging';

const DATE_OID = 1082;

// Calendar dates stay 'YYYY-MM-DD' strings instead of local-midnight Date objects
types.setTypeParser(DATE_OID, (value: string) => value);

export const createPool = (config: DbConfig): Pool => {
  const pool = new Pool({
    connectionString: config.connectionString,
    max: config.max,
  });

  pool.on('error', (err: Error) => {
    logger.error('Unexpected error on idle client', { error: err.message, stack: err.stack });
  });

  return pool;
};

/**
 * Connect to database and verify connection with retry logic
 */
export const connectDatabase = async (
  pool: Pool,
  maxRetries: number = 10,
  retryDelay: number = 2000
): Promise<void> => {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await pool.query('SELECT NOW()');
      logger.info('Database connected successfully');
      return;
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      if (attempt >= maxRetries) {
        logger.error(`Database connection error after ${maxRetries} attempts`, { error: message });
        throw err;
      }
      logger.warn(`Database connection attempt ${attempt}/${maxRetries} failed, retrying in ${retryDelay}ms...`, { error: message });
      await new Promise(resolve => setTimeout(resolve, retryDelay));
    }
  }
};
