import type { Queryable } from './session';
import { ConflictError } from '../../utils/errors';
import { logger } from '../../utils/logging';

/** SQLSTATE class 23: integrity constraint violation */
const INTEGRITY_VIOLATION_CLASS = '23';

/**
 * Messages for the unique constraints the migrations declare.
 */
const CONSTRAINT_MESSAGES: Record<string, string> = {
  uq_user_email: 'The contact with this email already exists.',
  uq_users_email: 'User with this email already exists',
  uq_users_username: 'User with this username already exists',
};

const GENERIC_INTEGRITY_MESSAGE = 'The integrity error occurred.';

interface DatabaseErrorLike {
  code: string;
  constraint?: string;
}

const isDatabaseError = (error: unknown): error is DatabaseErrorLike => {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  );
};

export const isIntegrityViolation = (error: unknown): error is DatabaseErrorLike =>
  isDatabaseError(error) && error.code.startsWith(INTEGRITY_VIOLATION_CLASS);

/**
 * Map a pg integrity violation to a ConflictError. Other errors pass through untouched.
 */
export const translateDatabaseError = (error: unknown): unknown => {
  if (!isIntegrityViolation(error)) {
    return error;
  }

  const constraint = error.constraint;
  const message = (constraint && CONSTRAINT_MESSAGES[constraint]) || GENERIC_INTEGRITY_MESSAGE;

  logger.warn('[Integrity] Constraint violation', { code: error.code, constraint });

  return new ConflictError(message, constraint ? { constraint } : undefined);
};

/**
 * Run a mutating statement sequence inside a transaction on `db`.
 * On any failure the transaction is rolled back, then integrity
 * violations are rethrown as ConflictError.
 */
export const runWrite = async <T>(db: Queryable, work: () => Promise<T>): Promise<T> => {
  await db.query('BEGIN');
  try {
    const result = await work();
    await db.query('COMMIT');
    return result;
  } catch (error: unknown) {
    try {
      await db.query('ROLLBACK');
    } catch (rollbackError: unknown) {
      logger.error('[Integrity] Rollback failed', {
        error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
      });
    }
    throw translateDatabaseError(error);
  }
};
