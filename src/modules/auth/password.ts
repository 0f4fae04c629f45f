import bcrypt from 'bcryptjs';
import { logger } from '../../utils/logging';

const DEFAULT_ROUNDS = 10;

/**
 * bcrypt hashing. The salt and cost travel inside the hash string,
 * so verification needs nothing but the stored value.
 */
export class PasswordHasher {
  constructor(private readonly rounds: number = DEFAULT_ROUNDS) {}

  hash(password: string): Promise<string> {
    return bcrypt.hash(password, this.rounds);
  }

  /**
   * False on mismatch and on a stored value that is not a bcrypt hash.
   */
  async verify(plainPassword: string, hash: string): Promise<boolean> {
    try {
      return await bcrypt.compare(plainPassword, hash);
    } catch (error: unknown) {
      logger.warn('[PasswordHasher] Stored hash could not be compared', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
