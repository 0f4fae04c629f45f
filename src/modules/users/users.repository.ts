import type { Queryable } from '../../connections/db/session';
import { runWrite } from '../../connections/db/integrity';
import type { CreateUserInput, User } from '../../connections/db/models/user.model';

const USER_COLUMNS = 'id, username, email, password_hash, avatar, confirmed, created_at';

/**
 * Persistence contract for user identities.
 */
export interface UserStore {
  findById(id: number): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  /** Rejects with ConflictError when the username or email is taken. */
  create(input: CreateUserInput): Promise<User>;
  /** Sets confirmed; a missing email is a no-op. */
  confirmEmail(email: string): Promise<void>;
  updateAvatar(email: string, url: string): Promise<User | null>;
}

export class UserRepository implements UserStore {
  constructor(private readonly db: Queryable) {}

  private async findOne(column: 'id' | 'username' | 'email', value: number | string): Promise<User | null> {
    const result = await this.db.query<User>(
      `SELECT ${USER_COLUMNS} FROM users WHERE ${column} = $1`,
      [value]
    );
    return result.rows[0] ?? null;
  }

  findById(id: number): Promise<User | null> {
    return this.findOne('id', id);
  }

  findByUsername(username: string): Promise<User | null> {
    return this.findOne('username', username);
  }

  findByEmail(email: string): Promise<User | null> {
    return this.findOne('email', email);
  }

  create(input: CreateUserInput): Promise<User> {
    return runWrite(this.db, async () => {
      const result = await this.db.query<User>(
        `INSERT INTO users (username, email, password_hash, avatar, confirmed)
         VALUES ($1, $2, $3, $4, FALSE)
         RETURNING ${USER_COLUMNS}`,
        [input.username, input.email, input.password_hash, input.avatar ?? null]
      );
      return result.rows[0];
    });
  }

  async confirmEmail(email: string): Promise<void> {
    await runWrite(this.db, () =>
      this.db.query('UPDATE users SET confirmed = TRUE WHERE email = $1 AND confirmed = FALSE', [email])
    );
  }

  updateAvatar(email: string, url: string): Promise<User | null> {
    return runWrite(this.db, async () => {
      const result = await this.db.query<User>(
        `UPDATE users SET avatar = $2 WHERE email = $1 RETURNING ${USER_COLUMNS}`,
        [email, url]
      );
      return result.rows[0] ?? null;
    });
  }
}
