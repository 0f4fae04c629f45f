// User Model - Based on migration 20250601_000001_create_users_table

export interface User {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  avatar: string | null;
  confirmed: boolean;
  created_at: Date;
}

/**
 * What leaves the service boundary: everything but the hash.
 */
export type PublicUser = Omit<User, 'password_hash'>;

export interface CreateUserInput {
  username: string;
  email: string;
  password_hash: string;
  avatar?: string | null;
}

export const toPublicUser = ({ password_hash: _hash, ...user }: User): PublicUser => user;
