import type { Queryable } from '../session';
import type { Migration } from './types';

export const migration: Migration = {
  async up(db: Queryable) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS contacts (
        id SERIAL PRIMARY KEY,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        first_name VARCHAR(50) NOT NULL,
        last_name VARCHAR(50) NOT NULL,
        email VARCHAR(255) NOT NULL,
        phone_number VARCHAR(20) NOT NULL,
        birthday DATE NOT NULL,
        extra_info TEXT,
        created_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
        CONSTRAINT uq_user_email UNIQUE (user_id, email)
      )
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_contacts_user_id ON contacts(user_id)
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_contacts_user_last_name ON contacts(user_id, last_name)
    `);
  },

  async down(db: Queryable) {
    await db.query('DROP INDEX IF EXISTS idx_contacts_user_last_name');
    await db.query('DROP INDEX IF EXISTS idx_contacts_user_id');
    await db.query('DROP TABLE IF EXISTS contacts CASCADE');
  },
};
