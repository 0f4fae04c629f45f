import type { Queryable } from '../../connections/db/session';
import { runWrite } from '../../connections/db/integrity';
import type {
  Contact,
  ContactFilters,
  CreateContactInput,
  Pagination,
  UpdateContactInput,
} from '../../connections/db/models/contact.model';
import type { BirthdayWindow } from './birthdays';
import { monthDayRanges } from './birthdays';

const CONTACT_COLUMNS =
  'id, user_id, first_name, last_name, email, phone_number, birthday, extra_info, created_at, updated_at';

const MONTH_DAY = "to_char(birthday, 'MM-DD')";

const UPDATABLE_COLUMNS = [
  'first_name',
  'last_name',
  'email',
  'phone_number',
  'birthday',
  'extra_info',
] as const satisfies ReadonlyArray<keyof UpdateContactInput>;

/**
 * Persistence contract for contacts. Every method takes the owner id and
 * never sees rows belonging to anyone else.
 */
export interface ContactStore {
  list(ownerId: number, filters: ContactFilters, page: Pagination): Promise<Contact[]>;
  findById(ownerId: number, id: number): Promise<Contact | null>;
  /** Rejects with ConflictError when the owner already has a contact with this email. */
  create(ownerId: number, input: CreateContactInput): Promise<Contact>;
  update(ownerId: number, id: number, patch: UpdateContactInput): Promise<Contact | null>;
  remove(ownerId: number, id: number): Promise<Contact | null>;
  upcomingBirthdays(ownerId: number, window: BirthdayWindow, page: Pagination): Promise<Contact[]>;
}

const escapeLike = (value: string) => value.replace(/[\\%_]/g, (match) => `\\${match}`);

export class ContactRepository implements ContactStore {
  constructor(private readonly db: Queryable) {}

  async list(ownerId: number, filters: ContactFilters, { skip, limit }: Pagination): Promise<Contact[]> {
    const conditions = ['user_id = $1'];
    const values: unknown[] = [ownerId];

    for (const column of ['first_name', 'last_name', 'email'] as const) {
      const value = filters[column];
      if (value) {
        values.push(`%${escapeLike(value)}%`);
        conditions.push(`${column} ILIKE $${values.length}`);
      }
    }

    values.push(skip, limit);
    const result = await this.db.query<Contact>(
      `SELECT ${CONTACT_COLUMNS} FROM contacts
       WHERE ${conditions.join(' AND ')}
       ORDER BY id
       OFFSET $${values.length - 1} LIMIT $${values.length}`,
      values
    );
    return result.rows;
  }

  async findById(ownerId: number, id: number): Promise<Contact | null> {
    const result = await this.db.query<Contact>(
      `SELECT ${CONTACT_COLUMNS} FROM contacts WHERE id = $1 AND user_id = $2`,
      [id, ownerId]
    );
    return result.rows[0] ?? null;
  }

  create(ownerId: number, input: CreateContactInput): Promise<Contact> {
    return runWrite(this.db, async () => {
      const result = await this.db.query<Contact>(
        `INSERT INTO contacts (user_id, first_name, last_name, email, phone_number, birthday, extra_info)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING ${CONTACT_COLUMNS}`,
        [
          ownerId,
          input.first_name,
          input.last_name,
          input.email,
          input.phone_number,
          input.birthday,
          input.extra_info ?? null,
        ]
      );
      return result.rows[0];
    });
  }

  /**
   * Only columns present in `patch` are written. Callers handle the empty patch.
   */
  update(ownerId: number, id: number, patch: UpdateContactInput): Promise<Contact | null> {
    const assignments: string[] = [];
    const values: unknown[] = [];

    for (const column of UPDATABLE_COLUMNS) {
      const value = patch[column];
      if (value !== undefined) {
        values.push(value);
        assignments.push(`${column} = $${values.length}`);
      }
    }

    values.push(id, ownerId);

    return runWrite(this.db, async () => {
      const result = await this.db.query<Contact>(
        `UPDATE contacts SET ${assignments.join(', ')}, updated_at = CURRENT_TIMESTAMP
         WHERE id = $${values.length - 1} AND user_id = $${values.length}
         RETURNING ${CONTACT_COLUMNS}`,
        values
      );
      return result.rows[0] ?? null;
    });
  }

  remove(ownerId: number, id: number): Promise<Contact | null> {
    return runWrite(this.db, async () => {
      const result = await this.db.query<Contact>(
        `DELETE FROM contacts WHERE id = $1 AND user_id = $2 RETURNING ${CONTACT_COLUMNS}`,
        [id, ownerId]
      );
      return result.rows[0] ?? null;
    });
  }

  async upcomingBirthdays(
    ownerId: number,
    window: BirthdayWindow,
    { skip, limit }: Pagination
  ): Promise<Contact[]> {
    const values: Array<number | string> = [ownerId];
    const inRange = monthDayRanges(window).map(({ from, to }) => {
      values.push(from, to);
      return `${MONTH_DAY} BETWEEN $${values.length - 1} AND $${values.length}`;
    });
    const rank = inRange.map((clause, index) => `WHEN ${clause} THEN ${index}`).join(' ');
    values.push(skip, limit);

    const result = await this.db.query<Contact>(
      `SELECT ${CONTACT_COLUMNS} FROM contacts
       WHERE user_id = $1 AND (${inRange.join(' OR ')})
       ORDER BY CASE ${rank} END, ${MONTH_DAY}, id
       OFFSET $${values.length - 1} LIMIT $${values.length}`,
      values
    );
    return result.rows;
  }
}
