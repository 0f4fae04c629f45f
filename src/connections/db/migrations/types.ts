import type { Queryable } from '../session';

export interface Migration {
  up(db: Queryable): Promise<void>;
  down(db: Queryable): Promise<void>;
}

export interface MigrationInfo {
  name: string;
  migration: Migration;
}
