import type { MigrationInfo } from './types';

import * as migration001 from './20250601_000001_create_users_table';
import * as migration002 from './20250601_000002_create_contacts_table';

export const migrations: MigrationInfo[] = [
  { name: '20250601_000001_create_users_table', migration: migration001.migration },
  { name: '20250601_000002_create_contacts_table', migration: migration002.migration },
];
