/**
 * backend/src/shared/db/schema.ts
 *
 * Kysely table types. Must match src/shared/db/migrations.
 */

import type { Generated } from 'kysely';

export interface UserProfileTable {
  id: Generated<number>;
  username: string;
  first_name: string;
  last_name: string;
  email: string;
  password: string;
}

export interface DB {
  user_profile: UserProfileTable;
}
