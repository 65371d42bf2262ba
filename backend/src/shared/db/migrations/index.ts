/**
 * src/shared/db/migrations/index.ts
 *
 * Static migration registry. Add new files here in order.
 */

import type { Migration, MigrationProvider } from 'kysely';

import * as m0001 from './0001_user_profile';

const MIGRATIONS: Record<string, Migration> = {
  '0001_user_profile': m0001,
};

export const migrationProvider: MigrationProvider = {
  async getMigrations() {
    return MIGRATIONS;
  },
};
