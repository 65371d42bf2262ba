/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably (dev + deploy step).
 * - Migrations are registered statically in ./migrations/index.ts,
 *   so no filesystem scanning or dynamic imports are needed.
 *
 * HOW TO USE:
 * - npm run db:migrate
 */

import 'dotenv/config';

import { Migrator } from 'kysely';
import { createDb } from './db';
import { migrationProvider } from './migrations';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.db);

  try {
    const migrator = new Migrator({ db, provider: migrationProvider });
    const { error, results } = await migrator.migrateToLatest();

    results?.forEach((r) => {
      if (r.status === 'Success') {
        logger.info('migration.success', { migration: r.migrationName });
      }
      if (r.status === 'Error') {
        logger.error('migration.error', { migration: r.migrationName });
      }
    });

    if (error) {
      logger.error('migration.failed', { err: error });
      process.exitCode = 1;
      return;
    }

    logger.info('migration.up_to_date');
  } finally {
    await db.destroy();
  }
}

void runMigrations().catch((err: unknown) => {
  logger.error('migration.fatal', { err });
  process.exit(1);
});
