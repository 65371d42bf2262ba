/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db pool) and shares them safely.
 * - Keeps modules testable (overrides inject fakes).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createUserModule } from '../modules/users';
import type { UserModule, UserRepository } from '../modules/users';

export type AppDeps = {
  db: Db;
  logger: Logger;

  // modules
  users: UserModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  userRepo?: UserRepository;
};

export async function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): Promise<AppDeps> {
  // The logger is created at import time from env; config has the final say.
  logger.level = config.logLevel;

  // pg.Pool connects lazily; nothing is opened until the first query.
  const db = createDb(config.db);

  // modules (no HTTP / no business logic here)
  const users = createUserModule({ db, logger, userRepo: overrides.userRepo });

  return {
    db,
    logger,
    users,
    close: async () => {
      await db.destroy();
    },
  };
}
