/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 * - `userRepo` may be supplied by the caller (tests swap in an in-memory repo).
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';

import { UserController } from './user.controller';
import { UserService } from './user.service';
import { registerUserRoutes } from './user.routes';
import { UserRepo } from './dal/user.repo';
import type { UserRepository } from './user.types';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: {
  db: DbExecutor;
  logger: Logger;
  userRepo?: UserRepository;
}) {
  const userRepo = deps.userRepo ?? new UserRepo(deps.db);

  const userService = new UserService({
    userRepo,
    logger: deps.logger,
  });

  const controller = new UserController(userService);

  return {
    userService,
    registerRoutes(app: FastifyInstance) {
      registerUserRoutes(app, controller);
    },
  };
}
