/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /dal or /flows.
 */

export { createUserModule } from './user.module';
export type { UserModule } from './user.module';
export type { CreateUserInput, User, UserId, UserRepository } from './user.types';
