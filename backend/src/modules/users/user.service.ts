/**
 * backend/src/modules/users/user.service.ts
 *
 * WHY:
 * - Single entry point the controller talks to.
 * - Reads/deletes are pass-through; signup delegates to its flow.
 *
 * RULES:
 * - No HTTP objects here.
 * - Absence becomes UserErrors.userNotFound (404), never a storage error.
 * - Storage failures on read/delete propagate to the global error handler (500).
 */

import type { Logger } from '../../shared/logger/logger';
import { executeSignupFlow } from './flows/signup/execute-signup-flow';
import type { SignupOutcome } from './flows/signup/execute-signup-flow';
import { UserErrors } from './user.errors';
import type { CreateUserInput, User, UserId, UserRepository } from './user.types';

export class UserService {
  constructor(
    private readonly deps: {
      userRepo: UserRepository;
      logger: Logger;
    },
  ) {}

  async listUsers(): Promise<User[]> {
    return this.deps.userRepo.listUsers();
  }

  async getUser(id: UserId): Promise<User> {
    const user = await this.deps.userRepo.fetchUser(id);
    if (!user) throw UserErrors.userNotFound({ userId: id });
    return user;
  }

  async deleteUser(params: { id: UserId; requestId: string }): Promise<void> {
    const removed = await this.deps.userRepo.deleteUser(params.id);
    if (!removed) throw UserErrors.userNotFound({ userId: params.id });

    this.deps.logger.info('users.delete.success', {
      flow: 'users.delete',
      requestId: params.requestId,
      userId: params.id,
    });
  }

  async signup(params: { input: CreateUserInput; requestId: string }): Promise<SignupOutcome> {
    return executeSignupFlow(this.deps, params);
  }
}
