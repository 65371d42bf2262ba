/**
 * backend/src/modules/users/flows/signup/execute-signup-flow.ts
 *
 * WHY:
 * - The only multi-step orchestration in the Users module:
 *   insert → (on failure) classify → map to status + message.
 *
 * RULES:
 * - No HTTP objects here; the controller turns the outcome into a reply.
 * - No compensation: the insert is a single atomic statement.
 * - Never log the password.
 */

import type { Logger } from '../../../../shared/logger/logger';
import { classifyStorageError } from '../../policies/classify-storage-error.policy';
import { SIGNUP_ERROR_RESPONSES } from '../../user.errors';
import type { SignupErrorKind } from '../../user.errors';
import type { CreateUserInput, User, UserId, UserRepository } from '../../user.types';

export type SignupOutcome =
  | { ok: true; user: User; location: string }
  | { ok: false; kind: SignupErrorKind; status: number; message: string };

export function userLocation(id: UserId): string {
  return `/users/${id}`;
}

export async function executeSignupFlow(
  deps: { userRepo: UserRepository; logger: Logger },
  params: { input: CreateUserInput; requestId: string },
): Promise<SignupOutcome> {
  const { input, requestId } = params;

  deps.logger.info('users.signup.start', {
    flow: 'users.signup',
    requestId,
    username: input.username,
  });

  let user: User;
  try {
    user = await deps.userRepo.insertUser(input);
  } catch (err: unknown) {
    const kind = classifyStorageError(err, {
      error: (msg, meta) => deps.logger.error(msg, { requestId, ...meta }),
    });
    const { status, message } = SIGNUP_ERROR_RESPONSES[kind];

    deps.logger.info('users.signup.rejected', {
      flow: 'users.signup',
      requestId,
      kind,
      status,
    });

    return { ok: false, kind, status, message };
  }

  deps.logger.info('users.signup.success', {
    flow: 'users.signup',
    requestId,
    userId: user.id,
  });

  return { ok: true, user, location: userLocation(user.id) };
}
