/**
 * backend/src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its error semantics.
 * - Signup failures are a closed set of kinds; the status/message for each
 *   kind lives in one table so transport and classification stay separate.
 *
 * RULES:
 * - Use AppError as the transport primitive for read/delete paths.
 * - Messages here are user-facing; never include SQL codes or details.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const SIGNUP_ERROR_KINDS = ['DUPLICATE_KEY', 'UNKNOWN_QUERY', 'UNKNOWN_DATABASE'] as const;

export type SignupErrorKind = (typeof SIGNUP_ERROR_KINDS)[number];

export type SignupErrorResponse = {
  status: number;
  message: string;
};

export const SIGNUP_ERROR_RESPONSES = {
  DUPLICATE_KEY: {
    status: 409,
    message: 'Duplicate username or email contained a duplicate key.',
  },
  UNKNOWN_QUERY: {
    status: 500,
    message: 'Database query contained an unspecified error.',
  },
  UNKNOWN_DATABASE: {
    status: 500,
    message: 'Database error, not query related.',
  },
} as const satisfies Record<SignupErrorKind, SignupErrorResponse>;

export const UserErrors = {
  userNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found', meta);
  },
} as const;
