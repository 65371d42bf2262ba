/**
 * backend/src/modules/users/policies/classify-storage-error.policy.ts
 *
 * WHY:
 * - Signup needs to tell "someone already has that username/email" apart from
 *   genuine storage faults, without leaking SQL details to callers.
 *
 * RULES:
 * - Synchronous, never throws, never retries.
 * - Logs diagnostics for the unexpected kinds only; duplicates are expected traffic.
 */

import pg from 'pg';
import type { LogMeta } from '../../../shared/logger/logger';
import type { SignupErrorKind } from '../user.errors';

/** SQLSTATE raised by Postgres when a unique constraint is breached. */
export const PG_UNIQUE_VIOLATION = '23505';

export type ClassifierLog = {
  error: (msg: string, meta?: LogMeta) => void;
};

export function classifyStorageError(err: unknown, log: ClassifierLog): SignupErrorKind {
  if (err instanceof pg.DatabaseError) {
    if (err.code === PG_UNIQUE_VIOLATION) return 'DUPLICATE_KEY';

    log.error('users.signup.unknown_query_error', {
      flow: 'users.signup',
      code: err.code,
      detail: err.detail,
      constraint: err.constraint,
      table: err.table,
      message: err.message,
    });
    return 'UNKNOWN_QUERY';
  }

  log.error('users.signup.unknown_database_error', {
    flow: 'users.signup',
    err,
  });
  return 'UNKNOWN_DATABASE';
}
