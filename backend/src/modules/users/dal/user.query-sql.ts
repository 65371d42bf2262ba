/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for users (raw SQL access).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UserProfileTable } from '../../../shared/db/schema';

export type UserRow = Selectable<UserProfileTable>;

export async function selectAllUsersSql(db: DbExecutor): Promise<UserRow[]> {
  return db.selectFrom('user_profile').selectAll().execute();
}

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: number,
): Promise<UserRow | undefined> {
  return db.selectFrom('user_profile').selectAll().where('id', '=', userId).executeTakeFirst();
}
