/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - Kysely-backed UserRepository.
 * - Each operation runs exactly one statement on a connection that is
 *   acquired for that operation and released on every exit path.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - Storage errors propagate untouched (signup classifies them).
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { CreateUserInput, User, UserId, UserRepository } from '../user.types';
import { selectAllUsersSql, selectUserByIdSql } from './user.query-sql';
import type { UserRow } from './user.query-sql';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    firstName: row.first_name,
    lastName: row.last_name,
    email: row.email,
    password: row.password,
  };
}

export class UserRepo implements UserRepository {
  constructor(private readonly db: DbExecutor) {}

  private withConnection<T>(fn: (conn: DbExecutor) => Promise<T>): Promise<T> {
    return this.db.connection().execute(fn);
  }

  async listUsers(): Promise<User[]> {
    const rows = await this.withConnection((conn) => selectAllUsersSql(conn));
    return rows.map(toUser);
  }

  /**
   * username + email must be unique (enforced by DB constraint).
   * A duplicate surfaces as pg DatabaseError code 23505.
   */
  async insertUser(input: CreateUserInput): Promise<User> {
    const row = await this.withConnection((conn) =>
      conn
        .insertInto('user_profile')
        .values({
          username: input.username,
          first_name: input.firstName,
          last_name: input.lastName,
          email: input.email,
          password: input.password,
        })
        .returningAll()
        .executeTakeFirstOrThrow(),
    );

    return toUser(row);
  }

  async fetchUser(id: UserId): Promise<User | undefined> {
    const row = await this.withConnection((conn) => selectUserByIdSql(conn, id));
    if (!row) return undefined;
    return toUser(row);
  }

  async deleteUser(id: UserId): Promise<boolean> {
    const res = await this.withConnection((conn) =>
      conn.deleteFrom('user_profile').where('id', '=', id).executeTakeFirst(),
    );

    return Number(res?.numDeletedRows ?? 0) === 1;
  }
}
