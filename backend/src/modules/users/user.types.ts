/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - UserRepository is the storage seam: Kysely in prod, in-memory fakes in tests.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

export type UserId = number;

export type User = {
  id: UserId;
  username: string;
  firstName: string;
  lastName: string;
  email: string;
  password: string;
};

export type CreateUserInput = Omit<User, 'id'>;

export interface UserRepository {
  /** All users, in whatever order storage returns them. */
  listUsers(): Promise<User[]>;

  /** Throws the raw storage error on constraint violation or connectivity failure. */
  insertUser(input: CreateUserInput): Promise<User>;

  /** Absence is `undefined`, not an error. */
  fetchUser(id: UserId): Promise<User | undefined>;

  /** True only when exactly one row was removed. */
  deleteUser(id: UserId): Promise<boolean>;
}
