import pg from 'pg';
import { PG_UNIQUE_VIOLATION } from '../../src/modules/users/policies/classify-storage-error.policy';
import type {
  CreateUserInput,
  User,
  UserId,
  UserRepository,
} from '../../src/modules/users/user.types';

/**
 * In-process stand-in for the user_profile table.
 *
 * - ids come from a sequence starting at 1 (like `serial`).
 * - username/email uniqueness raises a real pg DatabaseError with SQLSTATE 23505,
 *   so the signup classifier sees what Postgres would send.
 * - failNextWith(err) makes the next call throw, to simulate outages.
 */
export class InMemUserRepo implements UserRepository {
  private readonly rows = new Map<UserId, User>();
  private nextId = 1;
  private pendingFailure: unknown = null;

  failNextWith(err: unknown): void {
    this.pendingFailure = err;
  }

  get size(): number {
    return this.rows.size;
  }

  async listUsers(): Promise<User[]> {
    this.throwIfFailing();
    return [...this.rows.values()].map((u) => ({ ...u }));
  }

  async insertUser(input: CreateUserInput): Promise<User> {
    this.throwIfFailing();

    for (const existing of this.rows.values()) {
      if (existing.username === input.username) {
        throw uniqueViolation('user_profile_username_key', `Key (username)=(${input.username}) already exists.`);
      }
      if (existing.email === input.email) {
        throw uniqueViolation('user_profile_email_key', `Key (email)=(${input.email}) already exists.`);
      }
    }

    const user: User = { id: this.nextId++, ...input };
    this.rows.set(user.id, user);
    return { ...user };
  }

  async fetchUser(id: UserId): Promise<User | undefined> {
    this.throwIfFailing();
    const row = this.rows.get(id);
    return row ? { ...row } : undefined;
  }

  async deleteUser(id: UserId): Promise<boolean> {
    this.throwIfFailing();
    return this.rows.delete(id);
  }

  private throwIfFailing(): void {
    if (this.pendingFailure === null) return;
    const err = this.pendingFailure;
    this.pendingFailure = null;
    throw err;
  }
}

export function pgDatabaseError(opts: {
  code: string;
  message: string;
  constraint?: string;
  detail?: string;
}): pg.DatabaseError {
  const err = new pg.DatabaseError(opts.message, 0, 'error');
  err.code = opts.code;
  err.table = 'user_profile';
  err.constraint = opts.constraint;
  err.detail = opts.detail;
  return err;
}

function uniqueViolation(constraint: string, detail: string): pg.DatabaseError {
  return pgDatabaseError({
    code: PG_UNIQUE_VIOLATION,
    message: `duplicate key value violates unique constraint "${constraint}"`,
    constraint,
    detail,
  });
}
