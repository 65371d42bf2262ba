import { describe, it, expect } from 'vitest';
import { NoResultError } from 'kysely';
import { UserRepo } from '../../src/modules/users/dal/user.repo';
import { up as createUserProfileTable } from '../../src/shared/db/migrations/0001_user_profile';
import { createRecordingDb } from '../helpers/recording-db';

const aliceRow = {
  id: 3,
  username: 'alice',
  first_name: 'A',
  last_name: 'L',
  email: 'alice@x.com',
  password: 'p',
};

const alice = {
  id: 3,
  username: 'alice',
  firstName: 'A',
  lastName: 'L',
  email: 'alice@x.com',
  password: 'p',
};

describe('users DAL (UserRepo)', () => {
  it('listUsers issues one select and maps an empty result to []', async () => {
    const { db, queries } = createRecordingDb();
    const repo = new UserRepo(db);

    await expect(repo.listUsers()).resolves.toEqual([]);

    expect(queries.map((q) => q.sql)).toEqual(['select * from "user_profile"']);
    await db.destroy();
  });

  it('insertUser inserts the five writable columns and returns the row', async () => {
    const { db, queries } = createRecordingDb();
    const repo = new UserRepo(db);

    // DummyDriver returns no rows, so RETURNING yields nothing.
    await expect(
      repo.insertUser({
        username: 'alice',
        firstName: 'A',
        lastName: 'L',
        email: 'alice@x.com',
        password: 'p',
      }),
    ).rejects.toBeInstanceOf(NoResultError);

    expect(queries).toHaveLength(1);
    expect(queries[0]?.sql).toBe(
      'insert into "user_profile" ("username", "first_name", "last_name", "email", "password") values ($1, $2, $3, $4, $5) returning *',
    );
    expect(queries[0]?.parameters).toEqual(['alice', 'A', 'L', 'alice@x.com', 'p']);
    await db.destroy();
  });

  it('fetchUser selects by id and reports absence as undefined', async () => {
    const { db, queries } = createRecordingDb();
    const repo = new UserRepo(db);

    await expect(repo.fetchUser(999)).resolves.toBeUndefined();

    expect(queries[0]?.sql).toBe('select * from "user_profile" where "id" = $1');
    expect(queries[0]?.parameters).toEqual([999]);
    await db.destroy();
  });

  it('deleteUser deletes by id and reports false when no row was affected', async () => {
    const { db, queries } = createRecordingDb();
    const repo = new UserRepo(db);

    await expect(repo.deleteUser(7)).resolves.toBe(false);

    expect(queries[0]?.sql).toBe('delete from "user_profile" where "id" = $1');
    expect(queries[0]?.parameters).toEqual([7]);
    await db.destroy();
  });

  it('fetchUser maps every column of the stored row', async () => {
    const { db } = createRecordingDb({ results: [{ rows: [aliceRow] }] });

    await expect(new UserRepo(db).fetchUser(3)).resolves.toEqual(alice);
    await db.destroy();
  });

  it('insertUser returns the row from RETURNING as a User', async () => {
    const { db } = createRecordingDb({ results: [{ rows: [aliceRow] }] });

    const created = await new UserRepo(db).insertUser({
      username: 'alice',
      firstName: 'A',
      lastName: 'L',
      email: 'alice@x.com',
      password: 'p',
    });

    expect(created).toEqual(alice);
    await db.destroy();
  });

  it('listUsers maps every row in storage order', async () => {
    const bobRow = { ...aliceRow, id: 4, username: 'bob', email: 'bob@x.com' };
    const { db } = createRecordingDb({ results: [{ rows: [aliceRow, bobRow] }] });

    const users = await new UserRepo(db).listUsers();

    expect(users).toEqual([alice, { ...alice, id: 4, username: 'bob', email: 'bob@x.com' }]);
    await db.destroy();
  });

  it('deleteUser is true only when exactly one row was affected', async () => {
    const { db } = createRecordingDb({
      results: [
        { rows: [], numAffectedRows: BigInt(1) },
        { rows: [], numAffectedRows: BigInt(0) },
        { rows: [], numAffectedRows: BigInt(2) },
      ],
    });
    const repo = new UserRepo(db);

    await expect(repo.deleteUser(3)).resolves.toBe(true);
    await expect(repo.deleteUser(3)).resolves.toBe(false);
    await expect(repo.deleteUser(3)).resolves.toBe(false);
    await db.destroy();
  });

  it('fetchUser passes ids beyond the int4 range through unchanged', async () => {
    const { db, queries } = createRecordingDb();

    await expect(new UserRepo(db).fetchUser(3_000_000_000)).resolves.toBeUndefined();

    expect(queries[0]?.parameters).toEqual([3_000_000_000]);
    await db.destroy();
  });
});

describe('user_profile migration', () => {
  it('creates id as bigserial so any int8 id is a valid lookup', async () => {
    const { db, queries } = createRecordingDb<unknown>();

    await createUserProfileTable(db);

    expect(queries).toHaveLength(1);
    expect(queries[0]?.sql).toContain('"id" bigserial primary key');
    await db.destroy();
  });
});
