/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Table types live in ./schema (kept in step with migrations).
 *
 * HOW TO USE:
 * - DI calls createDb() once; repos receive the handle through their constructor.
 * - Kysely acquires a pooled connection per statement and releases it afterwards.
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { DB } from './schema';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * - Works for both the main DB and a single scoped connection.
 * - Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<DB>;

export type CreateDbOptions = {
  url: string;
  poolMax: number;
  connectionTimeoutMs: number;
  statementTimeoutMs: number;
};

/** OID of Postgres `int8` / `bigint` (user_profile.id is bigserial). */
export const PG_INT8_OID = 20;

/**
 * pg returns int8 as a string by default. Ids must stay JSON numbers;
 * every id this service issues is far below Number.MAX_SAFE_INTEGER.
 */
export function parseInt8(value: string): number {
  return Number(value);
}

export function createDb(opts: CreateDbOptions): Db {
  pg.types.setTypeParser(PG_INT8_OID, parseInt8);

  const pool = new pg.Pool({
    connectionString: opts.url,
    max: opts.poolMax,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: opts.connectionTimeoutMs,
    statement_timeout: opts.statementTimeoutMs,
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}
