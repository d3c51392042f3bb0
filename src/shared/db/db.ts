/**
 * src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB handle over a pg pool.
 * - The handle is built from a resolved ConnectionDescriptor, never from raw env.
 *
 * HOW TO USE:
 * - Do not call createDb() from modules. SessionProvider owns the handle lifecycle.
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { DB } from './database.types';
import type { ConnectionDescriptor } from './connection-resolver';
import type { Logger } from '../logger/logger';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * - Works for the main handle, a single session and a transaction alike.
 * - Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<DB>;

export type DbPoolOptions = {
  max?: number;
  connectionTimeoutMillis?: number;
  /** Server-side per-statement limit; 0 disables it. */
  statementTimeoutMillis?: number;
};

/**
 * pg.Pool for a resolved descriptor.
 * An idle client that loses its connection is reported on the pool's 'error' event;
 * it is logged here and the pool replaces the client on the next checkout.
 */
export function createPool(
  connection: ConnectionDescriptor,
  opts: DbPoolOptions,
  logger: Logger,
): pg.Pool {
  const pool = new pg.Pool({
    connectionString: connection.driverUrl,
    user: connection.username,
    password: connection.password,
    // One operator, one in-flight operation.
    max: opts.max ?? 1,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: opts.connectionTimeoutMillis ?? 10_000,
    statement_timeout: opts.statementTimeoutMillis ?? 10_000,
  });

  pool.on('error', (err) => {
    logger.warn('db.pool.idle_client_error', { err });
  });

  return pool;
}

export function createDb(
  connection: ConnectionDescriptor,
  opts: DbPoolOptions,
  logger: Logger,
): Db {
  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool: createPool(connection, opts, logger) }),
  });
}
