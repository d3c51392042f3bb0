/**
 * src/modules/users/dal/user.query-sql.ts
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
import type { Users } from '../../../shared/db/database.types';

export type UserRow = Selectable<Users>;

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: number,
): Promise<UserRow | undefined> {
  return db.selectFrom('users').selectAll().where('id', '=', userId).executeTakeFirst();
}

export async function selectUserByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<UserRow | undefined> {
  return db.selectFrom('users').selectAll().where('email', '=', email).executeTakeFirst();
}

/**
 * Newest first. id breaks ties between rows created in the same instant.
 */
export async function selectAllUsersSql(db: DbExecutor): Promise<UserRow[]> {
  return db
    .selectFrom('users')
    .selectAll()
    .orderBy('created_at', 'desc')
    .orderBy('id', 'desc')
    .execute();
}

export async function countUsersSql(db: DbExecutor): Promise<number> {
  const row = await db
    .selectFrom('users')
    .select((eb) => eb.fn.countAll<string | number | bigint>().as('count'))
    .executeTakeFirstOrThrow();

  // pg returns bigint counts as strings
  return Number(row.count);
}

export async function countUsersByEmailSql(db: DbExecutor, email: string): Promise<number> {
  const row = await db
    .selectFrom('users')
    .select((eb) => eb.fn.countAll<string | number | bigint>().as('count'))
    .where('email', '=', email)
    .executeTakeFirstOrThrow();

  return Number(row.count);
}
