/**
 * src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into User domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  countUsersByEmailSql,
  countUsersSql,
  selectAllUsersSql,
  selectUserByEmailSql,
  selectUserByIdSql,
} from '../dal/user.query-sql';
import type { UserRow } from '../dal/user.query-sql';
import type { User } from '../user.types';

export function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    age: row.age ?? null,
    createdAt: new Date(row.created_at),
  };
}

export async function getUserById(db: DbExecutor, userId: number): Promise<User | undefined> {
  const row = await selectUserByIdSql(db, userId);
  if (!row) return undefined;
  return toUser(row);
}

export async function getUserByEmail(db: DbExecutor, email: string): Promise<User | undefined> {
  const row = await selectUserByEmailSql(db, email);
  if (!row) return undefined;
  return toUser(row);
}

export async function listUsers(db: DbExecutor): Promise<User[]> {
  const rows = await selectAllUsersSql(db);
  return rows.map(toUser);
}

export async function countUsers(db: DbExecutor): Promise<number> {
  return countUsersSql(db);
}

export async function emailExists(db: DbExecutor, email: string): Promise<boolean> {
  return (await countUsersByEmailSql(db, email)) > 0;
}
