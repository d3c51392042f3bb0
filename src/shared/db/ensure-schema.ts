/**
 * src/shared/db/ensure-schema.ts
 *
 * WHY:
 * - The tool must be usable against an empty database: the users table is
 *   created on startup if it does not exist yet.
 * - This is NOT a migration runner: it never alters an existing table.
 *
 * RULES:
 * - Keep aligned with database.types.ts.
 */

import { sql } from 'kysely';

import type { DbExecutor } from './db';

export async function ensureSchema(db: DbExecutor): Promise<void> {
  await db.schema
    .createTable('users')
    .ifNotExists()
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('name', 'varchar(100)', (col) => col.notNull())
    .addColumn('email', 'varchar(150)', (col) => col.notNull().unique())
    .addColumn('age', 'integer')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();
}
