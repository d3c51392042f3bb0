/**
 * src/shared/db/database.types.ts
 *
 * WHY:
 * - Kysely table interfaces for the one relation this tool owns.
 * - Hand-maintained: keep aligned with ensure-schema.ts.
 *
 * RULES:
 * - snake_case here only; modules shape rows into camelCase domain types.
 * - created_at is insertable but never updatable (immutable after creation).
 */

import type { ColumnType, Generated } from 'kysely';

export interface Users {
  id: Generated<number>;
  name: string;
  email: string;
  age: number | null;
  created_at: ColumnType<Date, Date | undefined, never>;
}

export interface DB {
  users: Users;
}
