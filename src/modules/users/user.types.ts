/**
 * src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - One email = one user (exact, case-sensitive match).
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - Absence is `null` for age, never a sentinel like 0 or -1.
 */

export type UserId = number;

export type User = {
  id: UserId;
  name: string;
  email: string;
  age: number | null;

  createdAt: Date;
};

export type CreateUserInput = {
  name: string;
  email: string;
  age?: number | null;
};

/**
 * Changes typed by an operator. Blank strings / undefined mean "keep current value".
 */
export type UserChanges = {
  name?: string;
  email?: string;
  age?: number | null;
};

export type UserStats = {
  total: number;
  withAge: number;
  withoutAge: number;
  averageAge: number | null;
};
