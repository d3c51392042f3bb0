/**
 * src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations).
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Construct per transaction: new UserRepo(trx).
 * - Never writes id or created_at on update.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { UserRow } from './user.query-sql';

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  /**
   * Inserts a user. id is generated by the store.
   * Email uniqueness is also enforced by a DB constraint.
   */
  async insertUser(params: {
    name: string;
    email: string;
    age: number | null;
    createdAt: Date;
  }): Promise<UserRow> {
    return this.db
      .insertInto('users')
      .values({
        name: params.name,
        email: params.email,
        age: params.age,
        created_at: params.createdAt,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  async updateUser(params: {
    userId: number;
    name: string;
    email: string;
    age: number | null;
  }): Promise<void> {
    await this.db
      .updateTable('users')
      .set({
        name: params.name,
        email: params.email,
        age: params.age,
      })
      .where('id', '=', params.userId)
      .execute();
  }

  /**
   * Returns true if a row was removed.
   */
  async deleteUser(userId: number): Promise<boolean> {
    const result = await this.db.deleteFrom('users').where('id', '=', userId).executeTakeFirst();
    return result.numDeletedRows > 0n;
  }
}
