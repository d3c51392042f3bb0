/**
 * src/modules/users/helpers/summarize-users.ts
 *
 * Age statistics for the "User statistics" menu entry.
 */

import type { User, UserStats } from '../user.types';

export function summarizeUsers(users: readonly User[]): UserStats {
  const ages = users.map((u) => u.age).filter((age): age is number => age !== null);
  const sum = ages.reduce((acc, age) => acc + age, 0);

  return {
    total: users.length,
    withAge: ages.length,
    withoutAge: users.length - ages.length,
    averageAge: ages.length > 0 ? sum / ages.length : null,
  };
}
