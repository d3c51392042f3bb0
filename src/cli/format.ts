/**
 * src/cli/format.ts
 *
 * Text rendering for users and statistics. Pure; returns lines.
 */

import type { User, UserStats } from '../modules/users';

export const RULE = '=====================================';
export const SEPARATOR = '-------------------------------------';

export function formatAge(age: number | null): string {
  return age === null ? 'not specified' : String(age);
}

export function formatUserDetails(user: User): string[] {
  return [
    `ID: ${user.id}`,
    `Name: ${user.name}`,
    `Email: ${user.email}`,
    `Age: ${formatAge(user.age)}`,
    `Created at: ${user.createdAt.toISOString()}`,
  ];
}

export function formatStats(stats: UserStats): string[] {
  const lines = [`Total users: ${stats.total}`];
  if (stats.total === 0) return lines;

  lines.push(`Users with age: ${stats.withAge}`, `Users without age: ${stats.withoutAge}`);
  if (stats.averageAge !== null) {
    lines.push(`Average age: ${stats.averageAge.toFixed(1)}`);
  }
  return lines;
}
