/**
 * src/modules/users/policies/user-changes.policy.ts
 *
 * WHY:
 * - "Press Enter to keep the current value" semantics for updates, in one place.
 *
 * RULES:
 * - Pure: returns a new User, never mutates the input.
 * - id and createdAt are always carried over unchanged.
 */

import type { User, UserChanges } from '../user.types';

function pick(current: string, next: string | undefined): string {
  if (next === undefined) return current;
  const trimmed = next.trim();
  return trimmed === '' ? current : trimmed;
}

export function applyUserChanges(user: User, changes: UserChanges): User {
  return {
    id: user.id,
    name: pick(user.name, changes.name),
    email: pick(user.email, changes.email),
    age: changes.age === undefined ? user.age : changes.age,
    createdAt: user.createdAt,
  };
}
