/**
 * src/modules/users/policies/email-uniqueness.policy.ts
 *
 * WHY:
 * - Email uniqueness is checked BEFORE create/update so the operator gets a
 *   friendly rejection instead of a raw constraint violation.
 * - The storage-level unique constraint stays in place underneath; a race between
 *   check and insert surfaces as a PERSISTENCE error (single-operator tool).
 *
 * RULES:
 * - Pure functions only. The caller runs existsByEmail.
 */

import { UserErrors } from '../user.errors';

export function assertEmailAvailable(taken: boolean, email: string): void {
  if (taken) throw UserErrors.emailTaken({ email });
}

/**
 * True when an update actually moves the user to a different email and
 * therefore needs the availability check.
 */
export function isEmailChange(currentEmail: string, nextEmail: string): boolean {
  return currentEmail !== nextEmail;
}
