/**
 * src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent coupling via deep imports into /queries or /dal.
 */

export { createUserModule } from './user.module';
export type { UserModule } from './user.module';
export { UserService } from './user.service';
export { assertEmailAvailable, isEmailChange } from './policies/email-uniqueness.policy';
export { applyUserChanges } from './policies/user-changes.policy';
export { summarizeUsers } from './helpers/summarize-users';
export { parseAgeInput, parseUserId } from './user.schemas';
export type { AgeInput } from './user.schemas';
export type { CreateUserInput, User, UserChanges, UserId, UserStats } from './user.types';
