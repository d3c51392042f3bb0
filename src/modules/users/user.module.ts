/**
 * src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { SessionProvider } from '../../shared/db/session-provider';
import type { Logger } from '../../shared/logger/logger';
import { UserService } from './user.service';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: {
  sessions: SessionProvider;
  logger: Logger;
  now?: () => Date;
}) {
  const userService = new UserService(deps);

  return {
    userService,
  };
}
