/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates the DB session provider ONCE and shares it.
 * - Keeps modules testable (tests inject an in-process dialect).
 *
 * RULES:
 * - No business logic here.
 * - No console I/O here.
 * - Startup failures (handle construction, unreachable DB) throw; the entrypoint aborts.
 */

import type { AppConfig } from './config';
import { SessionProvider } from '../shared/db/session-provider';
import type { DbHandleFactory } from '../shared/db/session-provider';
import { ensureSchema } from '../shared/db/ensure-schema';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createUserModule } from '../modules/users';
import type { UserModule } from '../modules/users';

export type AppDeps = {
  logger: Logger;
  sessions: SessionProvider;

  // modules
  users: UserModule;

  // lifecycle
  close: () => Promise<void>;
};

export async function buildDeps(
  config: AppConfig,
  overrides: { createHandle?: DbHandleFactory; now?: () => Date } = {},
): Promise<AppDeps> {
  const sessions = new SessionProvider({
    connection: config.connection,
    pool: config.pool,
    logger,
    createHandle: overrides.createHandle,
  });

  sessions.getHandle();

  if (!(await sessions.ping())) {
    await sessions.shutdown();
    throw new Error('Database is not reachable');
  }

  if (config.ensureSchema) {
    await sessions.withSession((db) => ensureSchema(db));
    logger.info('db.schema.ensured');
  }

  const users = createUserModule({ sessions, logger, now: overrides.now });

  return {
    logger,
    sessions,
    users,
    close: async () => {
      await sessions.shutdown();
    },
  };
}
