import { buildConfig } from '../../src/app/config';
import { buildDeps } from '../../src/app/di';
import type { DbHandleFactory } from '../../src/shared/db/session-provider';
import { createMemDbFactory } from './mem-db';

/**
 * WHY:
 * - Build the real dependency graph (config -> di -> modules) for DAL-style tests.
 * - The database is pg-mem, in process; nothing leaves the test process.
 *
 * RULES:
 * - Always call close() (afterEach or finally).
 */
export async function buildTestDeps(
  opts: { now?: () => Date; createHandle?: DbHandleFactory } = {},
) {
  const config = buildConfig({ NODE_ENV: 'test' });
  const deps = await buildDeps(config, {
    createHandle: opts.createHandle ?? createMemDbFactory(),
    now: opts.now,
  });

  return {
    deps,
    users: deps.users.userService,
    close: deps.close,
  };
}
