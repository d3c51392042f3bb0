/**
 * src/index.ts
 *
 * WHY:
 * - Single entrypoint for the console tool.
 * - Keeps startup logic small: load config -> build deps -> run menu -> close.
 * - A database that cannot be reached at startup aborts the process (exit 1).
 */

import { buildConfig } from './app/config';
import { buildDeps } from './app/di';
import { createConsolePrompt } from './cli/prompt';
import { UserMenu } from './cli/user-menu';
import { logger } from './shared/logger/logger';

async function main(): Promise<void> {
  const config = buildConfig();
  logger.info('app.starting', { env: config.nodeEnv, service: config.serviceName });

  const deps = await buildDeps(config);
  const prompt = createConsolePrompt();
  const menu = new UserMenu({ users: deps.users.userService, prompt, logger });

  const shutdown = async (signal: string) => {
    logger.info('app.shutdown', { signal });
    prompt.close();
    await deps.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  try {
    await menu.run();
  } finally {
    prompt.close();
    await deps.close();
    prompt.print('Goodbye!');
    logger.info('app.stopped');
  }
}

void main().catch((err: unknown) => {
  logger.error('app.fatal_startup_error', { err });
  process.exit(1);
});
