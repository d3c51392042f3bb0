/**
 * src/shared/logger/with-context.ts
 *
 * WHY:
 * - Most logs inside an operation should carry the same fields (operation, userId, email).
 * - We don't want every call site repeating them manually.
 *
 * HOW TO USE:
 * - `const log = withLogContext(logger, { operation: 'users.update', userId })`
 * - `log.info('users.update.success', { ... })`
 */

import type { Logger } from './logger';

export type LogMeta = Record<string, unknown>;

export type ContextLogger = {
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
  debug: (msg: string, meta?: LogMeta) => void;
};

export function withLogContext(log: Logger, base: LogMeta): ContextLogger {
  return {
    info: (msg, meta = {}) => {
      log.info(msg, { ...base, ...meta });
    },
    warn: (msg, meta = {}) => {
      log.warn(msg, { ...base, ...meta });
    },
    error: (msg, meta = {}) => {
      log.error(msg, { ...base, ...meta });
    },
    debug: (msg, meta = {}) => {
      log.debug(msg, { ...base, ...meta });
    },
  };
}
