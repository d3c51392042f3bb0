/**
 * src/shared/errors.ts
 *
 * WHY:
 * - Central error primitive used by services and the console menu.
 * - The menu prints `message`; logs and tests branch on `code`.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. users/user.errors.ts).
 */

export const APP_ERROR_CODES = ['VALIDATION_ERROR', 'NOT_FOUND', 'CONFLICT', 'PERSISTENCE'] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly meta?: AppErrorMeta;

  constructor(opts: { code: AppErrorCode; message: string; meta?: AppErrorMeta; cause?: unknown }) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'AppError';
    this.code = opts.code;
    this.meta = opts.meta;
  }

  static notFound(message = 'Not found', meta?: AppErrorMeta) {
    return new AppError({ code: 'NOT_FOUND', message, meta });
  }

  static validationError(message = 'Validation error', meta?: AppErrorMeta) {
    return new AppError({ code: 'VALIDATION_ERROR', message, meta });
  }

  static conflict(message = 'Conflict', meta?: AppErrorMeta) {
    return new AppError({ code: 'CONFLICT', message, meta });
  }

  /**
   * Any failure talking to the store. The driver error travels as `cause`
   * so the root cause survives into logs.
   */
  static persistence(message = 'Database operation failed', cause?: unknown, meta?: AppErrorMeta) {
    return new AppError({ code: 'PERSISTENCE', message, meta, cause });
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
