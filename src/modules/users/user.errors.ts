/**
 * src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain semantics.
 * - Keeps shared/errors.ts small and stable.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Put user-specific meaning here: messages + safe meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/errors';

export const UserErrors = {
  invalidInput(message: string, meta?: AppErrorMeta) {
    return AppError.validationError(message, meta);
  },

  userNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found', meta);
  },

  emailTaken(meta?: AppErrorMeta) {
    return AppError.conflict('A user with this email already exists', meta);
  },

  persistenceFailed(operation: string, cause: unknown, meta?: AppErrorMeta) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return AppError.persistence(`Failed to ${operation}: ${reason}`, cause, meta);
  },
} as const;
