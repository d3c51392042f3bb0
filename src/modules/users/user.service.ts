/**
 * src/modules/users/user.service.ts
 *
 * WHY:
 * - The users "repository" contract the console menu consumes: eight operations,
 *   plain values in and out (no Kysely types cross this boundary).
 * - Only place allowed to open sessions / start transactions for users.
 *
 * RULES:
 * - One scoped session per operation; mutations run in exactly one transaction.
 * - No raw DB access outside queries/DAL.
 * - Domain outcomes (validation, not found) propagate as AppError unchanged.
 *   Anything else is logged with its root cause and rethrown as PERSISTENCE.
 * - Absence is a normal outcome for lookups: undefined, not an error.
 * - Email uniqueness is the caller's pre-check (existsByEmail + assertEmailAvailable).
 */

import type { ZodType, ZodTypeDef } from 'zod';

import type { SessionProvider } from '../../shared/db/session-provider';
import type { Logger } from '../../shared/logger/logger';
import { withLogContext } from '../../shared/logger/with-context';
import type { ContextLogger, LogMeta } from '../../shared/logger/with-context';
import { isAppError } from '../../shared/errors';

import { UserRepo } from './dal/user.repo';
import { countUsers, emailExists, getUserByEmail, getUserById, listUsers, toUser } from './queries/user.queries';
import { createUserSchema } from './user.schemas';
import { UserErrors } from './user.errors';
import type { CreateUserInput, User, UserId } from './user.types';

export type UserServiceDeps = {
  sessions: SessionProvider;
  logger: Logger;
  /** Application clock for createdAt. */
  now?: () => Date;
};

export class UserService {
  constructor(private readonly deps: UserServiceDeps) {}

  async create(input: CreateUserInput): Promise<User> {
    return this.run('create', 'create user', { email: input.email }, async (log) => {
      const values = parseOrThrow(createUserSchema, input);
      const createdAt = this.now();

      const user = await this.deps.sessions.withTransaction(async (trx) => {
        const row = await new UserRepo(trx).insertUser({ ...values, createdAt });
        return toUser(row);
      });

      log.info('users.create.success', { userId: user.id });
      return user;
    });
  }

  async findById(id: UserId): Promise<User | undefined> {
    return this.run('find_by_id', 'find user', { userId: id }, async (log) => {
      const user = await this.deps.sessions.withSession((db) => getUserById(db, id));
      log.debug('users.find_by_id.result', { found: user !== undefined });
      return user;
    });
  }

  async findByEmail(email: string): Promise<User | undefined> {
    return this.run('find_by_email', 'find user', { email }, async (log) => {
      const user = await this.deps.sessions.withSession((db) => getUserByEmail(db, email));
      log.debug('users.find_by_email.result', { found: user !== undefined });
      return user;
    });
  }

  /**
   * All users, newest first.
   */
  async findAll(): Promise<User[]> {
    return this.run('find_all', 'list users', {}, async (log) => {
      const users = await this.deps.sessions.withSession((db) => listUsers(db));
      log.debug('users.find_all.result', { count: users.length });
      return users;
    });
  }

  /**
   * Persists name, email and age of an existing user. id and createdAt are never written.
   * Throws NOT_FOUND if the id does not exist.
   */
  async update(user: User): Promise<User> {
    return this.run('update', 'update user', { userId: user.id }, async (log) => {
      const values = parseOrThrow(createUserSchema, {
        name: user.name,
        email: user.email,
        age: user.age,
      });

      const updated = await this.deps.sessions.withTransaction(async (trx) => {
        const existing = await getUserById(trx, user.id);
        if (!existing) throw UserErrors.userNotFound({ userId: user.id });

        await new UserRepo(trx).updateUser({ userId: user.id, ...values });

        const reloaded = await getUserById(trx, user.id);
        if (!reloaded) throw UserErrors.userNotFound({ userId: user.id });
        return reloaded;
      });

      log.info('users.update.success');
      return updated;
    });
  }

  /**
   * Hard delete. Returns false (not an error) when the id does not exist.
   */
  async delete(id: UserId): Promise<boolean> {
    return this.run('delete', 'delete user', { userId: id }, async (log) => {
      const deleted = await this.deps.sessions.withTransaction((trx) =>
        new UserRepo(trx).deleteUser(id),
      );

      log.info(deleted ? 'users.delete.success' : 'users.delete.not_found');
      return deleted;
    });
  }

  async existsByEmail(email: string): Promise<boolean> {
    return this.run('exists_by_email', 'check email', { email }, async () =>
      this.deps.sessions.withSession((db) => emailExists(db, email)),
    );
  }

  async count(): Promise<number> {
    return this.run('count', 'count users', {}, async () =>
      this.deps.sessions.withSession((db) => countUsers(db)),
    );
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  private async run<T>(
    operation: string,
    action: string,
    meta: LogMeta,
    fn: (log: ContextLogger) => Promise<T>,
  ): Promise<T> {
    const log = withLogContext(this.deps.logger, { operation: `users.${operation}`, ...meta });

    try {
      return await fn(log);
    } catch (err) {
      if (isAppError(err)) {
        log.warn(`users.${operation}.rejected`, { code: err.code, reason: err.message });
        throw err;
      }

      log.error(`users.${operation}.failed`, { err });
      throw UserErrors.persistenceFailed(action, err, meta);
    }
  }
}

function parseOrThrow<Out, In>(schema: ZodType<Out, ZodTypeDef, In>, input: unknown): Out {
  const parsed = schema.safeParse(input);
  if (parsed.success) return parsed.data;

  const issue = parsed.error.issues[0];
  throw UserErrors.invalidInput(issue?.message ?? 'Invalid input', {
    issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
  });
}
