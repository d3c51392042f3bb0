/**
 * src/shared/db/session-provider.ts
 *
 * WHY:
 * - One long-lived DB handle per process, built lazily and rebuilt if it was closed.
 * - Gives services two scoped primitives: a session (one pooled connection) and a
 *   transaction on top of it. Both release the connection on every exit path.
 * - Owned by the composition root (app/di.ts) and injected; no module-level singleton.
 *
 * RULES:
 * - The connection resolver is consulted once per provider; the descriptor is cached.
 * - Handle construction is synchronous, so concurrent callers cannot build two handles.
 * - A failed rollback is logged and never replaces the error that caused it.
 * - No retries: failures propagate to the caller.
 */

import { sql } from 'kysely';

import type { Logger } from '../logger/logger';
import { createDb } from './db';
import type { Db, DbExecutor, DbPoolOptions } from './db';
import { resolveConnection } from './connection-resolver';
import type { ConnectionDescriptor, ConnectionInput } from './connection-resolver';

export type DbHandleFactory = (
  connection: ConnectionDescriptor,
  pool: DbPoolOptions,
  logger: Logger,
) => Db;

export type SessionProviderDeps = {
  connection: ConnectionInput;
  pool?: DbPoolOptions;
  logger: Logger;
  /** Defaults to createDb (pg pool). Tests pass an in-process dialect. */
  createHandle?: DbHandleFactory;
};

export class SessionProvider {
  private handle: Db | null = null;
  private descriptor: ConnectionDescriptor | null = null;
  private readonly createHandle: DbHandleFactory;

  constructor(private readonly deps: SessionProviderDeps) {
    this.createHandle = deps.createHandle ?? createDb;
  }

  isOpen(): boolean {
    return this.handle !== null;
  }

  /**
   * Returns the cached handle, or builds one. Throws only if construction fails,
   * which callers at startup treat as fatal.
   */
  getHandle(): Db {
    if (this.handle) return this.handle;

    if (!this.descriptor) {
      this.descriptor = resolveConnection(this.deps.connection, { logger: this.deps.logger });
    }

    this.deps.logger.info('db.handle.create', { driverUrl: this.descriptor.driverUrl });
    this.handle = this.createHandle(this.descriptor, this.deps.pool ?? {}, this.deps.logger);
    this.deps.logger.info('db.handle.created');

    return this.handle;
  }

  /**
   * Runs `fn` on one pooled connection. Kysely releases it when `fn` settles.
   */
  async withSession<T>(fn: (session: DbExecutor) => Promise<T>): Promise<T> {
    return this.getHandle().connection().execute(fn);
  }

  /**
   * Runs `fn` inside BEGIN/COMMIT on one session. Any error rolls back and is rethrown as is.
   */
  async withTransaction<T>(fn: (trx: DbExecutor) => Promise<T>): Promise<T> {
    return this.withSession(async (session) => {
      await sql`begin`.execute(session);

      try {
        const result = await fn(session);
        await sql`commit`.execute(session);
        return result;
      } catch (err) {
        await this.rollback(session, err);
        throw err;
      }
    });
  }

  private async rollback(session: DbExecutor, cause: unknown): Promise<void> {
    try {
      await sql`rollback`.execute(session);
      this.deps.logger.warn('db.transaction.rolled_back', {
        cause: cause instanceof Error ? cause.message : String(cause),
      });
    } catch (rollbackErr) {
      this.deps.logger.error('db.transaction.rollback_failed', {
        err: rollbackErr,
        cause: cause instanceof Error ? cause.message : String(cause),
      });
    }
  }

  /**
   * Connectivity check. Never throws.
   */
  async ping(): Promise<boolean> {
    try {
      await sql`select 1`.execute(this.getHandle());
      return true;
    } catch (err) {
      this.deps.logger.error('db.ping.failed', { err });
      return false;
    }
  }

  /**
   * Closes the handle if open. Idempotent; safe if never initialized.
   * The next getHandle() builds a fresh handle from the cached descriptor.
   */
  async shutdown(): Promise<void> {
    const handle = this.handle;
    if (!handle) return;

    this.handle = null;
    this.deps.logger.info('db.handle.close');

    try {
      await handle.destroy();
      this.deps.logger.info('db.handle.closed');
    } catch (err) {
      this.deps.logger.error('db.handle.close_failed', { err });
    }
  }
}
