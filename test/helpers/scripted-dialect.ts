import {
  CompiledQuery,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
} from 'kysely';
import type {
  DatabaseConnection,
  DatabaseIntrospector,
  Dialect,
  DialectAdapter,
  Driver,
  Kysely,
  QueryCompiler,
  QueryResult,
} from 'kysely';

import type { DB } from '../../src/shared/db/database.types';

type SqlMatcher = string | ((sql: string) => boolean);

/**
 * In-process stand-in for a Postgres server: records every statement, returns no rows,
 * fails the statements it is told to fail and reports affected-row counts it is given.
 */
export class SqlScript {
  readonly executed: string[] = [];
  acquired = 0;
  released = 0;
  destroyed = 0;

  private readonly failures: Array<{ match: SqlMatcher; error: Error }> = [];
  private readonly affected: Array<{ match: SqlMatcher; rows: bigint }> = [];

  failOn(match: SqlMatcher, error: Error): this {
    this.failures.push({ match, error });
    return this;
  }

  affectRows(match: SqlMatcher, rows: number): this {
    this.affected.push({ match, rows: BigInt(rows) });
    return this;
  }

  run(sql: string): bigint | undefined {
    this.executed.push(sql);
    const failure = this.failures.find((f) => matches(f.match, sql));
    if (failure) throw failure.error;
    return this.affected.find((a) => matches(a.match, sql))?.rows;
  }
}

function matches(match: SqlMatcher, sql: string): boolean {
  return typeof match === 'string' ? match === sql : match(sql);
}

class ScriptedConnection implements DatabaseConnection {
  constructor(private readonly script: SqlScript) {}

  async executeQuery<R>(query: CompiledQuery): Promise<QueryResult<R>> {
    const numAffectedRows = this.script.run(query.sql);
    return numAffectedRows === undefined ? { rows: [] } : { rows: [], numAffectedRows };
  }

  // eslint-disable-next-line require-yield
  async *streamQuery<R>(): AsyncIterableIterator<QueryResult<R>> {
    throw new Error('streaming is not supported by the scripted dialect');
  }
}

class ScriptedDriver implements Driver {
  constructor(private readonly script: SqlScript) {}

  async init(): Promise<void> {}

  async acquireConnection(): Promise<DatabaseConnection> {
    this.script.acquired += 1;
    return new ScriptedConnection(this.script);
  }

  async beginTransaction(connection: DatabaseConnection): Promise<void> {
    await connection.executeQuery(CompiledQuery.raw('begin'));
  }

  async commitTransaction(connection: DatabaseConnection): Promise<void> {
    await connection.executeQuery(CompiledQuery.raw('commit'));
  }

  async rollbackTransaction(connection: DatabaseConnection): Promise<void> {
    await connection.executeQuery(CompiledQuery.raw('rollback'));
  }

  async releaseConnection(): Promise<void> {
    this.script.released += 1;
  }

  async destroy(): Promise<void> {
    this.script.destroyed += 1;
  }
}

export class ScriptedDialect implements Dialect {
  constructor(private readonly script: SqlScript) {}

  createAdapter(): DialectAdapter {
    return new PostgresAdapter();
  }

  createDriver(): Driver {
    return new ScriptedDriver(this.script);
  }

  createIntrospector(db: Kysely<DB>): DatabaseIntrospector {
    return new PostgresIntrospector(db);
  }

  createQueryCompiler(): QueryCompiler {
    return new PostgresQueryCompiler();
  }
}
