import { describe, it, expect } from 'vitest';
import { buildConfig } from '../../../src/app/config';

describe('buildConfig', () => {
  it('applies defaults when nothing is set', () => {
    const config = buildConfig({});

    expect(config).toEqual({
      nodeEnv: 'development',
      connection: {
        url: undefined,
        user: undefined,
        password: undefined,
        host: undefined,
        port: undefined,
        database: undefined,
      },
      pool: {
        max: 1,
        connectionTimeoutMillis: 10_000,
        statementTimeoutMillis: 10_000,
      },
      ensureSchema: true,
      logLevel: 'info',
      serviceName: 'user-console',
    });
  });

  it('maps connection variables and limits', () => {
    const config = buildConfig({
      NODE_ENV: 'production',
      DATABASE_URL: 'postgres://app:pw@db/users',
      PGUSER: 'admin',
      PGPORT: '5433',
      DB_POOL_MAX: '2',
      DB_STATEMENT_TIMEOUT_MS: '2500',
      DB_ENSURE_SCHEMA: 'false',
    });

    expect(config.nodeEnv).toBe('production');
    expect(config.connection.url).toBe('postgres://app:pw@db/users');
    expect(config.connection.user).toBe('admin');
    expect(config.connection.port).toBe('5433');
    expect(config.pool.max).toBe(2);
    expect(config.pool.statementTimeoutMillis).toBe(2500);
    expect(config.ensureSchema).toBe(false);
  });

  it('rejects values it cannot interpret', () => {
    expect(() => buildConfig({ NODE_ENV: 'staging' })).toThrow();
    expect(() => buildConfig({ DB_ENSURE_SCHEMA: 'yes' })).toThrow();
    expect(() => buildConfig({ DB_POOL_MAX: 'many' })).toThrow();
  });
});
