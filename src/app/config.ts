/**
 * src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load .env via dotenv.
 * - Connection fields are all optional here; the connection resolver decides
 *   precedence between DATABASE_URL and the discrete PG* variables.
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string.
 * - Boolean flags accept only 'true' / 'false'. z.coerce.boolean() would read 'false' as true.
 */

import 'dotenv/config';
import { z } from 'zod';

import type { ConnectionInput } from '../shared/db/connection-resolver';
import type { DbPoolOptions } from '../shared/db/db';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const BooleanFlagSchema = z
  .enum(['true', 'false'])
  .default('true')
  .transform((v) => v === 'true');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,

  // Connection (see shared/db/connection-resolver.ts for precedence)
  DATABASE_URL: z.string().optional(),
  PGUSER: z.string().optional(),
  PGPASSWORD: z.string().optional(),
  PGHOST: z.string().optional(),
  PGPORT: z.string().optional(),
  PGDATABASE: z.string().optional(),

  // Pool / per-call limits
  DB_POOL_MAX: z.coerce.number().int().min(1).max(20).default(1),
  DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().min(100).default(10_000),
  DB_STATEMENT_TIMEOUT_MS: z.coerce.number().int().min(0).default(10_000),
  DB_ENSURE_SCHEMA: BooleanFlagSchema,

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('user-console'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;

  connection: ConnectionInput;
  pool: DbPoolOptions;
  ensureSchema: boolean;

  logLevel: string;
  serviceName: string;
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,

    connection: {
      url: parsed.DATABASE_URL,
      user: parsed.PGUSER,
      password: parsed.PGPASSWORD,
      host: parsed.PGHOST,
      port: parsed.PGPORT,
      database: parsed.PGDATABASE,
    },
    pool: {
      max: parsed.DB_POOL_MAX,
      connectionTimeoutMillis: parsed.DB_CONNECT_TIMEOUT_MS,
      statementTimeoutMillis: parsed.DB_STATEMENT_TIMEOUT_MS,
    },
    ensureSchema: parsed.DB_ENSURE_SCHEMA,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,
  };
}
