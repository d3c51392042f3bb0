/**
 * src/shared/db/connection-resolver.ts
 *
 * WHY:
 * - Operators configure the database either with one combined URL (DATABASE_URL)
 *   or with discrete PG* variables, often both at once.
 * - This turns whatever is present into ONE descriptor the pg driver can use.
 *
 * RULES:
 * - Never throws. Malformed fragments are logged as warnings and resolution
 *   degrades to the URL synthesized from host/port/database.
 * - Discrete user/password win over credentials embedded in the URL.
 * - Credentials are stripped from driverUrl; they travel separately.
 * - Never log the password.
 */

import type { Logger } from '../logger/logger';

export type ConnectionInput = {
  url?: string;
  user?: string;
  password?: string;
  host?: string;
  port?: string;
  database?: string;
};

export type ConnectionDescriptor = {
  driverUrl: string;
  username?: string;
  password?: string;
};

type ExtractedCredentials = {
  user?: string;
  password?: string;
};

const DRIVER_SCHEME = 'postgresql://';

// Order matters: the longest alias is checked first.
const SCHEME_ALIASES = ['jdbc:postgresql://', 'postgresql://', 'postgres://'] as const;

const DEFAULT_HOST = 'localhost';
const DEFAULT_PORT = '5432';
const DEFAULT_DATABASE = 'postgres';

function present(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== '';
}

function decodeCredential(raw: string, field: 'user' | 'password', log: Logger): string {
  try {
    return decodeURIComponent(raw);
  } catch (err) {
    log.warn('db.connection.credential_decode_failed', {
      field,
      error: err instanceof Error ? err.message : String(err),
    });
    return raw;
  }
}

/**
 * Removes a `user[:password]@` segment from the authority part of a URL.
 * Only the authority (up to the first `/`, `?` or `#` after `://`) is searched,
 * so an `@` in a query string is left alone.
 */
export function stripCredentials(
  url: string,
  log: Logger,
): { url: string; credentials: ExtractedCredentials } {
  const schemeEnd = url.indexOf('://');
  if (schemeEnd < 0) return { url, credentials: {} };

  const authorityStart = schemeEnd + 3;
  const rest = url.slice(authorityStart);
  const authorityLength = rest.search(/[/?#]/);
  const authority = authorityLength < 0 ? rest : rest.slice(0, authorityLength);

  const at = authority.lastIndexOf('@');
  if (at < 0) return { url, credentials: {} };

  const userInfo = authority.slice(0, at);
  const stripped = url.slice(0, authorityStart) + rest.slice(at + 1);

  const colon = userInfo.indexOf(':');
  const rawUser = colon < 0 ? userInfo : userInfo.slice(0, colon);
  const rawPassword = colon < 0 ? undefined : userInfo.slice(colon + 1);

  return {
    url: stripped,
    credentials: {
      user: rawUser === '' ? undefined : decodeCredential(rawUser, 'user', log),
      password:
        rawPassword === undefined || rawPassword === ''
          ? undefined
          : decodeCredential(rawPassword, 'password', log),
    },
  };
}

/**
 * Maps the known scheme aliases onto `postgresql://`.
 * Returns undefined for anything unrecognized.
 */
export function normalizeScheme(url: string): string | undefined {
  const lower = url.toLowerCase();
  const alias = SCHEME_ALIASES.find((a) => lower.startsWith(a));
  if (!alias) return undefined;
  return DRIVER_SCHEME + url.slice(alias.length);
}

export function synthesizeUrl(input: ConnectionInput): string {
  const host = present(input.host) ? input.host.trim() : DEFAULT_HOST;
  const port = present(input.port) ? input.port.trim() : DEFAULT_PORT;
  const database = present(input.database) ? input.database.trim() : DEFAULT_DATABASE;
  return `${DRIVER_SCHEME}${host}:${port}/${database}?sslmode=require`;
}

export function resolveConnection(
  input: ConnectionInput,
  opts: { logger: Logger },
): ConnectionDescriptor {
  const log = opts.logger;

  log.info('db.connection.resolve', {
    host: input.host ?? null,
    port: input.port ?? null,
    database: input.database ?? null,
    user: input.user ?? null,
    hasUrl: present(input.url),
  });

  let driverUrl: string;
  let extracted: ExtractedCredentials = {};

  if (present(input.url)) {
    const { url, credentials } = stripCredentials(input.url.trim(), log);
    extracted = credentials;

    const normalized = normalizeScheme(url);
    if (normalized) {
      driverUrl = normalized;
      log.info('db.connection.url_normalized', { driverUrl });
    } else {
      driverUrl = synthesizeUrl(input);
      log.warn('db.connection.url_unrecognized', { driverUrl });
    }
  } else {
    driverUrl = synthesizeUrl(input);
    log.info('db.connection.url_from_components', { driverUrl });
  }

  const descriptor: ConnectionDescriptor = { driverUrl };

  if (present(input.user)) {
    descriptor.username = input.user;
    log.info('db.connection.user_source', { source: 'PGUSER', user: input.user });
  } else if (extracted.user !== undefined) {
    descriptor.username = extracted.user;
    log.info('db.connection.user_source', { source: 'DATABASE_URL', user: extracted.user });
  }

  if (present(input.password)) {
    descriptor.password = input.password;
    log.info('db.connection.password_source', { source: 'PGPASSWORD' });
  } else if (extracted.password !== undefined) {
    descriptor.password = extracted.password;
    log.info('db.connection.password_source', { source: 'DATABASE_URL' });
  }

  return descriptor;
}
