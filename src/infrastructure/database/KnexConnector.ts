/**
 * Knex Connector — One Connection per Call
 * Layer: Infrastructure
 * Pattern: Adapter (implements IDbConnector)
 *
 * Each `open()` builds a knex instance over mysql2 whose pool holds at most
 * one connection, and `close()` destroys it. That gives every stored-procedure
 * call its own physical connection (and its own @-variables) while knex keeps
 * owning the connect/handshake/teardown details.
 *
 * knex compiles each statement (`??` becomes a quoted identifier) but does not
 * run it: knex's query runner rewrites a failed query's message to include the
 * SQL with every bound value inlined. The session takes the pooled mysql2
 * connection itself and calls `query()` on it, so a driver error reaches the
 * caller as the same object mysql2 produced. The connection is held for the
 * whole session and handed back in `close()` before the pool is destroyed.
 *
 * Knex connects lazily, so a bad host or password surfaces from the first
 * `execute()`.
 *
 * Statements are sent with `rowsAsArray` so duplicate column names survive and
 * column order is the driver's, not object-key order.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { CallResult } from '@domain/entities/ResultSet';
import type { IDbConnector, IDbSession, SqlStatement } from '@domain/interfaces/IDbConnector';
import { DriverResponseError } from '@shared/errors/DataAccessError';
import knex, { type Knex } from 'knex';
import { inject, injectable } from 'tsyringe';

import { parseConnectionString, type MySqlConnectionSettings, type SslMode } from './connectionString';
import { normalizeMysqlResponse } from './mysqlResponse';

/** The part of a mysql2 callback connection the session calls. */
interface DriverConnection {
  query(
    options: { sql: string; rowsAsArray: boolean },
    values: readonly unknown[],
    callback: (err: Error | null, rows?: unknown, fields?: unknown) => void,
  ): unknown;
}

/** knex's client-level pool access (typed `any` on the Knex instance). */
interface ConnectionPool {
  acquireConnection(): Promise<unknown>;
  releaseConnection(connection: unknown): Promise<unknown>;
}

interface TlsSettings {
  rejectUnauthorized: boolean;
  verifyIdentity: boolean;
}

function isDriverConnection(value: unknown): value is DriverConnection {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, 'query') === 'function';
}

function toTlsSettings(mode: SslMode): TlsSettings | undefined {
  switch (mode) {
    case 'disabled':
      return undefined;
    case 'required':
      return { rejectUnauthorized: false, verifyIdentity: false };
    case 'verify-ca':
      return { rejectUnauthorized: true, verifyIdentity: false };
    case 'verify-full':
      return { rejectUnauthorized: true, verifyIdentity: true };
  }
}

/** Routes knex's own warnings (pool errors, deprecations) into the injected logger. */
function toKnexLogger(log: Logger): Knex.Logger {
  return {
    warn: (message) => log.warn({ source: 'knex' }, message),
    error: (message) => log.error({ source: 'knex' }, message),
    deprecate: (message) => log.warn({ source: 'knex', deprecated: true }, message),
    debug: (message) => log.debug({ source: 'knex' }, message),
  };
}

export function toKnexConfig(settings: MySqlConnectionSettings, log: Logger): Knex.Config {
  const ssl = toTlsSettings(settings.ssl);
  return {
    client: 'mysql2',
    connection: {
      host: settings.host,
      port: settings.port,
      user: settings.user,
      password: settings.password,
      database: settings.database,
      charset: settings.charset,
      connectTimeout: settings.connectTimeout,
      ssl,
      supportBigNumbers: true,
    },
    pool: { min: 0, max: 1 },
    log: toKnexLogger(log),
  };
}

export class KnexSession implements IDbSession {
  private connection: DriverConnection | null = null;
  private closed = false;

  constructor(
    private readonly db: Knex,
    private readonly log: Logger,
  ) {}

  async execute(statement: SqlStatement): Promise<CallResult> {
    const { sql, bindings } = this.db.raw(statement.sql, statement.bindings).toSQL().toNative();
    const connection = await this.acquire();

    const response = await new Promise<[unknown, unknown]>((resolve, reject) => {
      connection.query({ sql, rowsAsArray: true }, bindings, (err, rows, fields) => {
        if (err) reject(err);
        else resolve([rows, fields]);
      });
    });
    return normalizeMysqlResponse(response);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const connection = this.connection;
    this.connection = null;
    try {
      if (connection) await this.pool.releaseConnection(connection);
    } finally {
      await this.db.destroy();
    }
    this.log.debug('Database session closed');
  }

  private get pool(): ConnectionPool {
    return this.db.client;
  }

  private async acquire(): Promise<DriverConnection> {
    if (this.connection) return this.connection;
    const acquired = await this.pool.acquireConnection();
    if (!isDriverConnection(acquired)) {
      throw new DriverResponseError('pooled connection has no query()');
    }
    this.connection = acquired;
    return acquired;
  }
}

@injectable()
export class KnexConnector implements IDbConnector {
  constructor(@inject(TOKENS.Logger) private readonly log: Logger) {}

  async open(connectionString: string): Promise<IDbSession> {
    const settings = parseConnectionString(connectionString);
    const db = knex(toKnexConfig(settings, this.log));
    this.log.debug({ host: settings.host, database: settings.database }, 'Database session opened');
    return new KnexSession(db, this.log);
  }
}
