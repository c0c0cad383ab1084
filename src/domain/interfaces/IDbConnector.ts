/**
 * Database Connector Interface — The Client-Library Boundary
 * Layer: Domain
 * Pattern: Port (implemented by KnexConnector in Infrastructure)
 *
 * A connector opens one session per stored-procedure call. A session is one
 * physical connection: every statement executed through it sees the same
 * MySQL session variables, which is what output parameters rely on.
 *
 * The adapter never touches knex or mysql2 directly; tests swap in an
 * in-process fake that records statements and replays scripted results.
 */
import type { CallResult } from '@domain/entities/ResultSet';

/** Values the driver accepts as bindings. */
export type DriverValue = null | number | string | boolean | Date | Buffer;

export interface SqlStatement {
  sql: string;
  bindings: DriverValue[];
}

export interface IDbSession {
  /** Runs one statement and returns every result set it produced. */
  execute(statement: SqlStatement): Promise<CallResult>;

  /** Releases the connection. Safe to call once per session. */
  close(): Promise<void>;
}

export interface IDbConnector {
  open(connectionString: string): Promise<IDbSession>;
}
