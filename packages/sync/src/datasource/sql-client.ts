/**
 * Relational data source used by the database loader and version checker.
 */

import pg from 'pg';

// =============================================================================
// Constants
// =============================================================================

/** Default PostgreSQL pool configuration values */
const POSTGRES_DEFAULTS = {
  POOL_SIZE: 10,
  CONNECTION_TIMEOUT_MS: 5000,
  IDLE_TIMEOUT_MS: 30000,
  STATEMENT_TIMEOUT_MS: 30000,
} as const;

export interface SqlQueryResult {
  rows: unknown[];
}

/**
 * Minimal parameterized-query handle. A pg `Pool` adapted through
 * `createPgSqlClient` satisfies it; tests supply fakes.
 */
export interface SqlClient {
  query(text: string, values?: readonly unknown[]): Promise<SqlQueryResult>;
}

export interface PgPoolConfig {
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  poolSize?: number;
  connectionTimeoutMs?: number;
  idleTimeoutMs?: number;
  statementTimeoutMs?: number;
  ssl?: boolean;
}

export function createPgPool(config: PgPoolConfig): pg.Pool {
  return new pg.Pool({
    connectionString: config.connectionString,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: config.poolSize ?? POSTGRES_DEFAULTS.POOL_SIZE,
    connectionTimeoutMillis: config.connectionTimeoutMs ?? POSTGRES_DEFAULTS.CONNECTION_TIMEOUT_MS,
    idleTimeoutMillis: config.idleTimeoutMs ?? POSTGRES_DEFAULTS.IDLE_TIMEOUT_MS,
    statement_timeout: config.statementTimeoutMs ?? POSTGRES_DEFAULTS.STATEMENT_TIMEOUT_MS,
    ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
  });
}

/**
 * Adapts a pg pool. The pool stays owned by the caller; nothing here ends it.
 */
export function createPgSqlClient(pool: pg.Pool): SqlClient {
  return {
    async query(text: string, values?: readonly unknown[]): Promise<SqlQueryResult> {
      const result = await pool.query(text, values ? [...values] : undefined);
      return { rows: result.rows };
    },
  };
}
