export { createPgPool, createPgSqlClient } from './sql-client';
export type { PgPoolConfig, SqlClient, SqlQueryResult } from './sql-client';
