import type { SqlClient } from '../datasource/sql-client';
import type { Logger } from '../utils/logger';
import type { VersionChecker } from './checker';
import { toVersion } from './checker';

/**
 * Reads the version with a single-column query, e.g.
 * `SELECT EXTRACT(EPOCH FROM MAX(updated_at))::bigint FROM permission`.
 */
export class DatabaseVersionChecker implements VersionChecker {
  constructor(
    private readonly client: SqlClient,
    private readonly sqlQuery: string,
    private readonly logger: Logger,
  ) {}

  async getCurrentVersion(signal?: AbortSignal): Promise<number | null> {
    try {
      const { rows } = await this.client.query(this.sqlQuery);
      if (signal?.aborted) return null;
      return this.firstColumn(rows[0]);
    } catch (error) {
      this.logger.error('Failed to get version from database', { err: error, sqlQuery: this.sqlQuery });
      return null;
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      const { rows } = await this.client.query(this.sqlQuery);
      return rows.length > 0;
    } catch (error) {
      this.logger.error('Database version checker is unavailable', { err: error, sqlQuery: this.sqlQuery });
      return false;
    }
  }

  describe(): string {
    return `Database-based version checker using: ${this.sqlQuery}`;
  }

  private firstColumn(row: unknown): number | null {
    if (row === null || typeof row !== 'object') return null;
    const [first] = Object.values(row);
    const version = toVersion(first);
    if (version === null && first !== null && first !== undefined) {
      this.logger.warn('Database version value is not a safe integer, skipping', { value: String(first) });
    }
    return version;
  }
}
