/**
 * Shared test doubles for the sync package.
 */

import { vi } from 'vitest';
import { Logger } from '../src/utils/logger';
import type { ConfigLoader } from '../src/config/mode-config-loader';
import type { SqlClient, SqlQueryResult } from '../src/datasource/sql-client';
import type { FetchFn } from '../src/http/fetch-json';
import type { VersionChecker } from '../src/version/checker';

export const createTestLogger = (): Logger => new Logger('test', 'silent');

/**
 * SqlClient stand-in. Rows carrying a `resource_code` are filtered by the
 * bound values, like the real `IN (...)` predicate would.
 */
export class FakeSqlClient implements SqlClient {
  readonly queries: Array<{ text: string; values?: readonly unknown[] }> = [];
  failure: Error | null = null;

  constructor(public rows: unknown[] = [], private readonly honorFilter = true) {}

  async query(text: string, values?: readonly unknown[]): Promise<SqlQueryResult> {
    this.queries.push({ text, values });
    if (this.failure) throw this.failure;
    if (!this.honorFilter || !values || values.length === 0) {
      return { rows: this.rows };
    }
    return {
      rows: this.rows.filter((row) => {
        const code = typeof row === 'object' && row !== null ? Reflect.get(row, 'resource_code') : undefined;
        return values.includes(code);
      }),
    };
  }
}

export class InMemoryConfigLoader implements ConfigLoader {
  constructor(public files: Record<string, string> = {}) {}

  resolvePath(relativePath: string): string {
    return `memory/${relativePath}`;
  }

  async readConfig(relativePath: string): Promise<string> {
    const content = this.files[relativePath];
    if (content === undefined) {
      throw new Error(`ENOENT: ${relativePath}`);
    }
    return content;
  }
}

export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status });

/** fetch mock answering every call with a fresh copy of the same response */
export const createMockFetch = (respond: () => Response) => vi.fn<FetchFn>(async () => respond());

export const createMockVersionChecker = (versions: Array<number | null>, available = true) => {
  const getCurrentVersion = vi.fn<VersionChecker['getCurrentVersion']>();
  for (const version of versions) {
    getCurrentVersion.mockResolvedValueOnce(version);
  }
  getCurrentVersion.mockResolvedValue(versions[versions.length - 1] ?? null);

  return {
    getCurrentVersion,
    isAvailable: vi.fn<VersionChecker['isAvailable']>().mockResolvedValue(available),
    describe: () => 'mock version checker',
  } satisfies VersionChecker;
};

export const POLICY_FILE = [
  '# role grants',
  'p, 1, users, read',
  'p, 2, users, write',
  'p, 1, orders, read',
  'p, admin, users, delete',
  'g, alice, 1',
  'bogus, line',
  'p, 3, reports',
].join('\n');
