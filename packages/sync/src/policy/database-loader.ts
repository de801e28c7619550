import { PolicyRuleRowSchema, SourceUnavailableError, errorMessage } from '@policy-sync/core';
import type { PolicyRule, ResourceFilter } from '@policy-sync/core';
import type { SqlClient } from '../datasource/sql-client';
import type { Logger } from '../utils/logger';
import { BasePolicyLoader } from './loader';
import type { FetchedPolicies } from './loader';

/**
 * Appends a parameterized `resource_code IN (...)` predicate to a policy
 * query, joined with AND when the query already filters.
 *
 * The query must end with its FROM or WHERE clause: the predicate goes at
 * the very end, so a trailing ORDER BY, GROUP BY or LIMIT yields invalid SQL.
 * An existing top-level OR in the WHERE clause binds looser than the added
 * AND; wrap it in parentheses. Rules are filtered again after loading, so
 * such a query can return extra rows but none reach the engine.
 */
export function addResourceFilterToQuery(query: string, resourceCount: number): string {
  const base = query.trim().replace(/;+\s*$/, '');
  if (resourceCount === 0) return base;

  const placeholders = Array.from({ length: resourceCount }, (_, i) => `$${i + 1}`).join(', ');
  const predicate = `resource_code IN (${placeholders})`;

  return base.toUpperCase().includes('WHERE')
    ? `${base} AND ${predicate}`
    : `${base} WHERE ${predicate}`;
}

/**
 * Loads policy rules with a caller-supplied SQL query.
 */
export class DatabasePolicyLoader extends BasePolicyLoader {
  readonly sourceType = 'database' as const;

  constructor(
    private readonly client: SqlClient,
    private readonly sqlQuery: string,
    resources: ResourceFilter,
    logger: Logger,
  ) {
    super(resources, logger);
  }

  describe(): string {
    return `database query: ${this.sqlQuery}`;
  }

  buildQuery(): { text: string; values: string[] } {
    const values = this.resources.toArray();
    return { text: addResourceFilterToQuery(this.sqlQuery, values.length), values };
  }

  protected async fetchPolicies(): Promise<FetchedPolicies> {
    const { text, values } = this.buildQuery();

    let rows: unknown[];
    try {
      const result = await this.client.query(text, values);
      rows = result.rows;
    } catch (error) {
      this.logger.error('Failed to load policy rules from database', {
        err: error,
        finalQuery: text,
        filteredResources: values,
      });
      throw new SourceUnavailableError(
        `Database policy loading failed: ${errorMessage(error)}`,
        'database',
        error,
      );
    }

    const rules: PolicyRule[] = [];
    let skipped = 0;

    for (const row of rows) {
      const parsed = PolicyRuleRowSchema.safeParse(row);
      if (!parsed.success) {
        skipped++;
        this.malformed(`Skipping invalid policy row: ${parsed.error.issues[0]?.message ?? 'invalid row'}`, row);
        continue;
      }
      rules.push({
        id: parsed.data.id,
        roleId: parsed.data.role_id,
        resourceCode: parsed.data.resource_code,
        actionCode: parsed.data.action_code,
      });
    }

    this.logger.debug(`Fetched ${rules.length} policy rules from database`);
    return { rules, roleLinks: [], skipped };
  }
}
