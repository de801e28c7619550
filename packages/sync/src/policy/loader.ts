/**
 * Policy Loader
 *
 * Strategy interface over policy sources plus the shared
 * filter → convert → bulk replace pipeline.
 */

import { MalformedDataError, toEnginePolicy } from '@policy-sync/core';
import type { EnforcementEngine, PolicyRule, ResourceFilter, RoleLink } from '@policy-sync/core';
import type { SourceType } from '../config/types';
import type { Logger } from '../utils/logger';

export interface FetchedPolicies {
  rules: PolicyRule[];
  roleLinks: RoleLink[];
  /** Records dropped because they were unusable */
  skipped: number;
}

export interface LoadResult extends FetchedPolicies {
  /** False when the engine reported duplicates it did not insert */
  complete: boolean;
}

export interface PolicyLoader {
  readonly sourceType: SourceType;
  /**
   * Replace the engine's entire rule set with the source's current rules.
   * Rejects with `SourceUnavailableError` when the source cannot be read;
   * the engine is left untouched in that case.
   */
  load(engine: EnforcementEngine): Promise<LoadResult>;
  describe(): string;
}

export abstract class BasePolicyLoader implements PolicyLoader {
  abstract readonly sourceType: SourceType;

  protected constructor(
    protected readonly resources: ResourceFilter,
    protected readonly logger: Logger,
  ) {}

  abstract describe(): string;

  /** Read rules from the source, pushing the filter down where the source allows it */
  protected abstract fetchPolicies(): Promise<FetchedPolicies>;

  async load(engine: EnforcementEngine): Promise<LoadResult> {
    this.logger.info(`Loading policy rules from ${this.describe()}`, {
      resources: this.resources.toString(),
    });

    const fetched = await this.fetchPolicies();
    const rules = this.resources.apply(fetched.rules);
    const complete = this.replaceEngineRules(engine, rules, fetched.roleLinks);

    this.logger.info(`Policy loading completed - ${rules.length} policies loaded from ${this.sourceType}`, {
      roleLinks: fetched.roleLinks.length,
      skipped: fetched.skipped,
    });

    return { rules, roleLinks: fetched.roleLinks, skipped: fetched.skipped, complete };
  }

  protected reportMalformed(error: MalformedDataError): void {
    this.logger.warn(error.message, { record: error.record });
  }

  protected malformed(message: string, record: unknown): void {
    this.reportMalformed(new MalformedDataError(message, record));
  }

  // Clear and insert run back to back with no await in between
  private replaceEngineRules(
    engine: EnforcementEngine,
    rules: readonly PolicyRule[],
    roleLinks: readonly RoleLink[],
  ): boolean {
    const policies = rules.map(toEnginePolicy);

    engine.clearAll();
    if (policies.length === 0 && roleLinks.length === 0) {
      this.logger.info('No policies to load');
      return true;
    }

    const complete = engine.bulkInsert(policies, roleLinks);
    if (!complete) {
      this.logger.warn('Some policies already existed and were not inserted again');
    }
    return complete;
  }
}
