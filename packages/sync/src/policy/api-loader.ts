import { ApiEnvelopeSchema, ApiPolicyRuleSchema } from '@policy-sync/core';
import type { PolicyRule, ResourceFilter } from '@policy-sync/core';
import { getJson } from '../http/fetch-json';
import type { FetchFn } from '../http/fetch-json';
import type { Logger } from '../utils/logger';
import { BasePolicyLoader } from './loader';
import type { FetchedPolicies } from './loader';

export interface ApiPolicyLoaderOptions {
  fetchFn?: FetchFn;
  timeoutMs?: number;
}

/**
 * Appends `resourceCode=a,b,c` to the endpoint when the filter is non-empty.
 */
export function buildApiUrl(baseUrl: string, resourceCodes: readonly string[]): string {
  if (resourceCodes.length === 0) return baseUrl;
  const separator = baseUrl.includes('?') ? '&' : '?';
  const value = resourceCodes.map(code => encodeURIComponent(code)).join(',');
  return `${baseUrl}${separator}resourceCode=${value}`;
}

function noData(): FetchedPolicies {
  return { rules: [], roleLinks: [], skipped: 0 };
}

/**
 * Loads policy rules from a remote endpoint returning `{ data: [...] }`.
 */
export class ApiPolicyLoader extends BasePolicyLoader {
  readonly sourceType = 'api' as const;

  constructor(
    private readonly apiEndpoint: string,
    resources: ResourceFilter,
    logger: Logger,
    private readonly options: ApiPolicyLoaderOptions = {},
  ) {
    super(resources, logger);
  }

  describe(): string {
    return `API: ${this.requestUrl()}`;
  }

  requestUrl(): string {
    return buildApiUrl(this.apiEndpoint, this.resources.toArray());
  }

  protected async fetchPolicies(): Promise<FetchedPolicies> {
    const url = this.requestUrl();
    const result = await getJson(url, {
      fetchFn: this.options.fetchFn,
      timeoutMs: this.options.timeoutMs,
    });

    switch (result.kind) {
      case 'http_error':
        this.logger.warn(`Policy API responded ${result.status} ${result.statusText} - treating as no data`, { url });
        return noData();
      case 'empty':
        this.logger.warn('Received empty response from policy API', { url });
        return noData();
      case 'malformed':
        this.logger.warn(`Policy API returned invalid JSON - treating as no data: ${result.error}`, { url });
        return noData();
      case 'json':
        return this.parseEnvelope(result.body);
    }
  }

  private parseEnvelope(body: unknown): FetchedPolicies {
    const envelope = ApiEnvelopeSchema.safeParse(body);
    if (!envelope.success || envelope.data.data === null || envelope.data.data === undefined) {
      this.logger.warn("Policy API response has no 'data' field - treating as no data");
      return noData();
    }

    const data = envelope.data.data;
    if (!Array.isArray(data)) {
      this.logger.warn("Policy API 'data' field is not an array - treating as no data");
      return noData();
    }

    const rules: PolicyRule[] = [];
    let skipped = 0;

    data.forEach((item: unknown, index) => {
      const parsed = ApiPolicyRuleSchema.safeParse(item);
      if (!parsed.success) {
        skipped++;
        this.malformed(`Skipping invalid policy rule at index ${index}: ${parsed.error.issues[0]?.message ?? 'invalid rule'}`, item);
        return;
      }
      rules.push({
        id: parsed.data.id ?? index + 1,
        roleId: parsed.data.roleId,
        resourceCode: parsed.data.resourceCode,
        actionCode: parsed.data.actionCode,
      });
    });

    this.logger.debug(`Fetched ${rules.length} policy rules from API`);
    return { rules, roleLinks: [], skipped };
  }
}
