import { ApiEnvelopeSchema } from '@policy-sync/core';
import { getJson } from '../http/fetch-json';
import type { FetchFn } from '../http/fetch-json';
import type { Logger } from '../utils/logger';
import type { VersionChecker } from './checker';
import { toVersion } from './checker';

export interface ApiVersionCheckerOptions {
  fetchFn?: FetchFn;
  timeoutMs?: number;
}

/**
 * Reads the version from an endpoint returning `{ data: <integer> }`.
 */
export class ApiVersionChecker implements VersionChecker {
  constructor(
    private readonly apiEndpoint: string,
    private readonly logger: Logger,
    private readonly options: ApiVersionCheckerOptions = {},
  ) {}

  async getCurrentVersion(signal?: AbortSignal): Promise<number | null> {
    if (!this.apiEndpoint.trim()) {
      this.logger.debug('Version API endpoint not configured');
      return null;
    }

    try {
      const result = await getJson(this.apiEndpoint, {
        fetchFn: this.options.fetchFn,
        timeoutMs: this.options.timeoutMs,
        signal,
      });

      if (result.kind !== 'json') {
        this.logger.debug(`No usable version from API (${result.kind})`, { apiEndpoint: this.apiEndpoint });
        return null;
      }

      const envelope = ApiEnvelopeSchema.safeParse(result.body);
      const version = envelope.success ? toVersion(envelope.data.data) : null;
      if (version === null) {
        this.logger.debug('Null or invalid data in version API response', { apiEndpoint: this.apiEndpoint });
      }
      return version;
    } catch (error) {
      this.logger.error('Failed to get version from API', { err: error, apiEndpoint: this.apiEndpoint });
      return null;
    }
  }

  async isAvailable(): Promise<boolean> {
    if (!this.apiEndpoint.trim()) {
      this.logger.debug('Version API endpoint not configured or empty');
      return false;
    }

    try {
      const result = await getJson(this.apiEndpoint, {
        fetchFn: this.options.fetchFn,
        timeoutMs: this.options.timeoutMs,
      });
      return result.kind === 'json';
    } catch (error) {
      this.logger.error('API version checker is unavailable', { err: error, apiEndpoint: this.apiEndpoint });
      return false;
    }
  }

  describe(): string {
    return `API-based version checker using HTTP calls to: ${this.apiEndpoint || 'not configured'}`;
  }
}
