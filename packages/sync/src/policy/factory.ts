import { ConfigurationError } from '@policy-sync/core';
import type { SourceConfig } from '../config/types';
import type { ConfigLoader } from '../config/mode-config-loader';
import type { SqlClient } from '../datasource/sql-client';
import type { FetchFn } from '../http/fetch-json';
import type { Logger } from '../utils/logger';
import type { PolicyLoader } from './loader';
import { DatabasePolicyLoader } from './database-loader';
import { ResourcePolicyLoader } from './resource-loader';
import { ApiPolicyLoader } from './api-loader';

export interface PolicyLoaderDeps {
  logger: Logger;
  sqlClient?: SqlClient;
  configLoader?: ConfigLoader;
  fetchFn?: FetchFn;
  httpTimeoutMs?: number;
}

export type PolicyLoaderFactory = (source: SourceConfig, deps: PolicyLoaderDeps) => PolicyLoader;

export const createPolicyLoader: PolicyLoaderFactory = (source, deps) => {
  const logger = deps.logger.child({ component: 'policy-loader', sourceType: source.sourceType });

  switch (source.sourceType) {
    case 'database':
      if (!deps.sqlClient) {
        throw new ConfigurationError('A SQL client is required for the database policy loader', 'sqlClient');
      }
      return new DatabasePolicyLoader(deps.sqlClient, source.sourceLocation, source.resources, logger);

    case 'resource':
      if (!deps.configLoader) {
        throw new ConfigurationError('A config loader is required for the resource policy loader', 'configLoader');
      }
      return new ResourcePolicyLoader(deps.configLoader, source.sourceLocation, source.resources, logger);

    case 'api':
      return new ApiPolicyLoader(source.sourceLocation, source.resources, logger, {
        fetchFn: deps.fetchFn,
        timeoutMs: deps.httpTimeoutMs,
      });

    default: {
      const unsupported: never = source;
      throw new ConfigurationError(`Unsupported policy source: ${JSON.stringify(unsupported)}`, 'source.sourceType');
    }
  }
};
