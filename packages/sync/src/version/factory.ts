import { ConfigurationError } from '@policy-sync/core';
import type { EnabledPollingConfig } from '../config/types';
import type { SqlClient } from '../datasource/sql-client';
import type { FetchFn } from '../http/fetch-json';
import type { Logger } from '../utils/logger';
import type { VersionChecker } from './checker';
import { DatabaseVersionChecker } from './database-checker';
import { ApiVersionChecker } from './api-checker';

export interface VersionCheckerDeps {
  logger: Logger;
  sqlClient?: SqlClient;
  fetchFn?: FetchFn;
  httpTimeoutMs?: number;
}

export type VersionCheckerFactory = (polling: EnabledPollingConfig, deps: VersionCheckerDeps) => VersionChecker;

export const createVersionChecker: VersionCheckerFactory = (polling, deps) => {
  const logger = deps.logger.child({ component: 'version-checker', versionSourceType: polling.versionSourceType });

  switch (polling.versionSourceType) {
    case 'database':
      if (!deps.sqlClient) {
        throw new ConfigurationError('A SQL client is required for the database version checker', 'sqlClient');
      }
      return new DatabaseVersionChecker(deps.sqlClient, polling.versionSource, logger);

    case 'api':
      return new ApiVersionChecker(polling.versionSource, logger, {
        fetchFn: deps.fetchFn,
        timeoutMs: deps.httpTimeoutMs,
      });

    default: {
      const unsupported: never = polling.versionSourceType;
      throw new ConfigurationError(`Unsupported version source type: ${String(unsupported)}`, 'polling.versionSourceType');
    }
  }
};
