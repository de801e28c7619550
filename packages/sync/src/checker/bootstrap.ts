import type { PolicySyncConfig } from '../config/types';
import { Logger } from '../utils/logger';
import { createPermissionChecker } from './permission-checker';
import type { PermissionChecker, PermissionCheckerDeps } from './permission-checker';

export type BootstrapDeps = Omit<PermissionCheckerDeps, 'logger' | 'channel'> & { logger?: Logger };

/**
 * Start a permission checker from a loaded configuration (see `ConfigManager`).
 *
 * @example
 * ```typescript
 * const config = new ConfigManager({ configPath: './policy-sync.yaml' }).load();
 * const checker = await startPermissionChecker(config, {
 *   sqlClient: createPgSqlClient(createPgPool({ connectionString: process.env.DATABASE_URL })),
 *   transport: new RedisPubSubTransport(createRedisClient(process.env.REDIS_URL ?? 'redis://localhost:6379'), logger),
 * });
 * checker.checkPermission('1', 'users', 'read');
 * ```
 */
export function startPermissionChecker(config: PolicySyncConfig, deps: BootstrapDeps = {}): Promise<PermissionChecker> {
  const logger = deps.logger ?? new Logger(config.logging.name, config.logging.level);
  return createPermissionChecker(
    { ...deps, logger, channel: config.events.channel },
    { engine: config.engine, source: config.source, polling: config.polling },
  );
}
