/**
 * Permission Checker
 *
 * Owns the enforcement engine, the policy loader, optional version polling
 * and the event-bus subscription. Every reload trigger (initial load, manual
 * call, version drift, bus event) goes through one reload queue; each reload
 * fills a fresh engine and swaps it in, so checks never see a partial set.
 */

import {
  DEFAULT_DOMAIN,
  DEFAULT_ENGINE_MODEL,
  ConfigurationError,
  UninitializedAccessError,
  createRuleSetEngine,
  errorMessage,
} from '@policy-sync/core';
import type { EngineFactory, EngineModel, EnforcementEngine } from '@policy-sync/core';
import { DEFAULT_CHANNEL, POLLING_DISABLED } from '../config/types';
import type { EnabledPollingConfig, PollingConfig, SourceConfig } from '../config/types';
import { validateSyncConfig } from '../config/schema';
import { ModeConfigLoader } from '../config/mode-config-loader';
import type { ConfigLoader } from '../config/mode-config-loader';
import type { SqlClient } from '../datasource/sql-client';
import type { FetchFn } from '../http/fetch-json';
import { createPolicyLoader } from '../policy/factory';
import type { PolicyLoaderFactory } from '../policy/factory';
import type { LoadResult, PolicyLoader } from '../policy/loader';
import { createVersionChecker } from '../version/factory';
import type { VersionCheckerFactory } from '../version/factory';
import { VersionPollingService } from '../version/polling-service';
import { PolicyEventBus } from '../events/policy-event-bus';
import type { PubSubTransport } from '../events/transport';
import type { Logger } from '../utils/logger';
import { ReloadQueue } from './reload-queue';

// ==========================================================================
// Types
// ==========================================================================

export type CheckerState = 'uninitialized' | 'initializing' | 'ready' | 'failed' | 'shutdown';

export type ReloadTrigger = 'initial' | 'manual' | 'version' | 'event';

export interface ReloadEvent {
  type: 'reload_started' | 'reload_completed' | 'reload_failed';
  timestamp: Date;
  /** First trigger of the merged requests */
  trigger: ReloadTrigger;
  /** Requests merged into this reload */
  mergedRequests: number;
  policiesLoaded?: number;
  duration?: number;
  error?: string;
}

export type ReloadEventHandler = (event: ReloadEvent) => void;

export interface PermissionCheckerDeps {
  logger: Logger;
  sqlClient?: SqlClient;
  /** Used by the resource source; defaults to a `ModeConfigLoader` */
  configLoader?: ConfigLoader;
  /** Enables the event bus when present */
  transport?: PubSubTransport;
  fetchFn?: FetchFn;
  httpTimeoutMs?: number;
  engineFactory?: EngineFactory;
  loaderFactory?: PolicyLoaderFactory;
  versionCheckerFactory?: VersionCheckerFactory;
  channel?: string;
}

export interface PermissionCheckerStats {
  state: CheckerState;
  sourceType: SourceConfig['sourceType'] | null;
  source: string | null;
  ruleCount: number;
  reloadCount: number;
  failedReloads: number;
  lastReload: Date | null;
  lastReloadError: string | null;
  cachedVersion: number | null;
  pollingRunning: boolean;
  busListening: boolean;
}

// ==========================================================================
// Permission Checker
// ==========================================================================

export class PermissionChecker {
  private readonly logger: Logger;
  private readonly engineFactory: EngineFactory;
  private readonly loaderFactory: PolicyLoaderFactory;
  private readonly versionCheckerFactory: VersionCheckerFactory;
  private readonly channel: string;

  private state: CheckerState = 'uninitialized';
  private engineModel: EngineModel = DEFAULT_ENGINE_MODEL;
  private engine: EnforcementEngine | null = null;
  private loader: PolicyLoader | null = null;
  private polling: VersionPollingService | null = null;
  private eventBus: PolicyEventBus | null = null;
  private readonly reloadQueue: ReloadQueue<ReloadTrigger, LoadResult>;
  private lifecycle: Promise<void> = Promise.resolve();
  private eventHandlers: Set<ReloadEventHandler> = new Set();

  private reloadCount = 0;
  private failedReloads = 0;
  private lastReload: Date | null = null;
  private lastReloadError: string | null = null;

  constructor(private readonly deps: PermissionCheckerDeps) {
    this.logger = deps.logger.child({ component: 'permission-checker' });
    this.engineFactory = deps.engineFactory ?? createRuleSetEngine;
    this.loaderFactory = deps.loaderFactory ?? createPolicyLoader;
    this.versionCheckerFactory = deps.versionCheckerFactory ?? createVersionChecker;
    this.channel = deps.channel ?? DEFAULT_CHANNEL;
    this.reloadQueue = new ReloadQueue((triggers) => this.performReload(triggers));
  }

  /**
   * Build the engine and loader, load all policies, then start polling and
   * the event bus. Runs at most once per instance.
   *
   * Polling and bus failures leave the checker ready without them. Any other
   * failure rolls back, leaves the state `failed` and rejects.
   */
  init(engineModel: EngineModel, source: SourceConfig, polling: PollingConfig = POLLING_DISABLED): Promise<void> {
    return this.withLifecycleLock(() => this.doInit(engineModel, source, polling));
  }

  /**
   * Enforce `(subject, domain, resource, action)` against the current rules.
   * Engine errors deny.
   */
  checkPermission(subject: string, resource: string, action: string, domain: string = DEFAULT_DOMAIN): boolean {
    const engine = this.engine;
    if (this.state !== 'ready' || !engine) {
      throw new UninitializedAccessError('check permissions');
    }

    try {
      return engine.check(subject, domain, resource, action);
    } catch (error) {
      this.logger.error('Permission check failed, denying access', {
        err: error,
        subject,
        domain,
        resource,
        action,
      });
      return false;
    }
  }

  /** True when any of the roles is allowed */
  checkAnyRole(
    roles: Iterable<string | number>,
    resource: string,
    action: string,
    domain: string = DEFAULT_DOMAIN,
  ): boolean {
    for (const role of roles) {
      if (this.checkPermission(String(role), resource, action, domain)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Reload every policy from the source. Rejects when the reload fails; the
   * previous rule set stays in effect.
   */
  async reloadPermission(): Promise<void> {
    if (this.state !== 'ready') {
      throw new UninitializedAccessError('reload permissions');
    }
    await this.reloadQueue.request('manual');
  }

  /** Ask every instance listening on the channel (this one included) to reload */
  async publishReload(reason?: string): Promise<void> {
    if (!this.eventBus) {
      throw new ConfigurationError('Event bus is not active - no pub/sub transport configured', 'transport');
    }
    await this.eventBus.publishReload(reason);
  }

  /**
   * Stop the event bus, then polling, then wait for queued reloads.
   * Safe to call more than once.
   */
  shutdown(): Promise<void> {
    return this.withLifecycleLock(async () => {
      if (this.state === 'shutdown') {
        this.logger.debug('Permission checker already shut down');
        return;
      }

      this.logger.info('Shutting down permission checker');
      this.state = 'shutdown';
      await this.releaseResources();
      this.engine = null;
      this.loader = null;
      this.logger.info('Permission checker shut down');
    });
  }

  getState(): CheckerState {
    return this.state;
  }

  isReady(): boolean {
    return this.state === 'ready';
  }

  getStats(): PermissionCheckerStats {
    return {
      state: this.state,
      sourceType: this.loader?.sourceType ?? null,
      source: this.loader?.describe() ?? null,
      ruleCount: this.engine?.size() ?? 0,
      reloadCount: this.reloadCount,
      failedReloads: this.failedReloads,
      lastReload: this.lastReload,
      lastReloadError: this.lastReloadError,
      cachedVersion: this.polling?.getCachedVersion() ?? null,
      pollingRunning: this.polling?.isRunning() ?? false,
      busListening: this.eventBus?.isListening() ?? false,
    };
  }

  onReloadEvent(handler: ReloadEventHandler): () => void {
    this.eventHandlers.add(handler);
    return () => this.eventHandlers.delete(handler);
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async doInit(engineModel: EngineModel, source: SourceConfig, polling: PollingConfig): Promise<void> {
    if (this.state !== 'uninitialized') {
      this.logger.warn(`Permission checker is ${this.state}, ignoring init`);
      return;
    }

    this.state = 'initializing';
    this.logger.info('Initializing permission checker', { sourceType: source.sourceType, polling: polling.enabled });

    try {
      validateSyncConfig(source, polling);
      this.engineModel = engineModel;
      this.loader = this.loaderFactory(source, {
        logger: this.deps.logger,
        sqlClient: this.deps.sqlClient,
        configLoader: this.deps.configLoader ?? new ModeConfigLoader(),
        fetchFn: this.deps.fetchFn,
        httpTimeoutMs: this.deps.httpTimeoutMs,
      });

      await this.reloadQueue.request('initial');
    } catch (error) {
      this.state = 'failed';
      await this.releaseResources();
      this.engine = null;
      this.loader = null;
      this.logger.error('Permission checker initialization failed', error);
      throw error;
    }

    if (polling.enabled) {
      await this.startPolling(polling);
    } else {
      this.logger.info('Version polling disabled');
    }
    await this.startEventBus();

    this.state = 'ready';
    this.logger.info('Permission checker ready', {
      rules: this.engine?.size() ?? 0,
      polling: this.polling?.isRunning() ?? false,
      eventBus: this.eventBus?.isListening() ?? false,
    });
  }

  private async performReload(triggers: ReloadTrigger[]): Promise<LoadResult> {
    const loader = this.loader;
    const trigger = triggers[0] ?? 'manual';
    if (!loader) {
      throw new UninitializedAccessError('reload permissions');
    }

    const startTime = Date.now();
    this.emitEvent({ type: 'reload_started', timestamp: new Date(), trigger, mergedRequests: triggers.length });

    try {
      const engine = this.engineFactory(this.engineModel);
      const result = await loader.load(engine);
      this.engine = engine;

      const duration = Date.now() - startTime;
      this.reloadCount++;
      this.lastReload = new Date();
      this.lastReloadError = null;
      this.logger.info(`Policies reloaded (${trigger}) in ${duration}ms`, {
        rules: result.rules.length,
        skipped: result.skipped,
        mergedRequests: triggers.length,
      });
      this.emitEvent({
        type: 'reload_completed',
        timestamp: new Date(),
        trigger,
        mergedRequests: triggers.length,
        policiesLoaded: result.rules.length,
        duration,
      });
      return result;
    } catch (error) {
      const duration = Date.now() - startTime;
      this.failedReloads++;
      this.lastReloadError = errorMessage(error);
      this.logger.error(`Policy reload (${trigger}) failed, keeping previous policies`, error);
      this.emitEvent({
        type: 'reload_failed',
        timestamp: new Date(),
        trigger,
        mergedRequests: triggers.length,
        duration,
        error: this.lastReloadError,
      });
      throw error;
    }
  }

  // Version drift and bus events; failures were already logged by performReload
  private async backgroundReload(trigger: ReloadTrigger): Promise<void> {
    if (this.state !== 'ready') {
      this.logger.warn(`Dropping ${trigger} reload request while ${this.state}`);
      return;
    }
    try {
      await this.reloadQueue.request(trigger);
    } catch (error) {
      this.logger.debug(`Background ${trigger} reload did not complete`, { error: errorMessage(error) });
    }
  }

  private async startPolling(polling: EnabledPollingConfig): Promise<void> {
    try {
      const checker = this.versionCheckerFactory(polling, {
        logger: this.deps.logger,
        sqlClient: this.deps.sqlClient,
        fetchFn: this.deps.fetchFn,
        httpTimeoutMs: this.deps.httpTimeoutMs,
      });
      const service = new VersionPollingService(
        checker,
        { intervalMs: polling.intervalMs, logger: this.deps.logger.child({ component: 'version-polling' }) },
        () => this.backgroundReload('version'),
      );
      await service.start();

      if (service.isRunning()) {
        this.polling = service;
      } else {
        this.logger.warn('Version polling did not start, continuing without drift detection');
      }
    } catch (error) {
      this.logger.error('Failed to start version polling, continuing without it', error);
    }
  }

  private async startEventBus(): Promise<void> {
    const transport = this.deps.transport;
    if (!transport) {
      this.logger.info('No pub/sub transport configured, event bus disabled');
      return;
    }

    const bus = new PolicyEventBus(transport, this.channel, this.deps.logger.child({ component: 'policy-event-bus' }));
    try {
      await bus.start(() => {
        void this.backgroundReload('event');
      });
      this.eventBus = bus;
    } catch (error) {
      this.logger.error(`Failed to subscribe to ${this.channel}, continuing without event bus`, error);
    }
  }

  private async releaseResources(): Promise<void> {
    const bus = this.eventBus;
    this.eventBus = null;
    if (bus) {
      try {
        await bus.stop();
      } catch (error) {
        this.logger.error('Failed to stop event bus', error);
      }
    }

    const polling = this.polling;
    this.polling = null;
    if (polling) {
      try {
        await polling.stop();
      } catch (error) {
        this.logger.error('Failed to stop version polling', error);
      }
    }

    await this.reloadQueue.idle();
  }

  private withLifecycleLock<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.lifecycle.then(operation);
    this.lifecycle = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private emitEvent(event: ReloadEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.warn('Reload event handler threw', { error: errorMessage(error) });
      }
    }
  }
}

// ==========================================================================
// Factory
// ==========================================================================

export interface PermissionCheckerOptions {
  engine?: EngineModel;
  source: SourceConfig;
  polling?: PollingConfig;
}

/**
 * Create a permission checker and initialize it. Rejects when initialization
 * fails.
 */
export async function createPermissionChecker(
  deps: PermissionCheckerDeps,
  options: PermissionCheckerOptions,
): Promise<PermissionChecker> {
  const checker = new PermissionChecker(deps);
  await checker.init(options.engine ?? DEFAULT_ENGINE_MODEL, options.source, options.polling ?? POLLING_DISABLED);
  return checker;
}
