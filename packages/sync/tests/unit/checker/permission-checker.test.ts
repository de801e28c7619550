/**
 * Permission Checker Tests
 *
 * Lifecycle, enforcement and reload paths of the orchestrator.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import {
  ConfigurationError,
  DEFAULT_ENGINE_MODEL,
  ResourceFilter,
  SourceUnavailableError,
  UninitializedAccessError,
  createRuleSetEngine,
} from '@policy-sync/core';
import type { EngineFactory } from '@policy-sync/core';
import { PermissionChecker, createPermissionChecker } from '../../../src/checker/permission-checker';
import type { PermissionCheckerDeps, ReloadEvent } from '../../../src/checker/permission-checker';
import { createPolicyLoader } from '../../../src/policy/factory';
import type { PolicyLoaderFactory } from '../../../src/policy/factory';
import type { VersionCheckerFactory } from '../../../src/version/factory';
import { MemoryPubSubTransport } from '../../../src/events/memory-transport';
import type { MessageListener } from '../../../src/events/transport';
import { DEFAULT_CHANNEL, POLLING_DISABLED } from '../../../src/config/types';
import type { EnabledPollingConfig, SourceConfig } from '../../../src/config/types';
import {
  InMemoryConfigLoader,
  createMockFetch,
  createMockVersionChecker,
  createTestLogger,
  jsonResponse,
} from '../../helpers';

const RULES = ['p, 1, users, read', 'p, 2, users, write', 'p, 1, orders, read'].join('\n');

const resourceSource = (codes: string[] = ['users']): SourceConfig => ({
  sourceType: 'resource',
  sourceLocation: 'policy.csv',
  resources: new ResourceFilter(codes),
});

const API_SOURCE: SourceConfig = {
  sourceType: 'api',
  sourceLocation: 'https://policy.example.test/api/permissions',
  resources: ResourceFilter.all(),
};

const API_POLLING: EnabledPollingConfig = {
  enabled: true,
  intervalMs: 60_000,
  versionSourceType: 'api',
  versionSource: 'https://policy.example.test/api/permissions/version',
};

const nextReload = (checker: PermissionChecker, type: ReloadEvent['type']): Promise<ReloadEvent> =>
  new Promise((resolve) => {
    const unsubscribe = checker.onReloadEvent((event) => {
      if (event.type === type) {
        unsubscribe();
        resolve(event);
      }
    });
  });

describe('PermissionChecker', () => {
  let configLoader: InMemoryConfigLoader;
  let loaderFactory: Mock<PolicyLoaderFactory>;

  beforeEach(() => {
    configLoader = new InMemoryConfigLoader({ 'policy.csv': RULES });
    loaderFactory = vi.fn<PolicyLoaderFactory>(createPolicyLoader);
  });

  const createChecker = (overrides: Partial<PermissionCheckerDeps> = {}) =>
    new PermissionChecker({ logger: createTestLogger(), configLoader, loaderFactory, ...overrides });

  // ==========================================================================
  // Enforcement
  // ==========================================================================
  describe('checkPermission', () => {
    it('should enforce the filtered rule set end to end', async () => {
      const checker = createChecker();

      await checker.init(DEFAULT_ENGINE_MODEL, resourceSource(['users']), POLLING_DISABLED);

      expect(checker.getState()).toBe('ready');
      expect(checker.checkPermission('1', 'users', 'read')).toBe(true);
      expect(checker.checkPermission('1', 'users', 'write')).toBe(false);
      expect(checker.checkPermission('2', 'users', 'write')).toBe(true);
      expect(checker.checkPermission('1', 'orders', 'read')).toBe(false);
      expect(checker.getStats().ruleCount).toBe(2);
    });

    it('should throw before initialization', async () => {
      const checker = createChecker();

      expect(() => checker.checkPermission('1', 'users', 'read')).toThrow(UninitializedAccessError);
      await expect(checker.reloadPermission()).rejects.toThrow(
        'Permission checker is not initialized - cannot reload permissions',
      );
    });

    it('should deny when the engine fails', async () => {
      const engineFactory: EngineFactory = (model) => {
        const engine = createRuleSetEngine(model);
        return {
          clearAll: () => engine.clearAll(),
          bulkInsert: (policies, roleLinks) => engine.bulkInsert(policies, roleLinks),
          size: () => engine.size(),
          check: () => {
            throw new Error('engine exploded');
          },
        };
      };
      const checker = createChecker({ engineFactory });
      await checker.init(DEFAULT_ENGINE_MODEL, resourceSource(), POLLING_DISABLED);

      expect(checker.checkPermission('1', 'users', 'read')).toBe(false);
    });

    it('should allow when any role is allowed', async () => {
      const checker = createChecker();
      await checker.init(DEFAULT_ENGINE_MODEL, resourceSource(), POLLING_DISABLED);

      expect(checker.checkAnyRole([3, 1], 'users', 'read')).toBe(true);
      expect(checker.checkAnyRole(['3'], 'users', 'read')).toBe(false);
      expect(checker.checkAnyRole([], 'users', 'read')).toBe(false);
    });
  });

  // ==========================================================================
  // Lifecycle
  // ==========================================================================
  describe('init', () => {
    it('should initialize only once', async () => {
      const checker = createChecker();

      await Promise.all([
        checker.init(DEFAULT_ENGINE_MODEL, resourceSource(), POLLING_DISABLED),
        checker.init(DEFAULT_ENGINE_MODEL, resourceSource(), POLLING_DISABLED),
      ]);
      await checker.init(DEFAULT_ENGINE_MODEL, resourceSource(['orders']), POLLING_DISABLED);

      expect(loaderFactory).toHaveBeenCalledTimes(1);
      expect(checker.checkPermission('1', 'users', 'read')).toBe(true);
    });

    it('should fail and stay failed when the initial load fails', async () => {
      configLoader.files = {};
      const checker = createChecker();

      await expect(checker.init(DEFAULT_ENGINE_MODEL, resourceSource(), POLLING_DISABLED)).rejects.toBeInstanceOf(
        SourceUnavailableError,
      );
      expect(checker.getState()).toBe('failed');

      configLoader.files = { 'policy.csv': RULES };
      await checker.init(DEFAULT_ENGINE_MODEL, resourceSource(), POLLING_DISABLED);

      expect(loaderFactory).toHaveBeenCalledTimes(1);
      expect(() => checker.checkPermission('1', 'users', 'read')).toThrow(UninitializedAccessError);
    });

    it('should reject invalid configuration before building a loader', async () => {
      const checker = createChecker();

      const init = checker.init(DEFAULT_ENGINE_MODEL, resourceSource(), {
        enabled: true,
        intervalMs: 60_000,
        versionSourceType: 'database',
        versionSource: 'SELECT 1',
      });

      await expect(init).rejects.toBeInstanceOf(ConfigurationError);
      expect(loaderFactory).not.toHaveBeenCalled();
      expect(checker.getState()).toBe('failed');
    });

    it('should report reload events for the initial load', async () => {
      const checker = createChecker();
      const events: ReloadEvent[] = [];
      checker.onReloadEvent((event) => events.push(event));

      await checker.init(DEFAULT_ENGINE_MODEL, resourceSource(), POLLING_DISABLED);

      expect(events.map((event) => [event.type, event.trigger])).toEqual([
        ['reload_started', 'initial'],
        ['reload_completed', 'initial'],
      ]);
      expect(events[1]?.policiesLoaded).toBe(2);
    });
  });

  describe('shutdown', () => {
    it('should be idempotent and block further use', async () => {
      const transport = new MemoryPubSubTransport();
      const checker = createChecker({ transport });
      await checker.init(DEFAULT_ENGINE_MODEL, resourceSource(), POLLING_DISABLED);
      expect(transport.listenerCount(DEFAULT_CHANNEL)).toBe(1);

      await checker.shutdown();
      await checker.shutdown();

      expect(checker.getState()).toBe('shutdown');
      expect(transport.listenerCount(DEFAULT_CHANNEL)).toBe(0);
      expect(() => checker.checkPermission('1', 'users', 'read')).toThrow(UninitializedAccessError);

      await checker.init(DEFAULT_ENGINE_MODEL, resourceSource(), POLLING_DISABLED);
      expect(loaderFactory).toHaveBeenCalledTimes(1);
    });

    it('should be safe before init', async () => {
      const checker = createChecker();

      await expect(checker.shutdown()).resolves.toBeUndefined();
      expect(checker.getState()).toBe('shutdown');
    });
  });

  // ==========================================================================
  // Reloading
  // ==========================================================================
  describe('reloadPermission', () => {
    it('should be idempotent for an unchanged source', async () => {
      const checker = createChecker();
      await checker.init(DEFAULT_ENGINE_MODEL, resourceSource(), POLLING_DISABLED);

      await checker.reloadPermission();
      await checker.reloadPermission();

      expect(checker.getStats()).toMatchObject({ ruleCount: 2, reloadCount: 3, failedReloads: 0 });
      expect(checker.checkPermission('1', 'users', 'read')).toBe(true);
      expect(checker.checkPermission('1', 'users', 'write')).toBe(false);
    });

    it('should pick up source changes', async () => {
      const checker = createChecker();
      await checker.init(DEFAULT_ENGINE_MODEL, resourceSource(), POLLING_DISABLED);

      configLoader.files = { 'policy.csv': 'p, 1, users, write' };
      await checker.reloadPermission();

      expect(checker.checkPermission('1', 'users', 'read')).toBe(false);
      expect(checker.checkPermission('1', 'users', 'write')).toBe(true);
    });

    it('should keep serving the previous rules while a reload is loading', async () => {
      const checker = createChecker();
      await checker.init(DEFAULT_ENGINE_MODEL, resourceSource(), POLLING_DISABLED);

      let release: (content: string) => void = () => undefined;
      const readConfig = vi.spyOn(configLoader, 'readConfig').mockImplementationOnce(
        () =>
          new Promise<string>((resolve) => {
            release = resolve;
          }),
      );

      const reloading = checker.reloadPermission();
      await vi.waitFor(() => expect(readConfig).toHaveBeenCalledTimes(1));

      expect(checker.checkPermission('1', 'users', 'read')).toBe(true);
      expect(checker.getStats().ruleCount).toBe(2);

      release('p, 1, users, write');
      await reloading;

      expect(checker.checkPermission('1', 'users', 'read')).toBe(false);
      expect(checker.checkPermission('1', 'users', 'write')).toBe(true);
    });

    it('should keep the previous rules when a reload fails', async () => {
      const checker = createChecker();
      await checker.init(DEFAULT_ENGINE_MODEL, resourceSource(), POLLING_DISABLED);

      configLoader.files = {};
      await expect(checker.reloadPermission()).rejects.toBeInstanceOf(SourceUnavailableError);

      expect(checker.checkPermission('1', 'users', 'read')).toBe(true);
      expect(checker.getStats()).toMatchObject({
        failedReloads: 1,
        lastReloadError: 'Resource policy loading failed: policy.csv: ENOENT: policy.csv',
      });
    });
  });

  // ==========================================================================
  // Event Bus
  // ==========================================================================
  describe('event bus', () => {
    it('should reload on a bus message', async () => {
      const transport = new MemoryPubSubTransport();
      const checker = createChecker({ transport });
      await checker.init(DEFAULT_ENGINE_MODEL, resourceSource(), POLLING_DISABLED);
      configLoader.files = { 'policy.csv': 'p, 3, users, read' };

      const completed = nextReload(checker, 'reload_completed');
      await transport.publish(DEFAULT_CHANNEL, 'RELOAD_POLICIES');
      const event = await completed;

      expect(event.trigger).toBe('event');
      expect(checker.checkPermission('3', 'users', 'read')).toBe(true);
      expect(checker.getStats().busListening).toBe(true);
    });

    it('should drop messages that arrive before the checker is ready', async () => {
      class EagerTransport extends MemoryPubSubTransport {
        override async subscribe(channel: string, listener: MessageListener) {
          const unsubscribe = await super.subscribe(channel, listener);
          listener('RELOAD_POLICIES');
          return unsubscribe;
        }
      }
      const checker = createChecker({ transport: new EagerTransport() });
      const started: ReloadEvent[] = [];
      checker.onReloadEvent((event) => {
        if (event.type === 'reload_started') started.push(event);
      });

      await checker.init(DEFAULT_ENGINE_MODEL, resourceSource(), POLLING_DISABLED);
      await new Promise((resolve) => setTimeout(resolve, 0));

      expect(checker.getState()).toBe('ready');
      expect(started.map((event) => event.trigger)).toEqual(['initial']);
      expect(checker.getStats().reloadCount).toBe(1);
    });

    it('should listen on the configured channel', async () => {
      const transport = new MemoryPubSubTransport();
      const checker = createChecker({ transport, channel: 'tenant-a:policies' });
      await checker.init(DEFAULT_ENGINE_MODEL, resourceSource(), POLLING_DISABLED);

      expect(transport.listenerCount('tenant-a:policies')).toBe(1);
      expect(transport.listenerCount(DEFAULT_CHANNEL)).toBe(0);
    });

    it('should broadcast reloads', async () => {
      const transport = new MemoryPubSubTransport();
      const checker = createChecker({ transport });
      await checker.init(DEFAULT_ENGINE_MODEL, resourceSource(), POLLING_DISABLED);

      const completed = nextReload(checker, 'reload_completed');
      await checker.publishReload('roles changed');

      await expect(completed).resolves.toMatchObject({ trigger: 'event' });
    });

    it('should refuse to broadcast without a transport', async () => {
      const checker = createChecker();
      await checker.init(DEFAULT_ENGINE_MODEL, resourceSource(), POLLING_DISABLED);

      await expect(checker.publishReload()).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should stay ready when the subscription fails', async () => {
      const transport = new MemoryPubSubTransport();
      vi.spyOn(transport, 'subscribe').mockRejectedValue(new Error('redis down'));
      const checker = createChecker({ transport });

      await checker.init(DEFAULT_ENGINE_MODEL, resourceSource(), POLLING_DISABLED);

      expect(checker.getState()).toBe('ready');
      expect(checker.getStats().busListening).toBe(false);
    });
  });

  // ==========================================================================
  // Version Polling
  // ==========================================================================
  describe('version polling', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    const apiRules = () =>
      jsonResponse({ data: [{ id: 1, roleId: 1, resourceCode: 'users', actionCode: 'read' }] });

    it('should reload when the version changes', async () => {
      const fetchFn = createMockFetch(apiRules);
      const versionChecker = createMockVersionChecker([1, 2]);
      const versionCheckerFactory = vi.fn<VersionCheckerFactory>(() => versionChecker);
      const checker = createChecker({ fetchFn, versionCheckerFactory });
      const events: ReloadEvent[] = [];

      await checker.init(DEFAULT_ENGINE_MODEL, API_SOURCE, API_POLLING);
      checker.onReloadEvent((event) => events.push(event));

      expect(checker.getStats()).toMatchObject({ pollingRunning: true, cachedVersion: 1 });
      expect(fetchFn).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(60_000);

      expect(fetchFn).toHaveBeenCalledTimes(2);
      expect(events.map((event) => [event.type, event.trigger])).toEqual([
        ['reload_started', 'version'],
        ['reload_completed', 'version'],
      ]);
      expect(checker.getStats().cachedVersion).toBe(2);

      await checker.shutdown();
      expect(checker.getStats().pollingRunning).toBe(false);
    });

    it('should run without polling when the version source is unavailable', async () => {
      const checker = createChecker({
        fetchFn: createMockFetch(apiRules),
        versionCheckerFactory: () => createMockVersionChecker([1], false),
      });

      await checker.init(DEFAULT_ENGINE_MODEL, API_SOURCE, API_POLLING);

      expect(checker.getState()).toBe('ready');
      expect(checker.getStats()).toMatchObject({ pollingRunning: false, cachedVersion: null });
      expect(checker.checkPermission('1', 'users', 'read')).toBe(true);
    });

    it('should run without polling when the checker cannot be built', async () => {
      const checker = createChecker({
        fetchFn: createMockFetch(apiRules),
        versionCheckerFactory: () => {
          throw new ConfigurationError('A SQL client is required for the database version checker', 'sqlClient');
        },
      });

      await checker.init(DEFAULT_ENGINE_MODEL, API_SOURCE, API_POLLING);

      expect(checker.getState()).toBe('ready');
      expect(checker.getStats().pollingRunning).toBe(false);
    });
  });

  // ==========================================================================
  // Factory
  // ==========================================================================
  describe('createPermissionChecker', () => {
    it('should return an initialized checker', async () => {
      const checker = await createPermissionChecker(
        { logger: createTestLogger(), configLoader },
        { source: resourceSource(['users', 'orders']) },
      );

      expect(checker.isReady()).toBe(true);
      expect(checker.checkPermission('1', 'orders', 'read')).toBe(true);
      expect(checker.getStats()).toMatchObject({
        sourceType: 'resource',
        source: 'resource: memory/policy.csv',
        ruleCount: 3,
      });
    });
  });
});
