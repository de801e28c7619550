import { describe, it, expect } from 'vitest';
import { startPermissionChecker } from '../../../src/checker/bootstrap';
import { parsePolicySyncConfig } from '../../../src/config/schema';
import { MemoryPubSubTransport } from '../../../src/events/memory-transport';
import { InMemoryConfigLoader } from '../../helpers';

describe('startPermissionChecker', () => {
  it('should start a checker from parsed configuration', async () => {
    const config = parsePolicySyncConfig({
      source: { sourceType: 'resource', sourceLocation: 'policy.csv', resources: 'users' },
      events: { channel: 'tenant-a:policies' },
      logging: { level: 'silent' },
    });
    const transport = new MemoryPubSubTransport();

    const checker = await startPermissionChecker(config, {
      configLoader: new InMemoryConfigLoader({ 'policy.csv': 'p, 1, users, read\np, 1, orders, read' }),
      transport,
    });

    expect(checker.checkPermission('1', 'users', 'read')).toBe(true);
    expect(checker.checkPermission('1', 'orders', 'read')).toBe(false);
    expect(transport.listenerCount('tenant-a:policies')).toBe(1);

    await checker.shutdown();
  });
});
