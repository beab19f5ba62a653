import { describe, it, expect } from 'vitest';
import { summarizeHealth } from './service-health.js';
import { VmRegistry } from './vm-registry.js';
import { PEER_VM, SELF_VM } from './test-fixtures.js';

const cache = { size: 1, hits: 1, misses: 2, hitRate: 1 / 3 };

describe('summarizeHealth', () => {
  it('should be unhealthy before any VM has attested', () => {
    const registry = new VmRegistry([SELF_VM, PEER_VM]);

    const health = summarizeHealth({ statuses: registry.statusList(), cache, startedAt: 0, now: 61_500, version: '0.1.0' });

    expect(health).toMatchObject({
      status: 'unhealthy',
      vmsOnline: 0,
      vmsTotal: 2,
      cacheHitRate: 0.333,
      uptimeSeconds: 61,
      version: '0.1.0',
    });
    expect(health.vms.secretai?.status).toBe('unknown');
  });

  it('should be degraded when only some VMs are online or one used the fallback parser', () => {
    const registry = new VmRegistry([SELF_VM, PEER_VM], () => 10);
    registry.recordSuccess('secretgpt', false);

    expect(summarizeHealth({ statuses: registry.statusList(), cache, startedAt: 0, now: 0, version: 'x' }).status).toBe(
      'degraded',
    );

    registry.recordSuccess('secretai', true);
    const health = summarizeHealth({ statuses: registry.statusList(), cache, startedAt: 0, now: 0, version: 'x' });
    expect(health.status).toBe('degraded');
    expect(health.vmsOnline).toBe(2);
    expect(health.vms.secretai?.status).toBe('degraded');
  });

  it('should be healthy when every VM attested cleanly', () => {
    const registry = new VmRegistry([SELF_VM, PEER_VM]);
    registry.recordSuccess('secretgpt', false);
    registry.recordSuccess('secretai', false);

    expect(summarizeHealth({ statuses: registry.statusList(), cache, startedAt: 0, now: 0, version: 'x' }).status).toBe(
      'healthy',
    );
  });
});
