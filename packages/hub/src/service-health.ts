import type { VmHealth, VmStatus } from '@aph/types';
import type { CacheStats } from './verdict-cache.js';

export interface ServiceHealth {
  readonly status: Exclude<VmHealth, 'unknown'>;
  readonly vmsOnline: number;
  readonly vmsTotal: number;
  readonly cacheHitRate: number;
  readonly uptimeSeconds: number;
  readonly version: string;
  readonly vms: Record<string, VmStatus>;
}

export interface HealthInput {
  readonly statuses: readonly VmStatus[];
  readonly cache: CacheStats;
  readonly startedAt: number;
  readonly now: number;
  readonly version: string;
}

/**
 * healthy: every VM attested cleanly. unhealthy: none online.
 * VMs never attested yet count as offline.
 */
export function summarizeHealth(input: HealthInput): ServiceHealth {
  const online = input.statuses.filter((s) => s.status === 'healthy' || s.status === 'degraded');
  const allHealthy = input.statuses.length > 0 && input.statuses.every((s) => s.status === 'healthy');

  let status: ServiceHealth['status'] = 'degraded';
  if (allHealthy) status = 'healthy';
  else if (online.length === 0) status = 'unhealthy';

  return {
    status,
    vmsOnline: online.length,
    vmsTotal: input.statuses.length,
    cacheHitRate: Math.round(input.cache.hitRate * 1000) / 1000,
    uptimeSeconds: Math.max(0, Math.floor((input.now - input.startedAt) / 1000)),
    version: input.version,
    vms: Object.fromEntries(input.statuses.map((s) => [s.vmIdentity, s])),
  };
}
