import { Hono } from 'hono';
import { summarizeHealth } from '@aph/hub';
import type { HubServices } from '../hub-bridge.js';

export function createHealthRouter(hub: HubServices, version: string, now: () => number = Date.now) {
  const router = new Hono();

  router.get('/health', (c) =>
    c.json(
      summarizeHealth({
        statuses: hub.registry.statusList(),
        cache: hub.cache.stats(),
        startedAt: hub.startedAt,
        now: now(),
        version,
      }),
    ),
  );

  router.get('/vms', (c) =>
    c.json({
      provider: hub.provider,
      vms: hub.registry.list().map((vm) => ({
        identity: vm.identity,
        role: vm.role,
        endpoint: vm.endpoint ?? null,
        parseStrategy: vm.parseStrategy.kind,
        hasBaseline: hub.baselines.has(vm.identity),
        status: hub.registry.status(vm.identity),
      })),
    }),
  );

  return router;
}
