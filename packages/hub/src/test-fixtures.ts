import { BaselineRegistry, BaselineValidator, QuoteParser } from '@aph/attestation';
import { SimulatedQuoteSource, deriveRegisters } from '@aph/tee-simulator';
import type { VmConfig } from '@aph/types';
import { AttestationService } from './attestation-service.js';
import { VerdictCache } from './verdict-cache.js';
import { VmRegistry } from './vm-registry.js';

export const SELF_VM: VmConfig = {
  identity: 'secretgpt',
  role: 'self',
  parseStrategy: { kind: 'byte-offset' },
  timeoutMs: 200,
};

export const PEER_VM: VmConfig = { ...SELF_VM, identity: 'secretai', role: 'peer' };

/** Both VMs served by the simulator with baselines matching their quotes. */
export function createTestHub(options: { cacheTtlMs?: number; now?: () => number } = {}) {
  const source = SimulatedQuoteSource.seeded([SELF_VM.identity, PEER_VM.identity]);
  const baselines = new BaselineRegistry(
    [SELF_VM, PEER_VM].map((vm) => ({ vmIdentity: vm.identity, ...deriveRegisters(vm.identity), reportData: undefined })),
  );
  const registry = new VmRegistry([SELF_VM, PEER_VM], options.now);
  const cache = new VerdictCache({ ttlMs: options.cacheTtlMs, now: options.now });
  const service = new AttestationService({
    registry,
    source,
    parser: new QuoteParser({ now: options.now }),
    validator: new BaselineValidator(baselines, options.now),
    cache,
  });
  return { source, baselines, registry, cache, service };
}
