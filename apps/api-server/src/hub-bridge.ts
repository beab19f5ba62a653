import { BaselineRegistry, BaselineValidator, QuoteParser } from '@aph/attestation';
import { AttestationService, DualAttestationCoordinator, VerdictCache, VmRegistry } from '@aph/hub';
import { createLogger } from '@aph/logger';
import { ProofEngine } from '@aph/proof';
import { SecretVmQuoteSource, defaultResolvers } from '@aph/secretvm';
import type { IQuoteSource } from '@aph/tee-core';
import { SimulatedQuoteSource, deriveRegisters } from '@aph/tee-simulator';
import type { AppConfig } from './config.js';

const log = createLogger('hub-bridge');

/**
 * Hub Bridge: wires the quote source selected by TEE_PROVIDER into the
 * attestation pipeline, the coordinator and the proof engine.
 */
export interface HubServices {
  readonly provider: IQuoteSource['provider'];
  readonly baselines: BaselineRegistry;
  readonly registry: VmRegistry;
  readonly cache: VerdictCache;
  readonly service: AttestationService;
  readonly coordinator: DualAttestationCoordinator;
  readonly proofEngine: ProofEngine;
  readonly startedAt: number;
  /** Stops background work (the cache sweep). */
  close(): void;
}

export interface HubOverrides {
  readonly source?: IQuoteSource;
  readonly baselines?: BaselineRegistry;
  readonly fetch?: typeof fetch;
  readonly now?: () => number;
}

/** Quotes carry the baseline registers, so every VM attests cleanly offline. */
function simulatorSource(config: AppConfig, baselines: BaselineRegistry): SimulatedQuoteSource {
  const source = new SimulatedQuoteSource();
  for (const vm of config.vms) {
    const baseline = baselines.get(vm.identity);
    const derived = deriveRegisters(vm.identity);
    source.setVm(vm.identity, {
      registers: baseline
        ? {
            mrtd: baseline.mrtd,
            rtmr0: baseline.rtmr0,
            rtmr1: baseline.rtmr1,
            rtmr2: baseline.rtmr2,
            rtmr3: baseline.rtmr3,
            reportData: baseline.reportData ?? derived.reportData,
          }
        : derived,
    });
  }
  return source;
}

function createQuoteSource(config: AppConfig, baselines: BaselineRegistry, overrides: HubOverrides): IQuoteSource {
  if (overrides.source) return overrides.source;

  switch (config.teeProvider) {
    case 'simulator':
      return simulatorSource(config, baselines);
    case 'secretvm':
      return new SecretVmQuoteSource({
        resolvers: defaultResolvers({ ...config.discovery, fetch: overrides.fetch }),
      });
  }
}

export async function createHubServices(config: AppConfig, overrides: HubOverrides = {}): Promise<HubServices> {
  const now = overrides.now ?? Date.now;
  const baselines = overrides.baselines ?? (await BaselineRegistry.fromFile(config.baselinesPath));

  for (const vm of config.vms) {
    if (!baselines.has(vm.identity)) {
      log.warn({ vmIdentity: vm.identity }, 'no baseline configured; verdicts will fail');
    }
  }

  const source = createQuoteSource(config, baselines, overrides);
  const registry = new VmRegistry(config.vms, now);
  const cache = new VerdictCache({ ttlMs: config.cache.ttlMs, maxSize: config.cache.maxSize, now });
  const service = new AttestationService({
    registry,
    source,
    parser: new QuoteParser({ fetch: overrides.fetch, now }),
    validator: new BaselineValidator(baselines, now),
    cache,
  });

  if (config.cache.sweepMs > 0) cache.startSweep(config.cache.sweepMs);

  return {
    provider: source.provider,
    baselines,
    registry,
    cache,
    service,
    coordinator: new DualAttestationCoordinator(service, { now }),
    proofEngine: new ProofEngine({
      iterations: config.proof.iterations,
      minPasswordLength: config.proof.minPasswordLength,
      now: () => new Date(now()),
    }),
    startedAt: now(),
    close: () => cache.stopSweep(),
  };
}
