import { setTimeout as sleep } from 'node:timers/promises';
import { bytesToHex } from '@noble/hashes/utils';
import { sha256 } from '@noble/hashes/sha256';
import type { VmConfig } from '@aph/types';
import {
  FetchError,
  type FetchErrorKind,
  type FetchedQuote,
  type IQuoteSource,
  type QuoteRegisters,
} from '@aph/tee-core';
import { buildTdxQuote, type BuildQuoteOptions } from './quote-builder.js';
import { deriveRegisters } from './measurement.js';

export interface SimulatedVm {
  readonly registers: QuoteRegisters;
  readonly quoteOptions?: BuildQuoteOptions;
  /** Served in place of a built quote, e.g. truncated bytes */
  readonly rawQuote?: Uint8Array;
  readonly certificateFingerprint?: string;
  /** When set, every fetch for this VM fails with this kind */
  readonly failure?: FetchErrorKind;
  readonly delayMs?: number;
}

/**
 * In-process quote source. Serves locally built TDX quotes for configured VMs,
 * with optional latency and injected failures.
 */
export class SimulatedQuoteSource implements IQuoteSource {
  readonly provider = 'simulator' as const;

  private readonly vms = new Map<string, SimulatedVm>();
  private readonly fetches = new Map<string, number>();

  constructor(vms: Record<string, SimulatedVm> = {}) {
    for (const [identity, vm] of Object.entries(vms)) {
      this.vms.set(identity, vm);
    }
  }

  /** Register a VM whose registers are derived from its identity. */
  static seeded(identities: readonly string[]): SimulatedQuoteSource {
    const source = new SimulatedQuoteSource();
    for (const identity of identities) {
      source.setVm(identity, { registers: deriveRegisters(identity) });
    }
    return source;
  }

  setVm(identity: string, vm: SimulatedVm): void {
    this.vms.set(identity, vm);
  }

  fetchCount(identity: string): number {
    return this.fetches.get(identity) ?? 0;
  }

  async fetchQuote(vm: VmConfig, signal?: AbortSignal): Promise<FetchedQuote> {
    this.fetches.set(vm.identity, this.fetchCount(vm.identity) + 1);
    const endpoint = vm.endpoint ?? `simulator://${vm.identity}/cpu.html`;

    const simulated = this.vms.get(vm.identity);
    if (!simulated) {
      throw new FetchError('EndpointUnreachable', `No attestation endpoint for ${vm.identity}`);
    }

    if (simulated.delayMs) {
      try {
        await sleep(simulated.delayMs, undefined, { signal });
      } catch (err) {
        throw new FetchError('EndpointUnreachable', `Attestation request to ${vm.identity} was aborted`, {
          cause: err,
        });
      }
    }

    if (simulated.failure) {
      throw new FetchError(simulated.failure, `Simulated ${simulated.failure} for ${vm.identity}`);
    }

    return {
      quote: simulated.rawQuote ?? buildTdxQuote(simulated.registers, simulated.quoteOptions),
      certificateFingerprint:
        simulated.certificateFingerprint ?? bytesToHex(sha256(new TextEncoder().encode(`cert:${vm.identity}`))),
      endpoint,
    };
  }
}
