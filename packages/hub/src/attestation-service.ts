import { createLogger } from '@aph/logger';
import type { BaselineValidator, QuoteParser } from '@aph/attestation';
import { isHubError, type FetchedQuote, type IQuoteSource } from '@aph/tee-core';
import type { AttestationStage, MeasurementRegisterSet, ValidationVerdict, VmConfig } from '@aph/types';
import { PipelineError } from './pipeline-error.js';
import type { VerdictCache } from './verdict-cache.js';
import type { VmRegistry } from './vm-registry.js';

const log = createLogger('attestation-service');

export interface AttestationServiceDeps {
  readonly registry: VmRegistry;
  readonly source: IQuoteSource;
  readonly parser: QuoteParser;
  readonly validator: BaselineValidator;
  readonly cache: VerdictCache;
}

export interface AttestOptions {
  /** Skip the cache lookup (the fresh verdict is still cached) */
  readonly refresh?: boolean;
}

export interface AttestationOutcome {
  readonly verdict: ValidationVerdict;
  readonly cached: boolean;
}

async function stage<T>(vm: VmConfig, name: AttestationStage, run: () => Promise<T> | T): Promise<T> {
  try {
    return await run();
  } catch (err) {
    log.warn({ vmIdentity: vm.identity, stage: name, err }, 'attestation stage failed');
    throw new PipelineError(vm.identity, name, { cause: err });
  }
}

/**
 * Single-VM pipeline: cache → fetch → parse → validate.
 * Concurrent calls for the same VM share one in-flight run.
 */
export class AttestationService {
  private readonly inFlight = new Map<string, Promise<ValidationVerdict>>();

  constructor(private readonly deps: AttestationServiceDeps) {}

  get registry(): VmRegistry {
    return this.deps.registry;
  }

  get cache(): VerdictCache {
    return this.deps.cache;
  }

  async attest(vmIdentity: string, options: AttestOptions = {}): Promise<AttestationOutcome> {
    const vm = this.deps.registry.require(vmIdentity);

    if (!options.refresh) {
      const cached = this.deps.cache.get(vmIdentity);
      if (cached) {
        log.debug({ vmIdentity, stage: 'validate' }, 'verdict served from cache');
        return { verdict: cached, cached: true };
      }
    }

    let pending = this.inFlight.get(vmIdentity);
    if (!pending) {
      pending = this.run(vm).finally(() => this.inFlight.delete(vmIdentity));
      this.inFlight.set(vmIdentity, pending);
    }
    return { verdict: await pending, cached: false };
  }

  private async run(vm: VmConfig): Promise<ValidationVerdict> {
    try {
      const fetched: FetchedQuote = await stage(vm, 'fetch', () =>
        this.deps.source.fetchQuote(vm, AbortSignal.timeout(vm.timeoutMs)),
      );
      const measurements: MeasurementRegisterSet = await stage(vm, 'parse', () =>
        this.deps.parser.parse({
          vmIdentity: vm.identity,
          quote: fetched.quote,
          certificateFingerprint: fetched.certificateFingerprint,
          strategy: vm.parseStrategy,
        }),
      );
      const verdict = await stage(vm, 'validate', () => this.deps.validator.validate(measurements, vm.identity));

      this.deps.cache.put(vm.identity, verdict);
      if (verdict.passed) {
        this.deps.registry.recordSuccess(vm.identity, measurements.fallbackReason !== undefined);
      } else {
        this.deps.registry.recordFailure(vm.identity, verdict.reason ?? 'register_mismatch');
      }
      log.info(
        { vmIdentity: vm.identity, stage: 'validate', passed: verdict.passed, parsingMethod: measurements.parsingMethod },
        'attestation complete',
      );
      return verdict;
    } catch (err) {
      const message = err instanceof PipelineError && isHubError(err.cause) ? err.cause.message : 'internal error';
      this.deps.registry.recordFailure(vm.identity, message);
      throw err;
    }
  }
}
