import { randomUUID } from 'node:crypto';
import { createLogger } from '@aph/logger';
import { FetchError } from '@aph/tee-core';
import {
  isVerdictSlot,
  type AttestationSlot,
  type BatchAttestationResult,
  type DualAttestationResult,
  type VerdictSlot,
  type VmConfig,
} from '@aph/types';
import type { AttestationOutcome, AttestationService } from './attestation-service.js';
import { toErrorSlot } from './pipeline-error.js';

const log = createLogger('dual-coordinator');

export interface DualCoordinatorOptions {
  readonly now?: () => number;
  readonly correlationId?: () => string;
}

export interface AttestRequest {
  readonly refresh?: boolean;
}

export interface BatchAttestRequest extends AttestRequest {
  readonly correlationId?: string;
}

/** Rejects with EndpointUnreachable after the VM's timeout; the timer is cleared once `task` settles. */
function withTimeout<T>(task: Promise<T>, vm: VmConfig): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new FetchError('EndpointUnreachable', `Attestation of ${vm.identity} timed out after ${vm.timeoutMs}ms`));
    }, vm.timeoutMs);
  });
  return Promise.race([task, timeout]).finally(() => clearTimeout(timer));
}

function verdictSlot(vm: VmConfig, { verdict, cached }: AttestationOutcome): VerdictSlot {
  return { vmIdentity: vm.identity, status: verdict.passed ? 'verified' : 'failed', verdict, cached };
}

function toSlot(vm: VmConfig, result: PromiseSettledResult<AttestationOutcome>): AttestationSlot {
  return result.status === 'fulfilled' ? verdictSlot(vm, result.value) : toErrorSlot(vm.identity, result.reason);
}

/**
 * Attests the self and peer VMs concurrently. One VM failing never fails the
 * call: its error is embedded in that VM's slot.
 */
export class DualAttestationCoordinator {
  private readonly now: () => number;
  private readonly correlationId: () => string;

  constructor(
    private readonly service: AttestationService,
    options: DualCoordinatorOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.correlationId = options.correlationId ?? randomUUID;
  }

  async attestDual(request: AttestRequest = {}): Promise<DualAttestationResult> {
    const correlationId = this.correlationId();
    const self = this.service.registry.byRole('self');
    const peer = this.service.registry.byRole('peer');

    const [selfResult, peerResult] = await Promise.allSettled([
      this.attestVm(self, request),
      this.attestVm(peer, request),
    ]);
    const selfSlot = toSlot(self, selfResult);
    const peerSlot = toSlot(peer, peerResult);
    const verdicts = [selfSlot, peerSlot].filter(isVerdictSlot);
    const overallVerified = selfSlot.status === 'verified' && peerSlot.status === 'verified';

    log.info(
      { correlationId, self: selfSlot.status, peer: peerSlot.status, overallVerified },
      'dual attestation complete',
    );
    return {
      correlationId,
      self: selfSlot,
      peer: peerSlot,
      overallVerified,
      timestamp: this.now(),
      verifiedAt: verdicts.length === 0 ? null : Math.min(...verdicts.map((s) => s.verdict.verifiedAt)),
    };
  }

  /** Attest every configured VM concurrently. */
  attestAll(request: AttestRequest = {}): Promise<Record<string, AttestationSlot>> {
    return this.attestMany(this.service.registry.list(), request);
  }

  /**
   * Attests the named VMs concurrently. Throws UnknownVmError before any quote
   * is fetched when a name is not configured; duplicate names attest once.
   */
  async attestBatch(vmIdentities: readonly string[], request: BatchAttestRequest = {}): Promise<BatchAttestationResult> {
    const vms = [...new Set(vmIdentities)].map((identity) => this.service.registry.require(identity));
    const correlationId = request.correlationId ?? this.correlationId();

    const results = await this.attestMany(vms, request);
    const success = Object.values(results).every((slot) => slot.status === 'verified');

    log.info({ correlationId, vms: vms.length, success }, 'batch attestation complete');
    return { correlationId, success, results, timestamp: this.now() };
  }

  private async attestMany(vms: readonly VmConfig[], request: AttestRequest): Promise<Record<string, AttestationSlot>> {
    const slots = await Promise.all(
      vms.map((vm) =>
        this.attestVm(vm, request).then(
          (outcome) => verdictSlot(vm, outcome),
          (err: unknown) => toErrorSlot(vm.identity, err),
        ),
      ),
    );
    return Object.fromEntries(slots.map((slot) => [slot.vmIdentity, slot]));
  }

  private attestVm(vm: VmConfig, request: AttestRequest): Promise<AttestationOutcome> {
    return withTimeout(this.service.attest(vm.identity, { refresh: request.refresh }), vm);
  }
}
