import type { VmConfig, VmRole, VmStatus } from '@aph/types';

export class UnknownVmError extends Error {
  override readonly name = 'UnknownVmError';

  constructor(readonly vmIdentity: string) {
    super(`Unknown VM: ${vmIdentity}`);
  }
}

/** Configured VMs and their attestation health. */
export class VmRegistry {
  private readonly configs = new Map<string, VmConfig>();
  private readonly statuses = new Map<string, VmStatus>();

  constructor(
    vms: readonly VmConfig[],
    private readonly now: () => number = Date.now,
  ) {
    for (const vm of vms) {
      this.configs.set(vm.identity, vm);
      this.statuses.set(vm.identity, {
        vmIdentity: vm.identity,
        status: 'unknown',
        lastSuccessfulAttestation: null,
        errorCount: 0,
        lastError: null,
      });
    }
  }

  get(vmIdentity: string): VmConfig | undefined {
    return this.configs.get(vmIdentity);
  }

  require(vmIdentity: string): VmConfig {
    const vm = this.configs.get(vmIdentity);
    if (!vm) throw new UnknownVmError(vmIdentity);
    return vm;
  }

  /** First VM with the given role. */
  byRole(role: VmRole): VmConfig {
    for (const vm of this.configs.values()) {
      if (vm.role === role) return vm;
    }
    throw new UnknownVmError(role);
  }

  list(): VmConfig[] {
    return [...this.configs.values()];
  }

  /** `degraded` when the quote was only readable through the fallback parser. */
  recordSuccess(vmIdentity: string, degraded: boolean): void {
    this.update(vmIdentity, {
      status: degraded ? 'degraded' : 'healthy',
      lastSuccessfulAttestation: this.now(),
      errorCount: 0,
      lastError: null,
    });
  }

  recordFailure(vmIdentity: string, error: string): void {
    const current = this.statuses.get(vmIdentity);
    this.update(vmIdentity, {
      status: 'unhealthy',
      errorCount: (current?.errorCount ?? 0) + 1,
      lastError: error,
    });
  }

  status(vmIdentity: string): VmStatus | undefined {
    return this.statuses.get(vmIdentity);
  }

  statusList(): VmStatus[] {
    return [...this.statuses.values()];
  }

  private update(vmIdentity: string, patch: Partial<Omit<VmStatus, 'vmIdentity'>>): void {
    const current = this.statuses.get(vmIdentity);
    if (!current) return;
    this.statuses.set(vmIdentity, { ...current, ...patch });
  }
}
