export type VmRole = 'self' | 'peer';

export type ParseStrategy =
  | { readonly kind: 'rest-delegate'; readonly serviceUrl: string; readonly timeoutMs: number }
  | { readonly kind: 'byte-offset' };

export interface VmConfig {
  readonly identity: string;
  readonly role: VmRole;
  /** Explicit attestation page URL; discovered at request time when absent */
  readonly endpoint?: string;
  readonly parseStrategy: ParseStrategy;
  readonly timeoutMs: number;
}

export type VmHealth = 'unknown' | 'healthy' | 'degraded' | 'unhealthy';

export interface VmStatus {
  readonly vmIdentity: string;
  readonly status: VmHealth;
  readonly lastSuccessfulAttestation: number | null;
  readonly errorCount: number;
  readonly lastError: string | null;
}
