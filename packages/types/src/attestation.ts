import type { ValidationVerdict } from './measurements.js';

export type AttestationStage = 'fetch' | 'parse' | 'validate';

/** Sanitized failure description embedded in a result slot. */
export interface SlotError {
  readonly stage: AttestationStage;
  readonly kind: string;
  readonly message: string;
}

export interface VerdictSlot {
  readonly vmIdentity: string;
  readonly status: 'verified' | 'failed';
  readonly verdict: ValidationVerdict;
  readonly cached: boolean;
}

export interface ErrorSlot {
  readonly vmIdentity: string;
  /** `unreachable` when the quote could not be fetched, `unknown` otherwise */
  readonly status: 'unreachable' | 'unknown';
  readonly error: SlotError;
}

export type AttestationSlot = VerdictSlot | ErrorSlot;

export type VmAttestationStatus = AttestationSlot['status'];

export interface DualAttestationResult {
  readonly correlationId: string;
  readonly self: AttestationSlot;
  readonly peer: AttestationSlot;
  readonly overallVerified: boolean;
  readonly timestamp: number;
  /** Oldest verdict time among the present slots; null when neither slot has a verdict */
  readonly verifiedAt: number | null;
}

export interface BatchAttestationResult {
  readonly correlationId: string;
  /** True when every requested VM verified */
  readonly success: boolean;
  readonly results: Record<string, AttestationSlot>;
  readonly timestamp: number;
}

export function isVerdictSlot(slot: AttestationSlot): slot is VerdictSlot {
  return slot.status === 'verified' || slot.status === 'failed';
}
