/** Registers compared against a baseline on every validation. */
export const MEASUREMENT_REGISTERS = ['mrtd', 'rtmr0', 'rtmr1', 'rtmr2', 'rtmr3'] as const;

export type MeasurementRegister = (typeof MEASUREMENT_REGISTERS)[number];

/** Every comparable field, including the optional report data binding. */
export type RegisterName = MeasurementRegister | 'reportData';

export type ParsingMethod = 'rest-delegate' | 'byte-offset';

/**
 * Measurement registers decoded from a TDX quote.
 * Register values are lowercase hex: 96 chars for MRTD/RTMRs, 128 for report data.
 */
export interface MeasurementRegisterSet {
  readonly vmIdentity: string;
  readonly mrtd: string;
  readonly rtmr0: string;
  readonly rtmr1: string;
  readonly rtmr2: string;
  readonly rtmr3: string;
  readonly reportData: string;
  /** SHA-256 of the TLS certificate that served the quote (empty over plain http) */
  readonly certificateFingerprint: string;
  readonly timestamp: number;
  readonly parsingMethod: ParsingMethod;
  /** Why the preferred strategy was abandoned, when a fallback was used */
  readonly fallbackReason?: string;
}

export interface BaselineReference {
  readonly vmIdentity: string;
  readonly mrtd: string;
  readonly rtmr0: string;
  readonly rtmr1: string;
  readonly rtmr2: string;
  readonly rtmr3: string;
  /** Only compared when set; report data usually carries a per-boot nonce */
  readonly reportData?: string;
}

export interface RegisterComparison {
  readonly register: RegisterName;
  readonly expected: string | null;
  readonly actual: string | null;
  readonly matches: boolean;
}

export type VerdictReason = 'no_baseline_configured' | 'register_mismatch';

export interface ValidationVerdict {
  readonly vmIdentity: string;
  readonly passed: boolean;
  readonly reason?: VerdictReason;
  readonly registers: readonly RegisterComparison[];
  readonly mismatched: readonly RegisterName[];
  readonly measurements: MeasurementRegisterSet;
  readonly verifiedAt: number;
}
