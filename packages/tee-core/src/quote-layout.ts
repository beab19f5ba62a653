import { MEASUREMENT_REGISTERS, type MeasurementRegister } from '@aph/types';

/**
 * Intel TDX DCAP quote layout (quote format v4 and v5).
 *
 * Every byte offset used to read or build a quote lives here.
 * Body offsets are relative to the start of the TD report body.
 */
export const TDX_HEADER = {
  size: 48,
  versionOffset: 0,
  attestationKeyTypeOffset: 2,
  teeTypeOffset: 4,
} as const;

export const TDX_TEE_TYPE = 0x81;

export const SUPPORTED_QUOTE_VERSIONS = [4, 5] as const;

export type QuoteVersion = (typeof SUPPORTED_QUOTE_VERSIONS)[number];

/** v4 places the TD report body directly after the header. */
export const V4_BODY_OFFSET = TDX_HEADER.size;

/** v5 inserts a body descriptor (u16 type, u32 size) between header and body. */
export const V5_BODY_DESCRIPTOR = {
  typeOffset: 48,
  sizeOffset: 50,
  bodyOffset: 54,
} as const;

/** v5 body types and the body size each one must declare. */
export const V5_BODY_SIZES: Readonly<Record<number, number>> = {
  2: 584, // TD report 1.0
  3: 648, // TD report 1.5
};

export const TD_REPORT_BODY_SIZE = 584;

export interface FieldSpan {
  readonly offset: number;
  readonly size: number;
}

export type QuoteField = MeasurementRegister | 'reportData';

/** Fields in TD report body order. */
export const QUOTE_FIELDS: readonly QuoteField[] = [...MEASUREMENT_REGISTERS, 'reportData'];

export const TD_REPORT_FIELDS: Readonly<Record<QuoteField, FieldSpan>> = {
  mrtd: { offset: 136, size: 48 },
  rtmr0: { offset: 328, size: 48 },
  rtmr1: { offset: 376, size: 48 },
  rtmr2: { offset: 424, size: 48 },
  rtmr3: { offset: 472, size: 48 },
  reportData: { offset: 520, size: 64 },
};

export const REGISTER_HEX_LENGTH = 96;
export const REPORT_DATA_HEX_LENGTH = 128;

/** Lowercase hex values of every field read from a TD report body. */
export type QuoteRegisters = Readonly<Record<QuoteField, string>>;
