import { hexToBytes } from '@noble/hashes/utils';
import {
  TDX_HEADER,
  TDX_TEE_TYPE,
  TD_REPORT_BODY_SIZE,
  TD_REPORT_FIELDS,
  QUOTE_FIELDS,
  V4_BODY_OFFSET,
  V5_BODY_DESCRIPTOR,
  V5_BODY_SIZES,
  type QuoteRegisters,
  type QuoteVersion,
} from '@aph/tee-core';

const ECDSA_P256_KEY_TYPE = 2;

export interface BuildQuoteOptions {
  readonly version?: QuoteVersion;
  /** v5 only: 2 = TD report 1.0, 3 = TD report 1.5 */
  readonly bodyType?: 2 | 3;
  /** v5 only: overrides the declared body size (to produce inconsistent quotes) */
  readonly declaredBodySize?: number;
  readonly teeType?: number;
  /** Length of the trailing (zero-filled) signature data section */
  readonly signatureDataLength?: number;
}

/**
 * Build a structurally valid TDX quote carrying the given registers.
 * Signature data is zero-filled; the result is only meaningful to layout parsers.
 */
export function buildTdxQuote(registers: QuoteRegisters, options: BuildQuoteOptions = {}): Uint8Array {
  const version = options.version ?? 4;
  const bodyType = options.bodyType ?? 2;
  const signatureDataLength = options.signatureDataLength ?? 128;

  const bodySize = version === 4 ? TD_REPORT_BODY_SIZE : (V5_BODY_SIZES[bodyType] ?? TD_REPORT_BODY_SIZE);
  const bodyOffset = version === 4 ? V4_BODY_OFFSET : V5_BODY_DESCRIPTOR.bodyOffset;
  const quote = new Uint8Array(bodyOffset + bodySize + 4 + signatureDataLength);
  const view = new DataView(quote.buffer);

  view.setUint16(TDX_HEADER.versionOffset, version, true);
  view.setUint16(TDX_HEADER.attestationKeyTypeOffset, ECDSA_P256_KEY_TYPE, true);
  view.setUint32(TDX_HEADER.teeTypeOffset, options.teeType ?? TDX_TEE_TYPE, true);

  if (version === 5) {
    view.setUint16(V5_BODY_DESCRIPTOR.typeOffset, bodyType, true);
    view.setUint32(V5_BODY_DESCRIPTOR.sizeOffset, options.declaredBodySize ?? bodySize, true);
  }

  for (const field of QUOTE_FIELDS) {
    const span = TD_REPORT_FIELDS[field];
    const bytes = hexToBytes(registers[field]);
    if (bytes.length !== span.size) {
      throw new Error(`${field} must be ${span.size} bytes, got ${bytes.length}`);
    }
    quote.set(bytes, bodyOffset + span.offset);
  }

  view.setUint32(bodyOffset + bodySize, signatureDataLength, true);
  return quote;
}

/** Copy of `quote` with one bit flipped at `offset`. */
export function flipBit(quote: Uint8Array, offset: number, bit = 0): Uint8Array {
  const copy = new Uint8Array(quote);
  copy[offset] = (copy[offset] ?? 0) ^ (1 << bit);
  return copy;
}
