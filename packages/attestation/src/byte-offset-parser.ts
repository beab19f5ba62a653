import { bytesToHex } from '@noble/hashes/utils';
import {
  ParseError,
  QUOTE_FIELDS,
  SUPPORTED_QUOTE_VERSIONS,
  TDX_HEADER,
  TDX_TEE_TYPE,
  TD_REPORT_BODY_SIZE,
  TD_REPORT_FIELDS,
  V4_BODY_OFFSET,
  V5_BODY_DESCRIPTOR,
  V5_BODY_SIZES,
  type QuoteField,
  type QuoteRegisters,
} from '@aph/tee-core';

interface BodyLocation {
  readonly offset: number;
  readonly size: number;
}

function isSupportedVersion(version: number): boolean {
  return SUPPORTED_QUOTE_VERSIONS.some((v) => v === version);
}

function locateBody(quote: Uint8Array, view: DataView, version: number): BodyLocation {
  if (version === 4) {
    return { offset: V4_BODY_OFFSET, size: TD_REPORT_BODY_SIZE };
  }

  if (quote.length < V5_BODY_DESCRIPTOR.bodyOffset) {
    throw new ParseError('TruncatedQuote', `Quote is ${quote.length} bytes, shorter than the v5 body descriptor`);
  }
  const bodyType = view.getUint16(V5_BODY_DESCRIPTOR.typeOffset, true);
  const expectedSize = V5_BODY_SIZES[bodyType];
  if (expectedSize === undefined) {
    throw new ParseError('UnknownFormat', `Unsupported v5 quote body type ${bodyType}`);
  }
  const declaredSize = view.getUint32(V5_BODY_DESCRIPTOR.sizeOffset, true);
  if (declaredSize !== expectedSize) {
    throw new ParseError(
      'ChecksumMismatch',
      `v5 body type ${bodyType} declares ${declaredSize} bytes, expected ${expectedSize}`,
    );
  }
  return { offset: V5_BODY_DESCRIPTOR.bodyOffset, size: expectedSize };
}

/**
 * Read MRTD, RTMR0-3 and REPORTDATA from a TDX v4/v5 quote at the fixed
 * TD report body offsets.
 */
export function readQuoteRegisters(quote: Uint8Array): QuoteRegisters {
  if (quote.length < TDX_HEADER.size) {
    throw new ParseError('TruncatedQuote', `Quote is ${quote.length} bytes, shorter than the ${TDX_HEADER.size}-byte header`);
  }

  const view = new DataView(quote.buffer, quote.byteOffset, quote.byteLength);
  const version = view.getUint16(TDX_HEADER.versionOffset, true);
  if (!isSupportedVersion(version)) {
    throw new ParseError('UnknownFormat', `Unsupported quote version ${version}`);
  }
  const teeType = view.getUint32(TDX_HEADER.teeTypeOffset, true);
  if (teeType !== TDX_TEE_TYPE) {
    throw new ParseError('UnknownFormat', `Quote TEE type 0x${teeType.toString(16)} is not TDX`);
  }

  const body = locateBody(quote, view, version);
  if (quote.length < body.offset + body.size) {
    throw new ParseError(
      'TruncatedQuote',
      `Quote is ${quote.length} bytes, TD report body needs ${body.offset + body.size}`,
    );
  }

  const read = (field: QuoteField): string => {
    const span = TD_REPORT_FIELDS[field];
    const start = body.offset + span.offset;
    return bytesToHex(quote.subarray(start, start + span.size));
  };

  return {
    mrtd: read('mrtd'),
    rtmr0: read('rtmr0'),
    rtmr1: read('rtmr1'),
    rtmr2: read('rtmr2'),
    rtmr3: read('rtmr3'),
    reportData: read('reportData'),
  };
}

/** First field on which two register reads disagree, if any. */
export function firstDifference(a: QuoteRegisters, b: QuoteRegisters): QuoteField | undefined {
  return QUOTE_FIELDS.find((field) => a[field].toLowerCase() !== b[field].toLowerCase());
}
