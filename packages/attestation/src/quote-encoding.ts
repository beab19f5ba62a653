import { hexToBytes } from '@noble/hashes/utils';
import { ParseError } from '@aph/tee-core';

const HEX = /^[0-9a-fA-F]+$/;
const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Accept a quote as raw bytes, hex (optionally 0x-prefixed) or base64.
 * Hex is tried first: a string that is valid hex is never read as base64.
 */
export function decodeQuote(input: Uint8Array | string): Uint8Array {
  if (typeof input !== 'string') return input;

  const text = input.replace(/\s+/g, '');
  const unprefixed = text.startsWith('0x') || text.startsWith('0X') ? text.slice(2) : text;

  if (unprefixed.length > 0 && unprefixed.length % 2 === 0 && HEX.test(unprefixed)) {
    return hexToBytes(unprefixed);
  }
  if (text.length > 0 && text.length % 4 === 0 && BASE64.test(text)) {
    return new Uint8Array(Buffer.from(text, 'base64'));
  }

  throw new ParseError('UnknownFormat', 'Quote is neither hex nor base64');
}

export function quoteToBase64(quote: Uint8Array): string {
  return Buffer.from(quote).toString('base64');
}
