import { sha384, sha512 } from '@noble/hashes/sha512';
import { bytesToHex } from '@noble/hashes/utils';
import type { QuoteRegisters } from '@aph/tee-core';

/**
 * Derive a deterministic register set from a seed string.
 * Each 48-byte register is SHA-384(`${seed}:${register}`); report data is SHA-512.
 */
export function deriveRegisters(seed: string): QuoteRegisters {
  const encoder = new TextEncoder();
  const register = (name: string) => bytesToHex(sha384(encoder.encode(`${seed}:${name}`)));

  return {
    mrtd: register('mrtd'),
    rtmr0: register('rtmr0'),
    rtmr1: register('rtmr1'),
    rtmr2: register('rtmr2'),
    rtmr3: register('rtmr3'),
    reportData: bytesToHex(sha512(encoder.encode(`${seed}:report_data`))),
  };
}
