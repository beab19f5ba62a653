import { DecryptionError, UNSUPPORTED_FORMAT, WRONG_PASSWORD_OR_CORRUPTED } from './errors.js';
import { SALT_SIZE, isAcceptedIterationCount } from './key-derivation.js';

/**
 * `.attestproof` layout, big-endian:
 *
 *   0   magic "ATTESTPF"      44  integrity hash (32)
 *   8   format version        76  GCM tag (16)
 *   9   KDF id                92  ciphertext length (u32)
 *   10  cipher id             96  ciphertext
 *   11  hash id
 *   12  KDF iterations (u32)
 *   16  salt (16)
 *   32  nonce (12)
 *
 * Bytes 0..43 are the AEAD additional data.
 */
export const MAGIC = new TextEncoder().encode('ATTESTPF');
export const FORMAT_VERSION = 1;
export const KDF_PBKDF2_SHA256 = 1;
export const CIPHER_AES_256_GCM = 1;
export const HASH_SHA256 = 1;

export const NONCE_SIZE = 12;
export const HASH_SIZE = 32;
export const TAG_SIZE = 16;

const OFFSET = {
  version: 8,
  kdf: 9,
  cipher: 10,
  hash: 11,
  iterations: 12,
  salt: 16,
  nonce: 32,
  integrityHash: 44,
  tag: 76,
  ciphertextLength: 92,
  ciphertext: 96,
} as const;

export const AAD_LENGTH = OFFSET.integrityHash;
export const HEADER_SIZE = OFFSET.ciphertext;

export interface EnvelopeHeader {
  readonly iterations: number;
  readonly salt: Uint8Array;
  readonly nonce: Uint8Array;
}

export interface Envelope extends EnvelopeHeader {
  readonly integrityHash: Uint8Array;
  readonly tag: Uint8Array;
  readonly ciphertext: Uint8Array;
}

/** The authenticated header prefix for the given KDF parameters. */
export function encodeAad(header: EnvelopeHeader): Uint8Array {
  const aad = new Uint8Array(AAD_LENGTH);
  const view = new DataView(aad.buffer);
  aad.set(MAGIC, 0);
  aad[OFFSET.version] = FORMAT_VERSION;
  aad[OFFSET.kdf] = KDF_PBKDF2_SHA256;
  aad[OFFSET.cipher] = CIPHER_AES_256_GCM;
  aad[OFFSET.hash] = HASH_SHA256;
  view.setUint32(OFFSET.iterations, header.iterations, false);
  aad.set(header.salt, OFFSET.salt);
  aad.set(header.nonce, OFFSET.nonce);
  return aad;
}

export function encodeEnvelope(envelope: Envelope): Uint8Array {
  const out = new Uint8Array(HEADER_SIZE + envelope.ciphertext.length);
  const view = new DataView(out.buffer);
  out.set(encodeAad(envelope), 0);
  out.set(envelope.integrityHash, OFFSET.integrityHash);
  out.set(envelope.tag, OFFSET.tag);
  view.setUint32(OFFSET.ciphertextLength, envelope.ciphertext.length, false);
  out.set(envelope.ciphertext, OFFSET.ciphertext);
  return out;
}

function corrupted(): DecryptionError {
  return new DecryptionError('WrongPasswordOrCorrupted', WRONG_PASSWORD_OR_CORRUPTED);
}

/**
 * Split an artifact into its fields. Unknown magic or algorithm ids are
 * UnsupportedFormat; every structural problem after that is reported exactly
 * like a wrong password.
 */
export function decodeEnvelope(bytes: Uint8Array): Envelope & { readonly aad: Uint8Array } {
  if (bytes.length < MAGIC.length || !MAGIC.every((b, i) => bytes[i] === b)) {
    throw new DecryptionError('UnsupportedFormat', UNSUPPORTED_FORMAT);
  }
  if (bytes.length < OFFSET.iterations) throw corrupted();
  if (
    bytes[OFFSET.version] !== FORMAT_VERSION ||
    bytes[OFFSET.kdf] !== KDF_PBKDF2_SHA256 ||
    bytes[OFFSET.cipher] !== CIPHER_AES_256_GCM ||
    bytes[OFFSET.hash] !== HASH_SHA256
  ) {
    throw new DecryptionError('UnsupportedFormat', UNSUPPORTED_FORMAT);
  }
  if (bytes.length < HEADER_SIZE) throw corrupted();

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const iterations = view.getUint32(OFFSET.iterations, false);
  const ciphertextLength = view.getUint32(OFFSET.ciphertextLength, false);
  if (!isAcceptedIterationCount(iterations) || ciphertextLength !== bytes.length - HEADER_SIZE) {
    throw corrupted();
  }

  return {
    iterations,
    salt: bytes.slice(OFFSET.salt, OFFSET.salt + SALT_SIZE),
    nonce: bytes.slice(OFFSET.nonce, OFFSET.nonce + NONCE_SIZE),
    integrityHash: bytes.slice(OFFSET.integrityHash, OFFSET.integrityHash + HASH_SIZE),
    tag: bytes.slice(OFFSET.tag, OFFSET.tag + TAG_SIZE),
    ciphertext: bytes.slice(OFFSET.ciphertext),
    aad: bytes.slice(0, AAD_LENGTH),
  };
}
