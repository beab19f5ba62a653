import { pbkdf2 } from 'node:crypto';
import { promisify } from 'node:util';

const pbkdf2Async = promisify(pbkdf2);

export const KEY_SIZE = 32;
export const SALT_SIZE = 16;
export const DEFAULT_KDF_ITERATIONS = 600_000;
export const MIN_KDF_ITERATIONS = 1_000;
export const MAX_KDF_ITERATIONS = 10_000_000;

export function isAcceptedIterationCount(iterations: number): boolean {
  return Number.isInteger(iterations) && iterations >= MIN_KDF_ITERATIONS && iterations <= MAX_KDF_ITERATIONS;
}

/**
 * PBKDF2-HMAC-SHA256 → 256-bit AES key. Runs on the libuv thread pool.
 * Passwords are NFC-normalized so equivalent Unicode input derives the same key.
 */
export async function derivePasswordKey(password: string, salt: Uint8Array, iterations: number): Promise<Buffer> {
  return pbkdf2Async(password.normalize('NFC'), salt, iterations, KEY_SIZE, 'sha256');
}
