/**
 * Proof artifact failures. Messages are generic on purpose: a wrong password
 * and a corrupted ciphertext must not be told apart.
 */
export abstract class ProofError<K extends string = string> extends Error {
  abstract readonly category: 'encryption' | 'decryption' | 'integrity';

  constructor(
    readonly kind: K,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type EncryptionErrorKind = 'WeakPassword' | 'SerializationFailure';

export class EncryptionError extends ProofError<EncryptionErrorKind> {
  override readonly name = 'EncryptionError';
  readonly category = 'encryption' as const;
}

export type DecryptionErrorKind = 'UnsupportedFormat' | 'WrongPasswordOrCorrupted';

export class DecryptionError extends ProofError<DecryptionErrorKind> {
  override readonly name = 'DecryptionError';
  readonly category = 'decryption' as const;
}

export type IntegrityErrorKind = 'TamperedArtifact';

export class IntegrityError extends ProofError<IntegrityErrorKind> {
  override readonly name = 'IntegrityError';
  readonly category = 'integrity' as const;
}

export function isProofError(err: unknown): err is ProofError {
  return err instanceof ProofError;
}

export const WRONG_PASSWORD_OR_CORRUPTED = 'Wrong password or corrupted file';
export const TAMPERED_ARTIFACT = 'Proof file has been tampered with';
export const UNSUPPORTED_FORMAT = 'Unsupported proof file format';
