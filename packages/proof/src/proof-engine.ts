import { createCipheriv, createDecipheriv, randomBytes, timingSafeEqual } from 'node:crypto';
import { sha256 } from '@noble/hashes/sha256';
import { createLogger } from '@aph/logger';
import type { ConversationMessage, DualAttestationResult, ProofPayload } from '@aph/types';
import { canonicalize } from './canonical-json.js';
import { decodeEnvelope, encodeAad, encodeEnvelope, NONCE_SIZE } from './envelope.js';
import {
  DecryptionError,
  EncryptionError,
  IntegrityError,
  TAMPERED_ARTIFACT,
  WRONG_PASSWORD_OR_CORRUPTED,
} from './errors.js';
import {
  DEFAULT_KDF_ITERATIONS,
  MAX_KDF_ITERATIONS,
  MIN_KDF_ITERATIONS,
  SALT_SIZE,
  derivePasswordKey,
  isAcceptedIterationCount,
} from './key-derivation.js';
import { proofPayloadSchema } from './payload-schema.js';
import { ProofStateMachine, type TransitionListener } from './state-machine.js';

const log = createLogger('proof-engine');

export const PAYLOAD_VERSION = '1.0';
export const DEFAULT_MIN_PASSWORD_LENGTH = 8;
export const PROOF_FILE_EXTENSION = '.attestproof';

export interface ProofEngineOptions {
  readonly iterations?: number;
  readonly minPasswordLength?: number;
  readonly generator?: string;
  readonly onTransition?: TransitionListener;
  readonly now?: () => Date;
}

export interface GenerateProofInput {
  readonly transcript: readonly ConversationMessage[];
  readonly attestation: DualAttestationResult;
  readonly password: string;
}

export interface GeneratedProof {
  readonly bytes: Uint8Array;
  readonly filename: string;
  readonly payload: ProofPayload;
}

const pad = (n: number) => String(n).padStart(2, '0');

/** `proof_YYYYMMDD_HHMMSS.attestproof`, in UTC. */
export function proofFilename(date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `proof_${day}_${time}${PROOF_FILE_EXTENSION}`;
}

/**
 * Seals a transcript and its dual attestation into a password-encrypted
 * `.attestproof` artifact, and opens such artifacts again.
 */
export class ProofEngine {
  private readonly iterations: number;
  private readonly minPasswordLength: number;
  private readonly generator: string;
  private readonly now: () => Date;

  constructor(private readonly options: ProofEngineOptions = {}) {
    this.iterations = options.iterations ?? DEFAULT_KDF_ITERATIONS;
    if (!isAcceptedIterationCount(this.iterations)) {
      throw new RangeError(`KDF iterations must be between ${MIN_KDF_ITERATIONS} and ${MAX_KDF_ITERATIONS}`);
    }
    this.minPasswordLength = options.minPasswordLength ?? DEFAULT_MIN_PASSWORD_LENGTH;
    this.generator = options.generator ?? 'attestation-proof-hub';
    this.now = options.now ?? (() => new Date());
  }

  /** Throws WeakPassword when the password has fewer code points than the configured minimum. */
  assertPassword(password: string): void {
    if ([...password].length < this.minPasswordLength) {
      throw new EncryptionError('WeakPassword', `Password must be at least ${this.minPasswordLength} characters`);
    }
  }

  async generate(input: GenerateProofInput): Promise<GeneratedProof> {
    const machine = this.machine('generation');
    try {
      this.assertPassword(input.password);

      const createdAt = this.now();
      const payload: ProofPayload = {
        version: PAYLOAD_VERSION,
        createdAt: createdAt.toISOString(),
        transcript: input.transcript,
        attestation: input.attestation,
        metadata: { generator: this.generator, proofType: 'dual_vm_attestation' },
      };

      machine.transition('Serializing');
      let plaintext: Uint8Array;
      try {
        plaintext = new TextEncoder().encode(canonicalize(payload));
      } catch (err) {
        throw new EncryptionError('SerializationFailure', 'Proof payload could not be serialized', { cause: err });
      }
      const integrityHash = sha256(plaintext);

      machine.transition('Encrypting');
      const salt = randomBytes(SALT_SIZE);
      const nonce = randomBytes(NONCE_SIZE);
      const key = await derivePasswordKey(input.password, salt, this.iterations);
      const header = { iterations: this.iterations, salt, nonce };

      const cipher = createCipheriv('aes-256-gcm', key, nonce);
      cipher.setAAD(encodeAad(header));
      const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
      const bytes = encodeEnvelope({ ...header, integrityHash, tag: cipher.getAuthTag(), ciphertext });
      key.fill(0);

      machine.transition('Written');
      log.info(
        { correlationId: input.attestation.correlationId, messages: input.transcript.length, bytes: bytes.length },
        'proof generated',
      );
      return { bytes, filename: proofFilename(createdAt), payload };
    } catch (err) {
      machine.reject();
      throw err;
    }
  }

  async verify(artifact: Uint8Array, password: string): Promise<ProofPayload> {
    const machine = this.machine('verification');
    try {
      const envelope = decodeEnvelope(artifact);

      machine.transition('Decrypting');
      const key = await derivePasswordKey(password, envelope.salt, envelope.iterations);
      let plaintext: Buffer;
      try {
        const decipher = createDecipheriv('aes-256-gcm', key, envelope.nonce);
        decipher.setAAD(envelope.aad);
        decipher.setAuthTag(envelope.tag);
        plaintext = Buffer.concat([decipher.update(envelope.ciphertext), decipher.final()]);
      } catch (err) {
        throw new DecryptionError('WrongPasswordOrCorrupted', WRONG_PASSWORD_OR_CORRUPTED, { cause: err });
      } finally {
        key.fill(0);
      }

      machine.transition('Verifying');
      if (!timingSafeEqual(sha256(plaintext), envelope.integrityHash)) {
        throw new IntegrityError('TamperedArtifact', TAMPERED_ARTIFACT);
      }

      let document: unknown;
      try {
        document = JSON.parse(plaintext.toString('utf8'));
      } catch (err) {
        throw new IntegrityError('TamperedArtifact', TAMPERED_ARTIFACT, { cause: err });
      }
      const parsed = proofPayloadSchema.safeParse(document);
      if (!parsed.success) {
        throw new IntegrityError('TamperedArtifact', TAMPERED_ARTIFACT, { cause: parsed.error });
      }

      machine.transition('Displayed');
      log.info({ correlationId: parsed.data.attestation.correlationId }, 'proof verified');
      return parsed.data;
    } catch (err) {
      machine.reject();
      throw err;
    }
  }

  private machine(flow: 'generation' | 'verification'): ProofStateMachine {
    return new ProofStateMachine(flow, (event) => {
      log.debug(event, 'proof state transition');
      this.options.onTransition?.(event);
    });
  }
}
