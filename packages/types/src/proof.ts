import type { DualAttestationResult } from './attestation.js';

export type ConversationRole = 'user' | 'assistant' | 'system';

export interface ConversationMessage {
  readonly role: ConversationRole;
  readonly content: string;
  readonly timestamp?: string;
}

export interface ProofMetadata {
  readonly generator: string;
  readonly proofType: 'dual_vm_attestation';
}

/** Plaintext sealed inside a `.attestproof` artifact. */
export interface ProofPayload {
  readonly version: string;
  readonly createdAt: string;
  readonly transcript: readonly ConversationMessage[];
  readonly attestation: DualAttestationResult;
  readonly metadata: ProofMetadata;
}

export type ProofGenerationState = 'Collecting' | 'Serializing' | 'Encrypting' | 'Written';
export type ProofVerificationState = 'Reading' | 'Decrypting' | 'Verifying' | 'Displayed';
export type ProofState = ProofGenerationState | ProofVerificationState | 'Rejected';
