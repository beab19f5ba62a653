export {
  ProofEngine,
  proofFilename,
  PAYLOAD_VERSION,
  DEFAULT_MIN_PASSWORD_LENGTH,
  PROOF_FILE_EXTENSION,
  type ProofEngineOptions,
  type GenerateProofInput,
  type GeneratedProof,
} from './proof-engine.js';
export {
  ProofError,
  EncryptionError,
  DecryptionError,
  IntegrityError,
  isProofError,
  WRONG_PASSWORD_OR_CORRUPTED,
  TAMPERED_ARTIFACT,
  UNSUPPORTED_FORMAT,
  type EncryptionErrorKind,
  type DecryptionErrorKind,
  type IntegrityErrorKind,
} from './errors.js';
export { canonicalize } from './canonical-json.js';
export {
  derivePasswordKey,
  DEFAULT_KDF_ITERATIONS,
  MIN_KDF_ITERATIONS,
  MAX_KDF_ITERATIONS,
} from './key-derivation.js';
export { decodeEnvelope, encodeEnvelope, MAGIC, FORMAT_VERSION, HEADER_SIZE } from './envelope.js';
export {
  ProofStateMachine,
  InvalidTransitionError,
  canTransition,
  type ProofFlow,
  type TransitionEvent,
  type TransitionListener,
} from './state-machine.js';
export { proofPayloadSchema, transcriptSchema, conversationMessageSchema, dualAttestationSchema } from './payload-schema.js';
