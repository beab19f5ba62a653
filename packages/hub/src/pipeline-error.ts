import { isHubError } from '@aph/tee-core';
import type { AttestationStage, ErrorSlot } from '@aph/types';

/** Failure of one attestation stage for one VM; the stage error travels in `cause`. */
export class PipelineError extends Error {
  override readonly name = 'PipelineError';

  constructor(
    readonly vmIdentity: string,
    readonly stage: AttestationStage,
    options: { cause: unknown },
  ) {
    super(`Attestation ${stage} stage failed for ${vmIdentity}`, options);
  }
}

/**
 * Convert any pipeline failure into a result slot. Only messages authored by
 * the error taxonomy are passed through; anything else becomes `Internal`.
 */
export function toErrorSlot(vmIdentity: string, err: unknown): ErrorSlot {
  const stage = err instanceof PipelineError ? err.stage : 'fetch';
  const cause = err instanceof PipelineError ? err.cause : err;

  if (isHubError(cause)) {
    return {
      vmIdentity,
      status: cause.category === 'fetch' ? 'unreachable' : 'unknown',
      error: { stage, kind: cause.kind, message: cause.message },
    };
  }
  return {
    vmIdentity,
    status: 'unknown',
    error: { stage, kind: 'Internal', message: 'Attestation failed unexpectedly' },
  };
}
