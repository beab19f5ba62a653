import { readFile } from 'node:fs/promises';
import { BaselineRegistry, BaselineValidator, QuoteParser } from '@aph/attestation';
import { ProofEngine, isProofError } from '@aph/proof';
import { ValidationError, isHubError } from '@aph/tee-core';
import type { AttestationSlot, ProofPayload, ValidationVerdict } from '@aph/types';

export interface CommandResult {
  readonly exitCode: 0 | 1 | 2;
  readonly lines: readonly string[];
}

function describeSlot(role: string, slot: AttestationSlot): string {
  const detail = 'error' in slot ? ` (${slot.error.kind})` : '';
  return `  ${slot.vmIdentity} (${role}): ${slot.status}${detail}`;
}

export function summarizeProof(payload: ProofPayload): string[] {
  const { attestation } = payload;
  return [
    'Proof verified',
    `  Created:     ${payload.createdAt}`,
    `  Generator:   ${payload.metadata.generator}`,
    `  Messages:    ${payload.transcript.length}`,
    `  Attestation: ${attestation.overallVerified ? 'both VMs verified' : 'NOT fully verified'}`,
    describeSlot('self', attestation.self),
    describeSlot('peer', attestation.peer),
  ];
}

/** Decrypt a `.attestproof` file offline. Exit 1 on a rejected artifact, 2 when the file cannot be read. */
export async function verifyProofFile(path: string, password: string, engine = new ProofEngine()): Promise<CommandResult> {
  let bytes: Uint8Array;
  try {
    bytes = new Uint8Array(await readFile(path));
  } catch {
    return { exitCode: 2, lines: [`Could not read ${path}`] };
  }

  try {
    return { exitCode: 0, lines: summarizeProof(await engine.verify(bytes, password)) };
  } catch (err) {
    if (isProofError(err)) {
      return { exitCode: 1, lines: [`Verification failed: ${err.message}`] };
    }
    throw err;
  }
}

/** One line per compared register; mismatches also show the expected value. */
export function formatVerdict(verdict: ValidationVerdict): string[] {
  return verdict.registers.map((r) => {
    const mark = r.matches ? 'ok  ' : 'FAIL';
    const line = `  ${mark} ${r.register.padEnd(10)} ${r.actual ?? '-'}`;
    return r.matches || r.expected === null ? line : `${line}\n       expected   ${r.expected}`;
  });
}

/**
 * Parse a hex or base64 quote file with the byte-offset layout and compare it
 * against the VM's baseline. Exit 1 on mismatch, 2 when the inputs are unusable.
 */
export async function validateBaselineFile(
  quotePath: string,
  vmIdentity: string,
  baselinesPath: string,
): Promise<CommandResult> {
  let quote: string;
  try {
    quote = await readFile(quotePath, 'utf8');
  } catch {
    return { exitCode: 2, lines: [`Could not read ${quotePath}`] };
  }

  try {
    const registry = await BaselineRegistry.fromFile(baselinesPath);
    const measurements = await new QuoteParser().parse({
      vmIdentity,
      quote,
      certificateFingerprint: '',
      strategy: { kind: 'byte-offset' },
    });
    const validator = new BaselineValidator(registry);
    const verdict = validator.validate(measurements);
    const lines = formatVerdict(verdict);
    try {
      validator.assertVerified(verdict);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      return { exitCode: 1, lines: [...lines, `FAILED: ${err.message}`] };
    }
    return { exitCode: 0, lines: [...lines, `${verdict.vmIdentity}: PASSED`] };
  } catch (err) {
    if (isHubError(err)) {
      return { exitCode: 2, lines: [`${err.kind}: ${err.message}`] };
    }
    throw err;
  }
}
