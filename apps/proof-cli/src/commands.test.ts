import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { bytesToHex } from '@noble/hashes/utils';
import { ProofEngine } from '@aph/proof';
import { buildTdxQuote, deriveRegisters } from '@aph/tee-simulator';
import type { DualAttestationResult } from '@aph/types';
import { validateBaselineFile, verifyProofFile } from './commands.js';

const registers = deriveRegisters('secretgpt');
const otherRtmr2 = deriveRegisters('other').rtmr2;

function baselineEntry(overrides: Record<string, string> = {}) {
  const { mrtd, rtmr0, rtmr1, rtmr2, rtmr3 } = registers;
  return { mrtd, rtmr0, rtmr1, rtmr2, rtmr3, ...overrides };
}

const attestation: DualAttestationResult = {
  correlationId: 'corr-1',
  self: {
    vmIdentity: 'secretgpt',
    status: 'unreachable',
    error: { stage: 'fetch', kind: 'EndpointUnreachable', message: 'Attestation endpoint is unreachable' },
  },
  peer: {
    vmIdentity: 'secretai',
    status: 'unknown',
    error: { stage: 'parse', kind: 'TruncatedQuote', message: 'Quote is 10 bytes, shorter than the 48-byte header' },
  },
  overallVerified: false,
  timestamp: 1_700_000_000_000,
  verifiedAt: null,
};

describe('proof-cli commands', () => {
  let dir: string;
  let quotePath: string;
  let baselinesPath: string;
  let mismatchedBaselinesPath: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'proof-cli-'));
    quotePath = join(dir, 'quote.hex');
    baselinesPath = join(dir, 'baselines.json');
    mismatchedBaselinesPath = join(dir, 'mismatched.json');
    await writeFile(quotePath, `${bytesToHex(buildTdxQuote(registers))}\n`);
    await writeFile(baselinesPath, JSON.stringify({ secretgpt: baselineEntry() }));
    await writeFile(mismatchedBaselinesPath, JSON.stringify({ secretgpt: baselineEntry({ rtmr2: otherRtmr2 }) }));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('validateBaselineFile', () => {
    it('passes a quote that matches its baseline', async () => {
      const result = await validateBaselineFile(quotePath, 'secretgpt', baselinesPath);

      expect(result.exitCode).toBe(0);
      expect(result.lines).toEqual([
        `  ok   mrtd       ${registers.mrtd}`,
        `  ok   rtmr0      ${registers.rtmr0}`,
        `  ok   rtmr1      ${registers.rtmr1}`,
        `  ok   rtmr2      ${registers.rtmr2}`,
        `  ok   rtmr3      ${registers.rtmr3}`,
        'secretgpt: PASSED',
      ]);
    });

    it('exits 1 and shows the expected value on a mismatch', async () => {
      const result = await validateBaselineFile(quotePath, 'secretgpt', mismatchedBaselinesPath);

      expect(result.exitCode).toBe(1);
      expect(result.lines[3]).toBe(`  FAIL rtmr2      ${registers.rtmr2}\n       expected   ${otherRtmr2}`);
      expect(result.lines[5]).toBe('FAILED: secretgpt does not match its baseline: rtmr2');
    });

    it('exits 1 when the VM has no baseline', async () => {
      const result = await validateBaselineFile(quotePath, 'ghost', baselinesPath);

      expect(result.exitCode).toBe(1);
      expect(result.lines[0]).toBe(`  FAIL mrtd       ${registers.mrtd}`);
      expect(result.lines[5]).toBe('FAILED: No baseline configured for ghost');
    });

    it('exits 2 on an unparseable quote', async () => {
      const truncated = join(dir, 'truncated.hex');
      await writeFile(truncated, 'abcd');

      const result = await validateBaselineFile(truncated, 'secretgpt', baselinesPath);

      expect(result).toEqual({
        exitCode: 2,
        lines: ['TruncatedQuote: Quote is 2 bytes, shorter than the 48-byte header'],
      });
    });

    it('exits 2 when the quote file is missing', async () => {
      const missing = join(dir, 'missing.hex');
      expect(await validateBaselineFile(missing, 'secretgpt', baselinesPath)).toEqual({
        exitCode: 2,
        lines: [`Could not read ${missing}`],
      });
    });
  });

  describe('verifyProofFile', () => {
    let proofPath: string;

    beforeAll(async () => {
      const engine = new ProofEngine({ iterations: 1000, now: () => new Date('2026-01-02T03:04:05.000Z') });
      const proof = await engine.generate({
        transcript: [{ role: 'user', content: 'hi' }],
        attestation,
        password: 'correct-horse',
      });
      proofPath = join(dir, proof.filename);
      await writeFile(proofPath, proof.bytes);
    });

    it('prints the proof summary for the right password', async () => {
      const result = await verifyProofFile(proofPath, 'correct-horse');

      expect(result).toEqual({
        exitCode: 0,
        lines: [
          'Proof verified',
          '  Created:     2026-01-02T03:04:05.000Z',
          '  Generator:   attestation-proof-hub',
          '  Messages:    1',
          '  Attestation: NOT fully verified',
          '  secretgpt (self): unreachable (EndpointUnreachable)',
          '  secretai (peer): unknown (TruncatedQuote)',
        ],
      });
    });

    it('exits 1 with the generic message for a wrong password', async () => {
      expect(await verifyProofFile(proofPath, 'wrong-password')).toEqual({
        exitCode: 1,
        lines: ['Verification failed: Wrong password or corrupted file'],
      });
    });

    it('exits 1 for a file that is not a proof', async () => {
      expect(await verifyProofFile(quotePath, 'correct-horse')).toEqual({
        exitCode: 1,
        lines: ['Verification failed: Unsupported proof file format'],
      });
    });
  });
});
