import { z } from 'zod';

const registerName = z.enum(['mrtd', 'rtmr0', 'rtmr1', 'rtmr2', 'rtmr3', 'reportData']);

const measurementsSchema = z.object({
  vmIdentity: z.string(),
  mrtd: z.string(),
  rtmr0: z.string(),
  rtmr1: z.string(),
  rtmr2: z.string(),
  rtmr3: z.string(),
  reportData: z.string(),
  certificateFingerprint: z.string(),
  timestamp: z.number(),
  parsingMethod: z.enum(['rest-delegate', 'byte-offset']),
  fallbackReason: z.string().optional(),
});

const verdictSchema = z.object({
  vmIdentity: z.string(),
  passed: z.boolean(),
  reason: z.enum(['no_baseline_configured', 'register_mismatch']).optional(),
  registers: z.array(
    z.object({
      register: registerName,
      expected: z.string().nullable(),
      actual: z.string().nullable(),
      matches: z.boolean(),
    }),
  ),
  mismatched: z.array(registerName),
  measurements: measurementsSchema,
  verifiedAt: z.number(),
});

const slotSchema = z.union([
  z.object({
    vmIdentity: z.string(),
    status: z.enum(['verified', 'failed']),
    verdict: verdictSchema,
    cached: z.boolean(),
  }),
  z.object({
    vmIdentity: z.string(),
    status: z.enum(['unreachable', 'unknown']),
    error: z.object({
      stage: z.enum(['fetch', 'parse', 'validate']),
      kind: z.string(),
      message: z.string(),
    }),
  }),
]);

export const dualAttestationSchema = z.object({
  correlationId: z.string(),
  self: slotSchema,
  peer: slotSchema,
  overallVerified: z.boolean(),
  timestamp: z.number(),
  verifiedAt: z.number().nullable(),
});

export const conversationMessageSchema = z.object({
  role: z.enum(['user', 'assistant', 'system']),
  content: z.string(),
  timestamp: z.string().optional(),
});

export const transcriptSchema = z.array(conversationMessageSchema);

export const proofPayloadSchema = z.object({
  version: z.string(),
  createdAt: z.string(),
  transcript: transcriptSchema,
  attestation: dualAttestationSchema,
  metadata: z.object({
    generator: z.string(),
    proofType: z.literal('dual_vm_attestation'),
  }),
});
