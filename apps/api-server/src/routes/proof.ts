import { Hono } from 'hono';
import { z } from 'zod';
import { EncryptionError, isProofError, transcriptSchema } from '@aph/proof';
import type { ConversationMessage } from '@aph/types';
import type { HubServices } from '../hub-bridge.js';

const GenerateProofSchema = z
  .object({
    password: z.string().min(1),
    question: z.string().min(1).optional(),
    answer: z.string().min(1).optional(),
    transcript: z.string().min(1).optional(),
  })
  .refine((body) => body.transcript !== undefined || (body.question !== undefined && body.answer !== undefined), {
    message: 'Provide either transcript or both question and answer',
  });

function parseTranscript(raw: string): ConversationMessage[] | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = transcriptSchema.min(1).safeParse(json);
  return parsed.success ? parsed.data : null;
}

export function createProofRouter(hub: HubServices) {
  const router = new Hono();

  // POST /proof/generate - Seal a transcript with a fresh dual attestation
  router.post('/generate', async (c) => {
    const parsed = GenerateProofSchema.safeParse(await c.req.parseBody());
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
    }
    const { password, question, answer, transcript: rawTranscript } = parsed.data;

    const transcript =
      rawTranscript !== undefined
        ? parseTranscript(rawTranscript)
        : [
            { role: 'user' as const, content: question ?? '' },
            { role: 'assistant' as const, content: answer ?? '' },
          ];
    if (!transcript) {
      return c.json({ error: 'Invalid request', details: 'transcript must be a non-empty JSON array of messages' }, 400);
    }

    try {
      hub.proofEngine.assertPassword(password);
    } catch (err) {
      if (err instanceof EncryptionError) {
        return c.json({ error: err.message }, 400);
      }
      throw err;
    }

    const attestation = await hub.coordinator.attestDual();
    try {
      const proof = await hub.proofEngine.generate({ transcript, attestation, password });
      return new Response(proof.bytes, {
        headers: {
          'Content-Type': 'application/octet-stream',
          'Content-Disposition': `attachment; filename="${proof.filename}"`,
          'X-Attestation-Verified': String(attestation.overallVerified),
        },
      });
    } catch (err) {
      if (err instanceof EncryptionError && err.kind === 'WeakPassword') {
        return c.json({ error: err.message }, 400);
      }
      throw err;
    }
  });

  // POST /proof/verify - Open an uploaded .attestproof artifact
  router.post('/verify', async (c) => {
    const body = await c.req.parseBody();
    const file = body['file'];
    const password = body['password'];
    if (!(file instanceof Blob) || typeof password !== 'string' || password.length === 0) {
      return c.json({ error: 'Invalid request', details: 'file and password are required' }, 400);
    }

    try {
      const proofData = await hub.proofEngine.verify(new Uint8Array(await file.arrayBuffer()), password);
      return c.json({ verified: true, proofData });
    } catch (err) {
      if (isProofError(err)) {
        return c.json({ verified: false, error: err.message });
      }
      throw err;
    }
  });

  return router;
}
