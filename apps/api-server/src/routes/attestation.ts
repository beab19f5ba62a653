import { Hono } from 'hono';
import { z } from 'zod';
import { PipelineError, UnknownVmError, toErrorSlot } from '@aph/hub';
import { isHubError } from '@aph/tee-core';
import type { HubServices } from '../hub-bridge.js';

const RefreshQuerySchema = z.object({
  refresh: z.enum(['true', 'false']).optional(),
});

const BatchAttestationSchema = z.object({
  vmIdentities: z.array(z.string().min(1)).min(1).max(32),
  correlationId: z.string().min(1).max(128).optional(),
  refresh: z.boolean().optional(),
});

type FailureStatus = 404 | 422 | 500 | 502;

function failureStatus(err: unknown): FailureStatus {
  if (err instanceof UnknownVmError) return 404;
  const cause = err instanceof PipelineError ? err.cause : err;
  if (!isHubError(cause)) return 500;
  switch (cause.category) {
    case 'fetch':
      return 502;
    case 'parse':
      return 422;
    case 'validation':
      return 500;
  }
}

export function createAttestationRouter(hub: HubServices) {
  const router = new Hono();

  // GET /attestation/dual - Attest self and peer concurrently
  router.get('/dual', async (c) => {
    const parsed = RefreshQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
    }
    const result = await hub.coordinator.attestDual({ refresh: parsed.data.refresh === 'true' });
    return c.json(result);
  });

  // GET /attestation/all - Attest every configured VM
  router.get('/all', async (c) => {
    const parsed = RefreshQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
    }
    const results = await hub.coordinator.attestAll({ refresh: parsed.data.refresh === 'true' });
    return c.json({ results });
  });

  // POST /attestation/batch - Attest the named VMs concurrently
  router.post('/batch', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'Invalid JSON body' }, 400);
    }
    const parsed = BatchAttestationSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
    }

    const { vmIdentities, correlationId, refresh } = parsed.data;
    try {
      return c.json(await hub.coordinator.attestBatch(vmIdentities, { correlationId, refresh }));
    } catch (err) {
      if (err instanceof UnknownVmError) {
        return c.json({ error: err.message }, 404);
      }
      throw err;
    }
  });

  // GET /attestation/:vmIdentity - Verdict for one VM
  router.get('/:vmIdentity', async (c) => {
    const vmIdentity = c.req.param('vmIdentity');
    const parsed = RefreshQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
    }

    try {
      const { verdict, cached } = await hub.service.attest(vmIdentity, { refresh: parsed.data.refresh === 'true' });
      c.header('X-Cache', cached ? 'HIT' : 'MISS');
      return c.json(verdict);
    } catch (err) {
      if (err instanceof UnknownVmError) {
        return c.json({ error: err.message }, 404);
      }
      const slot = toErrorSlot(vmIdentity, err);
      return c.json({ vmIdentity, status: slot.status, error: slot.error }, failureStatus(err));
    }
  });

  return router;
}
