import { z } from 'zod';
import type { QuoteRegisters } from '@aph/tee-core';
import { quoteToBase64 } from './quote-encoding.js';

export type FetchFn = typeof fetch;

export interface DescribeOptions {
  readonly serviceUrl: string;
  readonly timeoutMs: number;
}

/** Raised for any describing-service failure that should trigger the byte-offset fallback. */
export class DelegateUnavailableError extends Error {
  override readonly name = 'DelegateUnavailableError';
}

const hexField = (length: number) =>
  z
    .string()
    .transform((v) => v.trim().replace(/^0x/i, '').toLowerCase())
    .pipe(z.string().regex(new RegExp(`^[0-9a-f]{${length}}$`), `expected ${length} hex chars`));

const register = hexField(96);

const describedQuoteSchema = z.object({
  quote: z
    .object({
      mr_td: register.optional(),
      mrtd: register.optional(),
      rtmr0: register,
      rtmr1: register,
      rtmr2: register,
      rtmr3: register,
      report_data: hexField(128),
    })
    .refine((q) => q.mr_td !== undefined || q.mrtd !== undefined, { message: 'missing mr_td' }),
});

function describeFailure(err: unknown, timeoutMs: number): string {
  if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
    return `describing service timed out after ${timeoutMs}ms`;
  }
  return `describing service unreachable: ${err instanceof Error ? err.message : String(err)}`;
}

/**
 * Client for a DCAP quote describing service (POST `{ quote: base64 }`,
 * response `{ quote: { mr_td, rtmr0..3, report_data } }`).
 */
export class RestDelegateParser {
  constructor(private readonly fetchFn: FetchFn = fetch) {}

  async describe(quote: Uint8Array, options: DescribeOptions): Promise<QuoteRegisters> {
    let res: Response;
    try {
      res = await this.fetchFn(options.serviceUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ quote: quoteToBase64(quote) }),
        signal: AbortSignal.timeout(options.timeoutMs),
      });
    } catch (err) {
      throw new DelegateUnavailableError(describeFailure(err, options.timeoutMs), { cause: err });
    }

    if (!res.ok) {
      throw new DelegateUnavailableError(`describing service returned ${res.status}`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new DelegateUnavailableError('describing service returned malformed JSON', { cause: err });
    }

    const parsed = describedQuoteSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown';
      throw new DelegateUnavailableError(`describing service returned an unexpected schema (${where})`);
    }

    const q = parsed.data.quote;
    return {
      mrtd: q.mr_td ?? q.mrtd ?? '',
      rtmr0: q.rtmr0,
      rtmr1: q.rtmr1,
      rtmr2: q.rtmr2,
      rtmr3: q.rtmr3,
      reportData: q.report_data,
    };
  }
}
