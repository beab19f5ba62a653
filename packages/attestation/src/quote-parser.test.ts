import { describe, it, expect, vi } from 'vitest';
import { buildTdxQuote, deriveRegisters } from '@aph/tee-simulator';
import type { ParseStrategy } from '@aph/types';
import { QuoteParser } from './quote-parser.js';
import type { FetchFn } from './rest-parser.js';

const registers = deriveRegisters('secretai');
const quote = buildTdxQuote(registers);
const restStrategy: ParseStrategy = {
  kind: 'rest-delegate',
  serviceUrl: 'https://describer.test/quote-parse',
  timeoutMs: 50,
};

function describedBody(overrides: Record<string, string> = {}) {
  return {
    quote: {
      mr_td: registers.mrtd,
      rtmr0: registers.rtmr0,
      rtmr1: registers.rtmr1,
      rtmr2: registers.rtmr2,
      rtmr3: registers.rtmr3,
      report_data: registers.reportData,
      ...overrides,
    },
  };
}

function respondWith(body: unknown, status = 200) {
  return vi.fn<FetchFn>(async () => new Response(JSON.stringify(body), { status }));
}

function input(strategy: ParseStrategy, raw: Uint8Array | string = quote) {
  return { vmIdentity: 'secretai', quote: raw, certificateFingerprint: 'ab'.repeat(32), strategy };
}

describe('QuoteParser', () => {
  it('should parse with the byte-offset strategy', async () => {
    const parser = new QuoteParser({ now: () => 1_700_000_000_000 });
    const result = await parser.parse(input({ kind: 'byte-offset' }));

    expect(result).toEqual({
      vmIdentity: 'secretai',
      ...registers,
      certificateFingerprint: 'ab'.repeat(32),
      timestamp: 1_700_000_000_000,
      parsingMethod: 'byte-offset',
    });
  });

  it('should parse through the describing service and post the quote as base64', async () => {
    const fetchFn = respondWith(describedBody({ mr_td: registers.mrtd.toUpperCase() }));
    const parser = new QuoteParser({ fetch: fetchFn });

    const result = await parser.parse(input(restStrategy));

    expect(result.parsingMethod).toBe('rest-delegate');
    expect(result.fallbackReason).toBeUndefined();
    expect(result.mrtd).toBe(registers.mrtd);

    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe('https://describer.test/quote-parse');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(JSON.stringify({ quote: Buffer.from(quote).toString('base64') }));
  });

  it('should fall back to byte-offset when the service returns an error status', async () => {
    const parser = new QuoteParser({ fetch: respondWith({ error: 'busy' }, 503) });
    const result = await parser.parse(input(restStrategy));

    expect(result.parsingMethod).toBe('byte-offset');
    expect(result.fallbackReason).toBe('describing service returned 503');
    expect(result.rtmr3).toBe(registers.rtmr3);
  });

  it('should fall back when the service is unreachable', async () => {
    const parser = new QuoteParser({
      fetch: vi.fn<FetchFn>(async () => {
        throw new TypeError('fetch failed');
      }),
    });
    const result = await parser.parse(input(restStrategy));

    expect(result.fallbackReason).toBe('describing service unreachable: fetch failed');
  });

  it('should fall back on an unexpected response schema', async () => {
    const parser = new QuoteParser({ fetch: respondWith({ quote: { rtmr0: 'zz' } }) });
    const result = await parser.parse(input(restStrategy));

    expect(result.parsingMethod).toBe('byte-offset');
    expect(result.fallbackReason).toMatch(/^describing service returned an unexpected schema/);
  });

  it('should fall back on malformed JSON', async () => {
    const parser = new QuoteParser({ fetch: vi.fn<FetchFn>(async () => new Response('<html>', { status: 200 })) });
    const result = await parser.parse(input(restStrategy));

    expect(result.fallbackReason).toBe('describing service returned malformed JSON');
  });

  it('should fall back when the service times out', async () => {
    const hanging = vi.fn<FetchFn>(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason));
        }),
    );
    const parser = new QuoteParser({ fetch: hanging });
    const result = await parser.parse(input(restStrategy));

    expect(result.parsingMethod).toBe('byte-offset');
    expect(result.fallbackReason).toBe('describing service timed out after 50ms');
  });

  it('should reject when the service disagrees with the quote bytes', async () => {
    const tampered = `${registers.rtmr2.slice(0, -1)}${registers.rtmr2.endsWith('0') ? '1' : '0'}`;
    const parser = new QuoteParser({ fetch: respondWith(describedBody({ rtmr2: tampered })) });

    await expect(parser.parse(input(restStrategy))).rejects.toMatchObject({
      name: 'ParseError',
      kind: 'ChecksumMismatch',
    });
  });

  it('should surface the byte-offset error when both strategies fail', async () => {
    const parser = new QuoteParser({ fetch: respondWith({}, 500) });

    await expect(parser.parse(input(restStrategy, quote.subarray(0, 100)))).rejects.toMatchObject({
      kind: 'TruncatedQuote',
    });
  });

  it('should reject undecodable quote text before contacting the service', async () => {
    const fetchFn = respondWith(describedBody());
    const parser = new QuoteParser({ fetch: fetchFn });

    await expect(parser.parse(input(restStrategy, '%%%'))).rejects.toMatchObject({ kind: 'UnknownFormat' });
    expect(fetchFn).not.toHaveBeenCalled();
  });
});
