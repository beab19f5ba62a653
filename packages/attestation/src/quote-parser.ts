import { createLogger } from '@aph/logger';
import { ParseError, type QuoteRegisters } from '@aph/tee-core';
import type { MeasurementRegisterSet, ParseStrategy, ParsingMethod } from '@aph/types';
import { decodeQuote } from './quote-encoding.js';
import { firstDifference, readQuoteRegisters } from './byte-offset-parser.js';
import { RestDelegateParser, type FetchFn } from './rest-parser.js';

const log = createLogger('quote-parser');

export interface ParseQuoteInput {
  readonly vmIdentity: string;
  readonly quote: Uint8Array | string;
  readonly certificateFingerprint: string;
  readonly strategy: ParseStrategy;
}

export interface QuoteParserOptions {
  readonly fetch?: FetchFn;
  readonly now?: () => number;
}

/**
 * Turns a raw TDX quote into a MeasurementRegisterSet.
 *
 * `rest-delegate` asks the describing service first and falls back to the
 * byte layout on any service failure. When both reads are available they
 * must agree; disagreement is a ChecksumMismatch and is never retried.
 */
export class QuoteParser {
  private readonly delegate: RestDelegateParser;
  private readonly now: () => number;

  constructor(options: QuoteParserOptions = {}) {
    this.delegate = new RestDelegateParser(options.fetch);
    this.now = options.now ?? Date.now;
  }

  async parse(input: ParseQuoteInput): Promise<MeasurementRegisterSet> {
    const quote = decodeQuote(input.quote);
    const { strategy } = input;

    if (strategy.kind === 'byte-offset') {
      return this.toRegisterSet(input, readQuoteRegisters(quote), 'byte-offset');
    }

    let local: QuoteRegisters | undefined;
    let localError: ParseError | undefined;
    try {
      local = readQuoteRegisters(quote);
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      localError = err;
    }

    let described: QuoteRegisters;
    try {
      described = await this.delegate.describe(quote, strategy);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      log.warn({ vmIdentity: input.vmIdentity, stage: 'parse', reason }, 'falling back to byte-offset parsing');
      if (!local) {
        throw localError ?? new ParseError('UnknownFormat', 'Quote could not be parsed');
      }
      return this.toRegisterSet(input, local, 'byte-offset', reason);
    }

    if (local) {
      const field = firstDifference(local, described);
      if (field) {
        log.error({ vmIdentity: input.vmIdentity, stage: 'parse', field }, 'describing service disagrees with quote bytes');
        throw new ParseError('ChecksumMismatch', `Describing service reported a different ${field} than the quote carries`);
      }
    }

    return this.toRegisterSet(input, described, 'rest-delegate');
  }

  private toRegisterSet(
    input: ParseQuoteInput,
    registers: QuoteRegisters,
    parsingMethod: ParsingMethod,
    fallbackReason?: string,
  ): MeasurementRegisterSet {
    log.debug({ vmIdentity: input.vmIdentity, stage: 'parse', parsingMethod }, 'quote parsed');
    return {
      vmIdentity: input.vmIdentity,
      ...registers,
      certificateFingerprint: input.certificateFingerprint,
      timestamp: this.now(),
      parsingMethod,
      ...(fallbackReason !== undefined ? { fallbackReason } : {}),
    };
  }
}
