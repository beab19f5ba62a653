import type { VmConfig } from '@aph/types';

/** Raw quote as served by a VM's attestation endpoint. */
export interface FetchedQuote {
  readonly quote: Uint8Array;
  readonly certificateFingerprint: string;
  readonly endpoint: string;
}

/**
 * Source of raw attestation quotes.
 * Implementations are stateless per call; failures are thrown as FetchError or ParseError.
 */
export interface IQuoteSource {
  readonly provider: 'secretvm' | 'simulator';

  fetchQuote(vm: VmConfig, signal?: AbortSignal): Promise<FetchedQuote>;
}
