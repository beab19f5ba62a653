import http from 'node:http';
import https from 'node:https';
import { TLSSocket } from 'node:tls';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import { createLogger } from '@aph/logger';
import { FetchError, ParseError, type FetchedQuote, type IQuoteSource } from '@aph/tee-core';
import type { VmConfig } from '@aph/types';
import { resolveEndpoint, type EndpointResolver } from './endpoint-resolvers.js';
import { extractQuoteHex } from './quote-extractor.js';

const log = createLogger('secretvm-fetcher');

const DEFAULT_MAX_PAGE_BYTES = 4 * 1024 * 1024;

const TLS_ERROR_CODES = new Set([
  'EPROTO',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'ERR_TLS_CERT_ALTNAME_INVALID',
]);

export interface AttestationPage {
  readonly status: number;
  readonly body: string;
  /** SHA-256 of the peer certificate DER; empty over plain http */
  readonly certificateFingerprint: string;
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Map a low-level request failure onto the fetch error taxonomy. */
export function classifyRequestError(err: unknown, endpoint: string): FetchError {
  if (err instanceof FetchError) return err;

  const code = errorCode(err);
  if (
    code !== undefined &&
    (TLS_ERROR_CODES.has(code) || code.startsWith('ERR_TLS_') || code.startsWith('ERR_SSL_') || code.startsWith('CERT_'))
  ) {
    return new FetchError('TLSError', `TLS handshake with ${endpoint} failed`, { cause: err });
  }
  return new FetchError('EndpointUnreachable', `Attestation endpoint ${endpoint} is unreachable`, { cause: err });
}

function peerFingerprint(socket: unknown): string {
  if (!(socket instanceof TLSSocket)) return '';
  const cert = socket.getPeerCertificate();
  return cert.raw ? bytesToHex(sha256(cert.raw)) : '';
}

/**
 * GET an attestation page. Certificates are not CA-validated: the page is
 * served with a self-signed certificate and trust comes from the quote.
 */
export function requestAttestationPage(
  endpoint: string,
  timeoutMs: number,
  signal?: AbortSignal,
  maxBytes: number = DEFAULT_MAX_PAGE_BYTES,
): Promise<AttestationPage> {
  return new Promise((resolve, reject) => {
    let url: URL;
    try {
      url = new URL(endpoint);
    } catch (err) {
      reject(new FetchError('EndpointUnreachable', `Attestation endpoint ${endpoint} is not a valid URL`, { cause: err }));
      return;
    }

    const onResponse = (res: http.IncomingMessage) => {
      const certificateFingerprint = peerFingerprint(res.socket);
      const status = res.statusCode ?? 0;
      if (status !== 200) {
        res.resume();
        reject(new FetchError('UnexpectedStatus', `Attestation endpoint ${endpoint} returned ${status}`));
        return;
      }

      const chunks: Buffer[] = [];
      let received = 0;
      res.on('data', (chunk: Buffer) => {
        received += chunk.length;
        if (received > maxBytes) {
          res.destroy(new FetchError('UnexpectedStatus', `Attestation page from ${endpoint} exceeds ${maxBytes} bytes`));
          return;
        }
        chunks.push(chunk);
      });
      res.on('end', () => {
        resolve({ status, body: Buffer.concat(chunks).toString('utf8'), certificateFingerprint });
      });
      res.on('error', (err) => reject(classifyRequestError(err, endpoint)));
    };

    let req: http.ClientRequest;
    if (url.protocol === 'https:') {
      req = https.get(url, { rejectUnauthorized: false, timeout: timeoutMs, signal }, onResponse);
    } else if (url.protocol === 'http:') {
      req = http.get(url, { timeout: timeoutMs, signal }, onResponse);
    } else {
      reject(new FetchError('EndpointUnreachable', `Unsupported attestation endpoint protocol ${url.protocol}`));
      return;
    }

    req.on('timeout', () => {
      req.destroy(new FetchError('EndpointUnreachable', `Attestation endpoint ${endpoint} timed out after ${timeoutMs}ms`));
    });
    req.on('error', (err) => reject(classifyRequestError(err, endpoint)));
  });
}

export interface SecretVmQuoteSourceOptions {
  readonly resolvers: readonly EndpointResolver[];
  readonly maxPageBytes?: number;
}

/** Fetches quotes from SecretVM attestation pages (`https://<vm>:29343/cpu.html`). */
export class SecretVmQuoteSource implements IQuoteSource {
  readonly provider = 'secretvm' as const;

  constructor(private readonly options: SecretVmQuoteSourceOptions) {}

  async fetchQuote(vm: VmConfig, signal?: AbortSignal): Promise<FetchedQuote> {
    const endpoint = await resolveEndpoint(vm, this.options.resolvers);
    log.debug({ vmIdentity: vm.identity, stage: 'fetch', endpoint }, 'requesting attestation page');

    const page = await requestAttestationPage(endpoint, vm.timeoutMs, signal, this.options.maxPageBytes);
    const hex = extractQuoteHex(page.body);
    if (hex.length % 2 !== 0) {
      throw new ParseError('UnknownFormat', 'Attestation page quote has an odd number of hex digits');
    }

    log.info(
      { vmIdentity: vm.identity, stage: 'fetch', quoteBytes: hex.length / 2, tls: page.certificateFingerprint !== '' },
      'attestation quote fetched',
    );
    return { quote: hexToBytes(hex), certificateFingerprint: page.certificateFingerprint, endpoint };
  }
}
