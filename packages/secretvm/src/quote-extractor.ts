import { ParseError } from '@aph/tee-core';

const PRE_BLOCK = /<pre[^>]*>([\s\S]*?)<\/pre>/gi;
const QUOTE_TEXTAREA = /id="quoteTextarea"[^>]*>\s*([0-9a-fA-F]+)\s*</;
const LONG_HEX_RUN = /[0-9a-fA-F]{2000,}/;

const MIN_PRE_QUOTE_LENGTH = 1000;

/**
 * Pull the hex quote out of a SecretVM attestation page.
 * Looks in `<pre>` blocks first, then the quote textarea, then any hex run of 2000+ chars.
 */
export function extractQuoteHex(html: string): string {
  for (const match of html.matchAll(PRE_BLOCK)) {
    const content = (match[1] ?? '').replace(/\s+/g, '');
    if (content.length >= MIN_PRE_QUOTE_LENGTH && /^[0-9a-fA-F]+$/.test(content)) {
      return content.toLowerCase();
    }
  }

  const textarea = QUOTE_TEXTAREA.exec(html)?.[1];
  if (textarea && textarea.length >= MIN_PRE_QUOTE_LENGTH) {
    return textarea.toLowerCase();
  }

  const run = LONG_HEX_RUN.exec(html)?.[0];
  if (run) return run.toLowerCase();

  throw new ParseError('UnknownFormat', 'No attestation quote found in the attestation page');
}
