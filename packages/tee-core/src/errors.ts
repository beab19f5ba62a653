/**
 * Error taxonomy for the attestation pipeline.
 * Messages are authored here and are safe to return to untrusted callers;
 * low-level causes travel in `cause` for logging only.
 */
export abstract class HubError<K extends string = string> extends Error {
  abstract readonly category: 'parse' | 'validation' | 'fetch';

  constructor(
    readonly kind: K,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type ParseErrorKind = 'TruncatedQuote' | 'UnknownFormat' | 'ChecksumMismatch';

export class ParseError extends HubError<ParseErrorKind> {
  override readonly name = 'ParseError';
  readonly category = 'parse' as const;
}

export type ValidationErrorKind = 'NoBaselineConfigured' | 'RegisterMismatch' | 'InvalidBaseline';

export class ValidationError extends HubError<ValidationErrorKind> {
  override readonly name = 'ValidationError';
  readonly category = 'validation' as const;
}

export type FetchErrorKind = 'EndpointUnreachable' | 'TLSError' | 'UnexpectedStatus';

export class FetchError extends HubError<FetchErrorKind> {
  override readonly name = 'FetchError';
  readonly category = 'fetch' as const;
}

export function isHubError(err: unknown): err is HubError {
  return err instanceof HubError;
}
