export type { FetchedQuote, IQuoteSource } from './quote-source.js';
export {
  HubError,
  ParseError,
  ValidationError,
  FetchError,
  isHubError,
  type ParseErrorKind,
  type ValidationErrorKind,
  type FetchErrorKind,
} from './errors.js';
export {
  TDX_HEADER,
  TDX_TEE_TYPE,
  SUPPORTED_QUOTE_VERSIONS,
  V4_BODY_OFFSET,
  V5_BODY_DESCRIPTOR,
  V5_BODY_SIZES,
  TD_REPORT_BODY_SIZE,
  TD_REPORT_FIELDS,
  QUOTE_FIELDS,
  REGISTER_HEX_LENGTH,
  REPORT_DATA_HEX_LENGTH,
  type QuoteVersion,
  type FieldSpan,
  type QuoteRegisters,
  type QuoteField,
} from './quote-layout.js';
