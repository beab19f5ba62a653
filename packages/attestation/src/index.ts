export { QuoteParser, type ParseQuoteInput, type QuoteParserOptions } from './quote-parser.js';
export { RestDelegateParser, DelegateUnavailableError, type DescribeOptions, type FetchFn } from './rest-parser.js';
export { readQuoteRegisters, firstDifference } from './byte-offset-parser.js';
export { decodeQuote, quoteToBase64 } from './quote-encoding.js';
export { BaselineRegistry, baselineFileSchema } from './baseline-registry.js';
export { BaselineValidator } from './baseline-validator.js';
