export { SimulatedQuoteSource, type SimulatedVm } from './simulated-quote-source.js';
export { buildTdxQuote, flipBit, type BuildQuoteOptions } from './quote-builder.js';
export { deriveRegisters } from './measurement.js';
