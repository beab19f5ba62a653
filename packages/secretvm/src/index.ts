export { SecretVmQuoteSource, requestAttestationPage, classifyRequestError } from './https-quote-source.js';
export type { SecretVmQuoteSourceOptions, AttestationPage } from './https-quote-source.js';
export {
  configuredEndpoint,
  gatewayHostResolver,
  externalIpResolver,
  defaultResolvers,
  resolveEndpoint,
  DEFAULT_EXTERNAL_IP_SERVICES,
} from './endpoint-resolvers.js';
export type { EndpointResolver, HostLookup, DiscoveryOptions } from './endpoint-resolvers.js';
export { extractQuoteHex } from './quote-extractor.js';
