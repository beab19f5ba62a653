import { lookup } from 'node:dns/promises';
import { isIPv4 } from 'node:net';
import { createLogger } from '@aph/logger';
import { FetchError } from '@aph/tee-core';
import type { VmConfig } from '@aph/types';

const log = createLogger('endpoint-resolver');

/** Returns an attestation page URL for the VM, or null to defer to the next resolver. */
export type EndpointResolver = (vm: VmConfig) => Promise<string | null>;

export type HostLookup = (hostname: string) => Promise<string>;

export const DEFAULT_EXTERNAL_IP_SERVICES = [
  'https://api.ipify.org',
  'https://ifconfig.me/ip',
  'https://icanhazip.com',
] as const;

export interface DiscoveryOptions {
  readonly port: number;
  readonly path: string;
  readonly gatewayHostname: string;
  readonly externalIpServices: readonly string[];
  readonly lookup?: HostLookup;
  readonly fetch?: typeof fetch;
  /** Per-request budget for each "what is my IP" service */
  readonly ipServiceTimeoutMs?: number;
}

const defaultLookup: HostLookup = async (hostname) => (await lookup(hostname, { family: 4 })).address;

function pageUrl(ip: string, options: DiscoveryOptions): string {
  const path = options.path.startsWith('/') ? options.path : `/${options.path}`;
  return `https://${ip}:${options.port}${path}`;
}

export const configuredEndpoint: EndpointResolver = async (vm) => vm.endpoint ?? null;

/** Resolve the container gateway host (host.docker.internal) to the VM's own address. */
export function gatewayHostResolver(options: DiscoveryOptions): EndpointResolver {
  const resolveHost = options.lookup ?? defaultLookup;

  return async (vm) => {
    if (vm.role !== 'self') return null;
    try {
      const ip = await resolveHost(options.gatewayHostname);
      if (!isIPv4(ip) || ip.startsWith('127.')) return null;
      return pageUrl(ip, options);
    } catch (err) {
      log.debug({ vmIdentity: vm.identity, stage: 'fetch', err }, `${options.gatewayHostname} did not resolve`);
      return null;
    }
  };
}

/** Ask external "what is my IP" services, in order, for the VM's public address. */
export function externalIpResolver(options: DiscoveryOptions): EndpointResolver {
  const fetchFn = options.fetch ?? fetch;
  const timeoutMs = options.ipServiceTimeoutMs ?? 5_000;

  return async (vm) => {
    if (vm.role !== 'self') return null;
    for (const service of options.externalIpServices) {
      try {
        const res = await fetchFn(service, { signal: AbortSignal.timeout(timeoutMs) });
        if (!res.ok) continue;
        const ip = (await res.text()).trim();
        if (isIPv4(ip)) return pageUrl(ip, options);
      } catch (err) {
        log.debug({ vmIdentity: vm.identity, stage: 'fetch', service, err }, 'external IP service failed');
      }
    }
    return null;
  };
}

export function defaultResolvers(options: DiscoveryOptions): EndpointResolver[] {
  return [configuredEndpoint, gatewayHostResolver(options), externalIpResolver(options)];
}

/** First non-null endpoint from the resolver chain. */
export async function resolveEndpoint(vm: VmConfig, resolvers: readonly EndpointResolver[]): Promise<string> {
  for (const resolve of resolvers) {
    const endpoint = await resolve(vm);
    if (endpoint) return endpoint;
  }
  throw new FetchError('EndpointUnreachable', `No attestation endpoint could be resolved for ${vm.identity}`);
}
