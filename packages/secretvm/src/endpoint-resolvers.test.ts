import { describe, it, expect, vi } from 'vitest';
import type { VmConfig } from '@aph/types';
import {
  configuredEndpoint,
  defaultResolvers,
  externalIpResolver,
  gatewayHostResolver,
  resolveEndpoint,
  type DiscoveryOptions,
} from './endpoint-resolvers.js';

const self: VmConfig = {
  identity: 'secretgpt',
  role: 'self',
  parseStrategy: { kind: 'byte-offset' },
  timeoutMs: 1_000,
};
const peer: VmConfig = { ...self, identity: 'secretai', role: 'peer' };

function discovery(overrides: Partial<DiscoveryOptions> = {}): DiscoveryOptions {
  return {
    port: 29343,
    path: '/cpu.html',
    gatewayHostname: 'host.docker.internal',
    externalIpServices: ['https://ip-one.test', 'https://ip-two.test'],
    lookup: async () => {
      throw new Error('ENOTFOUND');
    },
    fetch: vi.fn<typeof fetch>(async () => new Response('', { status: 500 })),
    ...overrides,
  };
}

describe('endpoint resolvers', () => {
  it('should prefer the configured endpoint', async () => {
    const vm = { ...self, endpoint: 'https://vm.test:29343/cpu.html' };

    await expect(configuredEndpoint(vm)).resolves.toBe('https://vm.test:29343/cpu.html');
    await expect(resolveEndpoint(vm, defaultResolvers(discovery()))).resolves.toBe('https://vm.test:29343/cpu.html');
  });

  it('should build the page URL from the gateway host address', async () => {
    const lookup = vi.fn(async () => '10.0.4.7');
    const resolver = gatewayHostResolver(discovery({ lookup }));

    await expect(resolver(self)).resolves.toBe('https://10.0.4.7:29343/cpu.html');
    expect(lookup).toHaveBeenCalledWith('host.docker.internal');
  });

  it('should skip loopback gateway addresses', async () => {
    const resolver = gatewayHostResolver(discovery({ lookup: async () => '127.0.0.1' }));

    await expect(resolver(self)).resolves.toBeNull();
  });

  it('should try external IP services in order', async () => {
    const fetchFn = vi.fn<typeof fetch>(async (input) =>
      String(input) === 'https://ip-one.test'
        ? new Response('not an ip', { status: 200 })
        : new Response('203.0.113.9\n', { status: 200 }),
    );
    const resolver = externalIpResolver(discovery({ fetch: fetchFn }));

    await expect(resolver(self)).resolves.toBe('https://203.0.113.9:29343/cpu.html');
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('should not discover endpoints for the peer VM', async () => {
    const lookup = vi.fn(async () => '10.0.4.7');
    const resolvers = defaultResolvers(discovery({ lookup }));

    await expect(resolveEndpoint(peer, resolvers)).rejects.toMatchObject({
      kind: 'EndpointUnreachable',
      message: 'No attestation endpoint could be resolved for secretai',
    });
    expect(lookup).not.toHaveBeenCalled();
  });

  it('should fail when every resolver declines', async () => {
    await expect(resolveEndpoint(self, defaultResolvers(discovery()))).rejects.toMatchObject({
      name: 'FetchError',
      kind: 'EndpointUnreachable',
    });
  });
});
