import { describe, it, expect } from 'vitest';
import { ConfigError, envSuffix, loadConfig } from './config.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.teeProvider).toBe('secretvm');
    expect(config.vms).toEqual([
      {
        identity: 'secretgpt',
        role: 'self',
        parseStrategy: {
          kind: 'rest-delegate',
          serviceUrl: 'https://pccs.scrtlabs.com/dcap-tools/quote-parse',
          timeoutMs: 10_000,
        },
        timeoutMs: 30_000,
      },
      {
        identity: 'secretai',
        role: 'peer',
        parseStrategy: {
          kind: 'rest-delegate',
          serviceUrl: 'https://pccs.scrtlabs.com/dcap-tools/quote-parse',
          timeoutMs: 10_000,
        },
        timeoutMs: 30_000,
      },
    ]);
    expect(config.discovery).toEqual({
      port: 29343,
      path: '/cpu.html',
      gatewayHostname: 'host.docker.internal',
      externalIpServices: ['https://api.ipify.org', 'https://ifconfig.me/ip', 'https://icanhazip.com'],
    });
    expect(config.cache).toEqual({ ttlMs: 300_000, maxSize: 1000, sweepMs: 0 });
    expect(config.proof).toEqual({ iterations: 600_000, minPasswordLength: 8 });
    expect(config.baselinesPath).toBe('config/baselines.json');
  });

  it('reads per-VM endpoint and strategy overrides', () => {
    const config = loadConfig({
      TEE_PROVIDER: 'simulator',
      ATTESTATION_ENDPOINT_SECRETAI: 'https://10.0.0.5:29343/cpu.html',
      QUOTE_PARSE_STRATEGY_SECRETAI: 'byte-offset',
      CACHE_TTL_SECONDS: '60',
      EXTERNAL_IP_SERVICES: 'https://ip.example, https://ip2.example',
    });

    expect(config.teeProvider).toBe('simulator');
    expect(config.vms[1]).toEqual({
      identity: 'secretai',
      role: 'peer',
      endpoint: 'https://10.0.0.5:29343/cpu.html',
      parseStrategy: { kind: 'byte-offset' },
      timeoutMs: 30_000,
    });
    expect(config.vms[0]?.parseStrategy.kind).toBe('rest-delegate');
    expect(config.cache.ttlMs).toBe(60_000);
    expect(config.discovery.externalIpServices).toEqual(['https://ip.example', 'https://ip2.example']);
  });

  it('lists every invalid variable', () => {
    try {
      loadConfig({ PORT: 'abc', TEE_PROVIDER: 'nitro' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues.map((issue) => issue.split(':')[0])).toEqual(['PORT', 'TEE_PROVIDER']);
      }
    }
  });

  it('rejects identical VM identities', () => {
    expect(() => loadConfig({ PEER_VM_ID: 'secretgpt' })).toThrow('PEER_VM_ID: must differ from SELF_VM_ID');
  });

  it('rejects malformed per-VM overrides', () => {
    try {
      loadConfig({ ATTESTATION_ENDPOINT_SECRETGPT: 'not a url', QUOTE_PARSE_STRATEGY_SECRETAI: 'regex' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toEqual([
          'ATTESTATION_ENDPOINT_SECRETGPT: must be a URL',
          'QUOTE_PARSE_STRATEGY_SECRETAI: must be rest-delegate or byte-offset',
        ]);
      }
    }
  });

  it('rejects KDF iteration counts outside the accepted range', () => {
    expect(() => loadConfig({ PROOF_KDF_ITERATIONS: '500' })).toThrow(ConfigError);
  });
});

describe('envSuffix', () => {
  it('upper-cases and replaces separators', () => {
    expect(envSuffix('secret-ai')).toBe('SECRET_AI');
    expect(envSuffix('secretgpt')).toBe('SECRETGPT');
  });
});
