import { describe, it, expect } from 'vitest';
import { UnknownVmError, VmRegistry } from './vm-registry.js';
import { PEER_VM, SELF_VM } from './test-fixtures.js';

describe('VmRegistry', () => {
  it('should look VMs up by identity and role', () => {
    const registry = new VmRegistry([SELF_VM, PEER_VM]);

    expect(registry.get('secretai')).toBe(PEER_VM);
    expect(registry.get('nope')).toBeUndefined();
    expect(registry.byRole('self')).toBe(SELF_VM);
    expect(registry.list().map((vm) => vm.identity)).toEqual(['secretgpt', 'secretai']);
    expect(() => registry.require('nope')).toThrow(UnknownVmError);
    expect(() => registry.require('nope')).toThrow('Unknown VM: nope');
  });

  it('should count consecutive failures and reset them on success', () => {
    let now = 1_000;
    const registry = new VmRegistry([SELF_VM], () => now);

    registry.recordFailure('secretgpt', 'Attestation endpoint is unreachable');
    registry.recordFailure('secretgpt', 'TLS handshake failed');
    expect(registry.status('secretgpt')).toEqual({
      vmIdentity: 'secretgpt',
      status: 'unhealthy',
      lastSuccessfulAttestation: null,
      errorCount: 2,
      lastError: 'TLS handshake failed',
    });

    now = 5_000;
    registry.recordSuccess('secretgpt', false);
    expect(registry.status('secretgpt')).toEqual({
      vmIdentity: 'secretgpt',
      status: 'healthy',
      lastSuccessfulAttestation: 5_000,
      errorCount: 0,
      lastError: null,
    });
  });

  it('should mark fallback-parsed successes as degraded', () => {
    const registry = new VmRegistry([SELF_VM]);

    registry.recordSuccess('secretgpt', true);

    expect(registry.status('secretgpt')?.status).toBe('degraded');
  });

  it('should ignore updates for unknown VMs', () => {
    const registry = new VmRegistry([SELF_VM]);

    registry.recordFailure('nope', 'boom');

    expect(registry.status('nope')).toBeUndefined();
    expect(registry.statusList()).toHaveLength(1);
  });
});
