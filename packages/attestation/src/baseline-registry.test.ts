import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { BaselineRegistry } from './baseline-registry.js';

const register = 'AB'.repeat(48);

describe('BaselineRegistry', () => {
  it('should load and normalize entries', () => {
    const registry = BaselineRegistry.fromJson({
      secretai: { mrtd: `0x${register}`, rtmr0: register, rtmr1: register, rtmr2: register, rtmr3: register },
    });

    expect(registry.identities()).toEqual(['secretai']);
    expect(registry.get('secretai')).toEqual({
      vmIdentity: 'secretai',
      mrtd: 'ab'.repeat(48),
      rtmr0: 'ab'.repeat(48),
      rtmr1: 'ab'.repeat(48),
      rtmr2: 'ab'.repeat(48),
      rtmr3: 'ab'.repeat(48),
    });
  });

  it('should accept report_data as an alias', () => {
    const registry = BaselineRegistry.fromJson({
      vm: { mrtd: register, rtmr0: register, rtmr1: register, rtmr2: register, rtmr3: register, report_data: 'cd'.repeat(64) },
    });

    expect(registry.get('vm')?.reportData).toBe('cd'.repeat(64));
  });

  it('should reject registers of the wrong length', () => {
    expect(() =>
      BaselineRegistry.fromJson({ vm: { mrtd: 'abcd', rtmr0: register, rtmr1: register, rtmr2: register, rtmr3: register } }),
    ).toThrow('Invalid baseline file: vm.mrtd: expected 96 hex chars');
  });

  it('should reject a missing register', () => {
    let caught: unknown;
    try {
      BaselineRegistry.fromJson({ vm: { mrtd: register } });
    } catch (err) {
      caught = err;
    }
    expect(caught).toMatchObject({ name: 'ValidationError', kind: 'InvalidBaseline' });
  });

  it('should load the shipped baselines file', async () => {
    const path = fileURLToPath(new URL('../../../config/baselines.json', import.meta.url));
    const registry = await BaselineRegistry.fromFile(path);

    expect(registry.identities()).toEqual(['secretgpt', 'secretai']);
    expect(registry.get('secretgpt')?.mrtd.startsWith('ba87a347')).toBe(true);
  });

  it('should report a missing file as an invalid baseline', async () => {
    await expect(BaselineRegistry.fromFile('/nonexistent/baselines.json')).rejects.toMatchObject({
      kind: 'InvalidBaseline',
      message: 'Baseline file /nonexistent/baselines.json could not be read',
    });
  });
});
