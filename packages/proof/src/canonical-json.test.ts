import { describe, it, expect } from 'vitest';
import { canonicalize } from './canonical-json.js';

describe('canonicalize', () => {
  it('should sort keys recursively without whitespace', () => {
    expect(canonicalize({ b: 1, a: { d: [3, { z: true, y: null }], c: 'x' } })).toBe(
      '{"a":{"c":"x","d":[3,{"y":null,"z":true}]},"b":1}',
    );
  });

  it('should produce identical output regardless of insertion order', () => {
    expect(canonicalize({ one: 1, two: 2 })).toBe(canonicalize({ two: 2, one: 1 }));
  });

  it('should keep unicode as-is and escape like JSON', () => {
    expect(canonicalize({ text: 'héllo "wörld" 🔒\n' })).toBe('{"text":"héllo \\"wörld\\" 🔒\\n"}');
  });

  it('should drop undefined members and honor toJSON', () => {
    expect(canonicalize({ a: undefined, at: new Date(Date.UTC(2024, 0, 2)) })).toBe('{"at":"2024-01-02T00:00:00.000Z"}');
  });

  it('should reject values JSON cannot represent', () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    expect(() => canonicalize(circular)).toThrow('Circular reference at $.self');
    expect(() => canonicalize({ n: Number.NaN })).toThrow('Non-finite number at $.n');
    expect(() => canonicalize({ big: 1n })).toThrow('Cannot serialize bigint at $.big');
    expect(() => canonicalize([undefined])).toThrow('Cannot serialize undefined at $[0]');
  });

  it('should allow the same object twice when it is not circular', () => {
    const shared = { k: 1 };
    expect(canonicalize([shared, shared])).toBe('[{"k":1},{"k":1}]');
  });
});
