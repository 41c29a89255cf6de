import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { canonicalize } from './canonical.js';

describe('canonicalize', () => {
  it('should sort keys at every depth', () => {
    expect(canonicalize({ b: 1, a: { d: true, c: null } })).toBe('{"a":{"c":null,"d":true},"b":1}');
  });

  it('should drop undefined members', () => {
    expect(canonicalize({ a: undefined, b: 'x' })).toBe('{"b":"x"}');
  });

  it('should keep array order', () => {
    expect(canonicalize(['z', 'a', 1])).toBe('["z","a",1]');
  });

  it('should escape strings the way JSON does', () => {
    expect(canonicalize({ note: 'line "one"\n' })).toBe('{"note":"line \\"one\\"\\n"}');
  });

  it('should refuse non-finite numbers', () => {
    expect(() => canonicalize({ n: Number.NaN })).toThrow('non-finite');
  });

  /**
   * **Property: key order never changes the serialization**
   */
  it('should serialize reordered objects identically', () => {
    fc.assert(
      fc.property(fc.dictionary(fc.stringMatching(/^[a-z]{1,8}$/), fc.oneof(fc.string(), fc.integer(), fc.boolean())), (dict) => {
        const reversed = Object.fromEntries(Object.entries(dict).reverse());
        expect(canonicalize(reversed)).toBe(canonicalize(dict));
      }),
    );
  });

  /**
   * **Property: canonical text parses back to an equal value**
   */
  it('should produce valid JSON', () => {
    fc.assert(
      fc.property(fc.dictionary(fc.stringMatching(/^[a-z]{1,8}$/), fc.oneof(fc.string(), fc.integer(), fc.constant(null))), (dict) => {
        expect(JSON.parse(canonicalize(dict))).toEqual(dict);
      }),
    );
  });
});
