import { describe, it, expect } from '@jest/globals';
import { stableStringify } from '../../src/utils/stable-stringify';

describe('stableStringify', () => {
  it('sorts object keys at every depth', () => {
    expect(stableStringify({ b: 1, a: { d: [true, null], c: 'x' } })).toBe(
      '{"a":{"c":"x","d":[true,null]},"b":1}'
    );
  });

  it('ignores insertion order', () => {
    expect(stableStringify({ x: 1, y: 2 })).toBe(stableStringify({ y: 2, x: 1 }));
  });

  it('keeps array order', () => {
    expect(stableStringify([3, 1, 2])).toBe('[3,1,2]');
  });

  it('rejects values JSON cannot represent', () => {
    expect(() => stableStringify(undefined)).toThrow('Unsupported value in stableStringify: undefined');
  });
});
