import { describe, it, expect } from 'vitest';
import { canonicalDigest, sha256 } from './hash';

describe('hash', () => {
  it('computes hex sha256', () => {
    expect(sha256('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });

  it('ignores key order but not values', () => {
    expect(canonicalDigest({ a: 1, b: [1, 2] })).toBe(canonicalDigest({ b: [1, 2], a: 1 }));
    expect(canonicalDigest({ a: 1 })).not.toBe(canonicalDigest({ a: 2 }));
    expect(canonicalDigest({ a: 1 })).toMatch(/^[0-9a-f]{64}$/);
  });
});
