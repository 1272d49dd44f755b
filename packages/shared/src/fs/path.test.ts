import { describe, it, expect } from 'vitest';
import { join, normalizePath } from './path';

describe('path helpers', () => {
  it('normalizes separators', () => {
    expect(normalizePath('a\\b\\c.txt')).toBe('a/b/c.txt');
    expect(join('a', 'b', '..', 'c')).toBe('a/c');
  });
});
