import { describe, it, expect, vi } from 'vitest';
import { extractJsonObject, getPath } from './json-utils';

describe('extractJsonObject', () => {
  it('extracts and parses a JSON object after warning lines', () => {
    const output = 'Warning: a newer CLI version is available\n{"status":0,"result":{"id":"e1"}}\n';
    expect(extractJsonObject(output)).toEqual({ status: 0, result: { id: 'e1' } });
  });

  it('includes context in the missing-object error', () => {
    expect(() => extractJsonObject('no json here', 'create')).toThrow(
      'No JSON object found in create output.',
    );
  });

  it('throws a parse error with context', () => {
    expect(() => extractJsonObject('before { bad json } after', 'deploy')).toThrow(
      /Failed to parse JSON from deploy output:/,
    );
  });

  it('falls back to stringification when a non-Error is thrown', () => {
    const parseSpy = vi.spyOn(JSON, 'parse').mockImplementationOnce(() => {
      throw 'nope';
    });

    expect(() => extractJsonObject('before {"a":1} after')).toThrow(/Failed to parse JSON: nope/);

    parseSpy.mockRestore();
  });
});

describe('getPath', () => {
  it('walks objects and array indexes', () => {
    const value = { result: { records: [{ Name: 'Acme' }] } };
    expect(getPath(value, 'result.records.0.Name')).toBe('Acme');
    expect(getPath(value, 'result.missing.deeper')).toBeUndefined();
    expect(getPath(value, '')).toBe(value);
  });
});
