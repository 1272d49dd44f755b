import { describe, it, expect } from 'vitest';
import { ConfigError } from '@patchproof/shared';
import { renderArgv, renderCommand } from './template';

describe('renderArgv', () => {
  it('substitutes placeholders per word', () => {
    expect(
      renderArgv('sf org create scratch --alias {alias} --definition-file {definitionFile} --duration-days {durationDays}', {
        alias: 'pp-task-1',
        definitionFile: '/work/my project/def.json',
        durationDays: 1,
      }),
    ).toEqual([
      'sf',
      'org',
      'create',
      'scratch',
      '--alias',
      'pp-task-1',
      '--definition-file',
      '/work/my project/def.json',
      '--duration-days',
      '1',
    ]);
  });

  it('rejects placeholders without a value', () => {
    expect(() => renderArgv('destroy {envId}', {})).toThrow(ConfigError);
  });
});

describe('renderCommand', () => {
  it('leaves unknown braces alone', () => {
    expect(
      renderCommand(`sf apex run --target-org {envId} -c "Map<String,Object> m = new Map<String,Object>{}"`, {
        envId: 'org-1',
      }),
    ).toBe(`sf apex run --target-org org-1 -c "Map<String,Object> m = new Map<String,Object>{}"`);
  });

  it('substitutes numbers', () => {
    expect(renderCommand('seed --count {scale}', { scale: 200 })).toBe('seed --count 200');
  });
});
