import { describe, it, expect } from 'vitest';
import { isShellCommand, parseCommand, tokenize } from './parser';

describe('tokenize', () => {
  it('splits on whitespace and honours quotes', () => {
    expect(tokenize(`sf apex run test --tests "My Test" --wait '10'`)).toEqual([
      'sf',
      'apex',
      'run',
      'test',
      '--tests',
      'My Test',
      '--wait',
      '10',
    ]);
  });

  it('keeps empty quoted arguments', () => {
    expect(tokenize(`cmd "" x`)).toEqual(['cmd', '', 'x']);
  });

  it('treats backslashes literally inside single quotes', () => {
    expect(tokenize(`echo 'a\\b' "c\\"d"`)).toEqual(['echo', 'a\\b', 'c"d']);
  });
});

describe('parseCommand', () => {
  it('moves leading assignments into env', () => {
    expect(parseCommand('SF_LOG_LEVEL=debug sf org list')).toEqual({
      bin: 'sf',
      args: ['org', 'list'],
      env: { SF_LOG_LEVEL: 'debug' },
      raw: 'SF_LOG_LEVEL=debug sf org list',
    });
  });

  it('returns an empty bin when there is only an assignment', () => {
    expect(parseCommand('A=1').bin).toBe('');
  });
});

describe('isShellCommand', () => {
  it('detects pipes, redirects and substitutions', () => {
    expect(isShellCommand('npm test | tee out.txt')).toBe(true);
    expect(isShellCommand('echo $HOME')).toBe(true);
    expect(isShellCommand('sf project deploy start --json')).toBe(false);
  });
});
