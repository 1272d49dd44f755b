import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { spawn } from 'child_process';
import { PatchInvalidError } from '@patchproof/shared';
import { GitService } from '../git';
import { spawnCollect } from '../process';
import { PatchApplier, validatePathSecurity } from './applier';

const run = (cmd: string, args: string[], cwd: string) => {
  return new Promise<void>((resolve, reject) => {
    const p = spawn(cmd, args, { cwd, stdio: 'ignore' });
    p.on('close', (code) => {
      if (code === 0) resolve();
      else reject(new Error(`Command ${cmd} ${args.join(' ')} failed with code ${code}`));
    });
    p.on('error', reject);
  });
};

const capture = async (cmd: string, args: string[], cwd: string) => {
  const result = await spawnCollect(cmd, args, { cwd });
  if (result.code !== 0) throw new Error(`Command ${cmd} ${args.join(' ')} failed with code ${result.code}`);
  return result.stdout;
};

const numberedLines = Array.from({ length: 20 }, (_, i) => `line ${i + 1}`).join('\n') + '\n';

describe('PatchApplier', () => {
  let tmpDir: string;
  let applier: PatchApplier;
  let git: GitService;
  let baseSha: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'patch-test-'));
    applier = new PatchApplier();
    git = new GitService({ repoRoot: tmpDir });

    await run('git', ['init'], tmpDir);
    await run('git', ['config', 'user.email', 'test@example.com'], tmpDir);
    await run('git', ['config', 'user.name', 'Test User'], tmpDir);
    await fs.writeFile(path.join(tmpDir, 'greeting.txt'), 'hello\nworld\n');
    await fs.writeFile(path.join(tmpDir, 'lines.txt'), numberedLines);
    await run('git', ['add', '.'], tmpDir);
    await run('git', ['commit', '-m', 'Initial commit'], tmpDir);
    baseSha = await git.getHeadSha();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('applies a well-formed diff with the strict strategy', async () => {
    const diffText = [
      'diff --git a/greeting.txt b/greeting.txt',
      '--- a/greeting.txt',
      '+++ b/greeting.txt',
      '@@ -1,2 +1,2 @@',
      ' hello',
      '-world',
      '+there',
      '',
    ].join('\n');

    const result = await applier.apply(tmpDir, diffText);
    expect(result.applied).toBe(true);
    expect(result.strategyUsed).toBe('strict');
    expect(result.filesChanged).toEqual(['greeting.txt']);
    expect(result.rejectedFiles).toEqual([]);
    expect(await fs.readFile(path.join(tmpDir, 'greeting.txt'), 'utf-8')).toBe('hello\nthere\n');
  });

  it('reports normalization in the strategy name', async () => {
    const diffText = '--- greeting.txt\n+++ greeting.txt\n@@ -1,2 +1,2 @@\n hello\n-world\n+there\n';

    const result = await applier.apply(tmpDir, diffText);
    expect(result.applied).toBe(true);
    expect(result.strategyUsed).toBe('normalized+strict');
    expect(result.repairs).toEqual(['added a/ b/ prefixes']);
  });

  it('creates new files', async () => {
    const result = await applier.apply(tmpDir, '--- /dev/null\n+++ b/new.txt\n@@ -0,0 +1 @@\n+fresh\n');
    expect(result.applied).toBe(true);
    expect(result.strategyUsed).toBe('strict');
    expect(result.filesChanged).toEqual(['new.txt']);
  });

  it('rejects an empty diff without touching the repository', async () => {
    const result = await applier.apply(tmpDir, '');
    expect(result.applied).toBe(false);
    expect(result.error).toBeInstanceOf(PatchInvalidError);
    expect(result.error?.message).toBe('Empty diff');
    expect(result.error?.attempts).toEqual([]);
    expect(await git.getStatusPorcelain()).toBe('');
  });

  it('rejects text that contains no diff', async () => {
    const result = await applier.apply(tmpDir, 'I could not find the bug, sorry.');
    expect(result.applied).toBe(false);
    expect(result.error?.message).toBe('No applicable diff content found');
  });

  it('keeps the hunks that match when others are stale', async () => {
    const diffText = [
      '--- a/lines.txt',
      '+++ b/lines.txt',
      '@@ -1,3 +1,3 @@',
      ' line 1',
      '-line 2',
      '+line two',
      ' line 3',
      '@@ -15,3 +15,3 @@',
      ' missing a',
      '-missing b',
      '+changed b',
      ' missing c',
      '',
    ].join('\n');

    const result = await applier.apply(tmpDir, diffText);
    expect(result.applied).toBe(true);
    expect(result.strategyUsed).toBe('reject-tolerant');
    expect(result.rejectedFiles).toEqual(['lines.txt']);
    expect(result.filesChanged).toEqual(['lines.txt']);

    const content = await fs.readFile(path.join(tmpDir, 'lines.txt'), 'utf-8');
    expect(content.split('\n').slice(0, 3)).toEqual(['line 1', 'line two', 'line 3']);
    await expect(fs.access(path.join(tmpDir, 'lines.txt.rej'))).rejects.toThrow();
  });

  it('merges against the recorded base blob when the context has moved on', async () => {
    const linesPath = path.join(tmpDir, 'lines.txt');
    await fs.writeFile(linesPath, numberedLines.replace('line 2\n', 'line two\n'));
    const diffText = await capture('git', ['diff'], tmpDir);
    await run('git', ['checkout', '--', 'lines.txt'], tmpDir);
    await fs.writeFile(linesPath, numberedLines.replace('line 5\n', 'line five\n'));
    await run('git', ['commit', '-am', 'Edit line 5'], tmpDir);

    const result = await applier.apply(tmpDir, diffText);
    expect(result.applied).toBe(true);
    expect(result.strategyUsed).toBe('three-way');
    expect(result.filesChanged).toEqual(['lines.txt']);
    const content = await fs.readFile(linesPath, 'utf-8');
    expect(content.split('\n').slice(0, 5)).toEqual(['line 1', 'line two', 'line 3', 'line 4', 'line five']);
  });

  it('falls through to fuzzy matching when an outer context line drifted', async () => {
    const diffText = [
      '--- a/lines.txt',
      '+++ b/lines.txt',
      '@@ -4,7 +4,7 @@',
      ' line FOUR',
      ' line 5',
      ' line 6',
      '-line 7',
      '+line seven',
      ' line 8',
      ' line 9',
      ' line 10',
      '',
    ].join('\n');

    const result = await applier.apply(tmpDir, diffText);
    expect(result.applied).toBe(true);
    expect(result.strategyUsed).toBe('fuzzy');
    expect(result.filesChanged).toEqual(['lines.txt']);
    const content = await fs.readFile(path.join(tmpDir, 'lines.txt'), 'utf-8');
    expect(content.split('\n').slice(2, 8)).toEqual(['line 3', 'line 4', 'line 5', 'line 6', 'line seven', 'line 8']);
  });

  it('keeps CRLF line endings of the patched file', async () => {
    const crlfPath = path.join(tmpDir, 'crlf.txt');
    await fs.writeFile(crlfPath, 'one\r\ntwo\r\nthree\r\n');
    await run('git', ['add', 'crlf.txt'], tmpDir);
    await run('git', ['commit', '-m', 'Add CRLF file'], tmpDir);
    await fs.writeFile(crlfPath, 'one\r\nTWO\r\nthree\r\n');
    const diffText = await capture('git', ['diff'], tmpDir);
    await run('git', ['checkout', '--', 'crlf.txt'], tmpDir);

    const result = await applier.apply(tmpDir, diffText);
    expect(result.applied).toBe(true);
    expect(result.strategyUsed).toBe('strict');
    expect(result.repairs).toEqual([]);
    expect(await fs.readFile(crlfPath, 'utf-8')).toBe('one\r\nTWO\r\nthree\r\n');
  });

  it('counts a removed line that looks like a header as a touched line', async () => {
    const limited = new PatchApplier({ maxLinesTouched: 1 });
    const diffText = [
      '--- a/greeting.txt',
      '+++ b/greeting.txt',
      '@@ -1,2 +0,0 @@',
      '--- ../outside.txt',
      '-world',
      '',
    ].join('\n');

    const result = await limited.apply(tmpDir, diffText);
    expect(result.applied).toBe(false);
    expect(result.error?.message).toBe('Too many lines touched (2 > 1)');
  });

  it('tries every strategy and restores the tree when none applies', async () => {
    const diffText = '--- a/greeting.txt\n+++ b/greeting.txt\n@@ -1,2 +1,2 @@\n nothing\n-here\n+there\n';

    const result = await applier.apply(tmpDir, diffText);
    expect(result.applied).toBe(false);
    expect(result.error?.code).toBe('PatchInvalid');
    expect(result.error?.attempts.map((a) => a.strategy)).toEqual([
      'strict',
      'reject-tolerant',
      'three-way',
      'fuzzy',
    ]);
    expect(await git.getStatusPorcelain()).toBe('');
    expect(await git.getHeadSha()).toBe(baseSha);
    expect(await fs.readFile(path.join(tmpDir, 'greeting.txt'), 'utf-8')).toBe('hello\nworld\n');
  });

  it('refuses path traversal before running git', async () => {
    const diffText = [
      'diff --git a/../secret.txt b/../secret.txt',
      '--- a/../secret.txt',
      '+++ b/../secret.txt',
      '@@ -0,0 +1 @@',
      '+hacked',
      '',
    ].join('\n');

    const result = await applier.apply(tmpDir, diffText);
    expect(result.applied).toBe(false);
    expect(result.error?.message).toBe('Path traversal detected: ../secret.txt');
  });

  it('refuses binary targets', async () => {
    const result = await applier.apply(tmpDir, '--- /dev/null\n+++ b/logo.png\n@@ -0,0 +1 @@\n+x\n');
    expect(result.error?.message).toBe('Binary file patch detected: logo.png');
  });

  it('enforces the changed-file limit', async () => {
    const limited = new PatchApplier({ maxFilesChanged: 1 });
    const diffText = [
      '--- /dev/null',
      '+++ b/one.txt',
      '@@ -0,0 +1 @@',
      '+1',
      '--- /dev/null',
      '+++ b/two.txt',
      '@@ -0,0 +1 @@',
      '+2',
      '',
    ].join('\n');

    const result = await limited.apply(tmpDir, diffText);
    expect(result.error?.message).toBe('Too many files changed (2 > 1)');
  });

  it('enforces the touched-line limit', async () => {
    const limited = new PatchApplier({ maxLinesTouched: 1 });
    const result = await limited.apply(
      tmpDir,
      '--- a/greeting.txt\n+++ b/greeting.txt\n@@ -1,2 +1,2 @@\n hello\n-world\n+there\n',
    );
    expect(result.error?.message).toBe('Too many lines touched (2 > 1)');
  });
});

describe('validatePathSecurity', () => {
  it('accepts ordinary relative paths', () => {
    expect(validatePathSecurity('force-app/main/default/classes/Foo.cls')).toBeUndefined();
  });

  it('rejects absolute and encoded paths', () => {
    expect(validatePathSecurity('/etc/passwd')).toBe('Absolute path not allowed: /etc/passwd');
    expect(validatePathSecurity('a%2F..%2Fb')).toBe('Path traversal detected: a%2F..%2Fb');
    expect(validatePathSecurity('dir%2Ffile')).toBe(
      'Encoded path separator detected (potential traversal): dir%2Ffile',
    );
  });
});
