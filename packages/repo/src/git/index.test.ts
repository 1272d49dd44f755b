import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { spawn } from 'child_process';
import { ProcessError } from '@patchproof/shared';
import { GitService } from './index';

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

describe('GitService', () => {
  let tmpDir: string;
  let gitService: GitService;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'git-service-test-'));
    gitService = new GitService({ repoRoot: tmpDir });

    await run('git', ['init'], tmpDir);
    await run('git', ['config', 'user.email', 'test@example.com'], tmpDir);
    await run('git', ['config', 'user.name', 'Test User'], tmpDir);
    await fs.writeFile(path.join(tmpDir, 'a.txt'), 'a\n');
    await run('git', ['add', '.'], tmpDir);
    await run('git', ['commit', '-m', 'Initial commit'], tmpDir);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('reports a clean tree as empty status', async () => {
    expect(await gitService.getStatusPorcelain()).toBe('');
    expect(await gitService.status()).toEqual([]);
  });

  it('parses modified, untracked and nested untracked entries', async () => {
    await fs.writeFile(path.join(tmpDir, 'a.txt'), 'changed\n');
    await fs.mkdir(path.join(tmpDir, 'dir'));
    await fs.writeFile(path.join(tmpDir, 'dir', 'b.txt'), 'b\n');

    expect(await gitService.status()).toEqual([
      { code: ' M', path: 'a.txt' },
      { code: '??', path: 'dir/b.txt' },
    ]);
  });

  it('reports the new path of a staged rename', async () => {
    await run('git', ['mv', 'a.txt', 'renamed.txt'], tmpDir);
    expect(await gitService.status()).toEqual([{ code: 'R ', path: 'renamed.txt' }]);
  });

  it('resets tracked and untracked changes', async () => {
    const head = await gitService.getHeadSha();
    await fs.writeFile(path.join(tmpDir, 'a.txt'), 'changed\n');
    await fs.writeFile(path.join(tmpDir, 'extra.txt'), 'x\n');

    await gitService.resetHard(head);

    expect(await gitService.getStatusPorcelain()).toBe('');
    expect(await fs.readFile(path.join(tmpDir, 'a.txt'), 'utf-8')).toBe('a\n');
  });

  it('clones a revision into a detached working copy', async () => {
    const head = await gitService.getHeadSha();
    const dest = path.join(tmpDir, '..', `${path.basename(tmpDir)}-clone`);
    try {
      const clone = await GitService.clone(tmpDir, head, dest);
      expect(await clone.getHeadSha()).toBe(head);
      expect(await fs.readFile(path.join(dest, 'a.txt'), 'utf-8')).toBe('a\n');
    } finally {
      await fs.rm(dest, { recursive: true, force: true });
    }
  });

  it('throws ProcessError for a failing command', async () => {
    await expect(gitService.resetHard('no-such-ref')).rejects.toBeInstanceOf(ProcessError);
  });
});
