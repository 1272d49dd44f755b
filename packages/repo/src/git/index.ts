import { ProcessError } from '@patchproof/shared';
import { spawnCollect } from '../process';

export interface GitServiceOptions {
  repoRoot: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface StatusEntry {
  /** Two-letter porcelain code, e.g. ` M`, `A `, `??` */
  code: string;
  path: string;
}

export class GitService {
  private readonly repoRoot: string;
  private readonly timeoutMs?: number;
  private readonly signal?: AbortSignal;

  constructor(options: GitServiceOptions) {
    this.repoRoot = options.repoRoot;
    this.timeoutMs = options.timeoutMs;
    this.signal = options.signal;
  }

  /**
   * Clones `url` into `dest` and checks out `revision` detached.
   */
  static async clone(
    url: string,
    revision: string,
    dest: string,
    options: { timeoutMs?: number; signal?: AbortSignal } = {},
  ): Promise<GitService> {
    const parent = new GitService({ repoRoot: process.cwd(), ...options });
    await parent.exec(['clone', '--quiet', '--no-checkout', url, dest]);

    const git = new GitService({ repoRoot: dest, ...options });
    await git.exec(['checkout', '--quiet', '--detach', revision]);
    return git;
  }

  private async exec(args: string[], input?: string): Promise<string> {
    const result = await spawnCollect('git', args, {
      cwd: this.repoRoot,
      input,
      timeoutMs: this.timeoutMs,
      signal: this.signal,
    });
    if (result.code !== 0) {
      throw new ProcessError(`Git command failed: git ${args.join(' ')}\n${result.stderr}`, {
        exitCode: result.code,
        details: { stderr: result.stderr },
      });
    }
    return result.stdout;
  }

  async getStatusPorcelain(): Promise<string> {
    return (await this.exec(['status', '--porcelain', '--untracked-files=all'])).trimEnd();
  }

  /**
   * Parsed `git status` entries. Renames report their new path.
   */
  async status(): Promise<StatusEntry[]> {
    const raw = await this.exec(['status', '--porcelain', '-z', '--untracked-files=all']);
    const fields = raw.split('\0');
    const entries: StatusEntry[] = [];
    for (let i = 0; i < fields.length; i++) {
      const field = fields[i];
      if (field.length < 4) continue;
      const code = field.slice(0, 2);
      entries.push({ code, path: field.slice(3) });
      // -z puts the original path of a rename or copy in the following field
      if (code.startsWith('R') || code.startsWith('C')) i++;
    }
    return entries;
  }

  async getHeadSha(): Promise<string> {
    return (await this.exec(['rev-parse', 'HEAD'])).trim();
  }

  /**
   * Discards every tracked and untracked change back to `ref`.
   */
  async resetHard(ref: string): Promise<void> {
    await this.exec(['reset', '--quiet', '--hard', ref]);
    await this.exec(['clean', '-fd', '--quiet']);
  }
}
