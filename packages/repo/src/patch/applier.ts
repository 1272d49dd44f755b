import * as fs from 'node:fs/promises';
import isBinaryPath from 'is-binary-path';
import {
  PatchInvalidError,
  join,
  type PatchStrategyAttempt,
  type PatchStrategyName,
} from '@patchproof/shared';
import { GitService } from '../git';
import { spawnCollect } from '../process';
import { normalizeDiff, summarizeDiff } from './normalize';

export interface PatchApplierOptions {
  maxFilesChanged?: number;
  maxLinesTouched?: number;
  allowBinary?: boolean;
  /** `--fuzz` passed to patch(1) by the fuzzy strategy */
  fuzzFactor?: number;
  /** Per-strategy process timeout */
  timeoutMs?: number;
  /** Overrides the default cascade; used to restrict or reorder strategies */
  strategies?: PatchStrategy[];
}

export interface PatchApplyResult {
  applied: boolean;
  /** `<strategy>`, or `normalized+<strategy>` when the text had to be repaired first */
  strategyUsed?: string;
  filesChanged: string[];
  /** Files with hunks left in `.rej` by the reject-tolerant strategy */
  rejectedFiles: string[];
  repairs: string[];
  error?: PatchInvalidError;
}

export interface StrategyContext {
  workingDir: string;
  git: GitService;
  fuzzFactor: number;
  timeoutMs?: number;
}

export type StrategyOutcome = { ok: true; rejectedFiles: string[] } | { ok: false; reason: string };

export interface PatchStrategy {
  readonly name: PatchStrategyName;
  apply(diffText: string, ctx: StrategyContext): Promise<StrategyOutcome>;
}

async function gitApply(args: string[], diffText: string, ctx: StrategyContext) {
  return spawnCollect('git', ['apply', ...args, '-'], {
    cwd: ctx.workingDir,
    input: diffText,
    timeoutMs: ctx.timeoutMs,
  });
}

function firstErrorLine(stderr: string, fallback: string): string {
  const lines = stderr
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean);
  return lines.find((l) => l.startsWith('error:')) ?? lines[0] ?? fallback;
}

/** Exact context, exact hunk counts. */
export const strictStrategy: PatchStrategy = {
  name: 'strict',
  async apply(diffText, ctx) {
    const result = await gitApply(['--whitespace=nowarn'], diffText, ctx);
    if (result.code === 0) return { ok: true, rejectedFiles: [] };
    return { ok: false, reason: firstErrorLine(result.stderr, `git apply exited ${result.code}`) };
  },
};

/**
 * Applies every hunk that matches and leaves the rest in `.rej` files.
 * Counts as success when at least one hunk landed.
 */
export const rejectTolerantStrategy: PatchStrategy = {
  name: 'reject-tolerant',
  async apply(diffText, ctx) {
    const result = await gitApply(
      ['--reject', '--recount', '--whitespace=nowarn', '--ignore-whitespace'],
      diffText,
      ctx,
    );

    const entries = await ctx.git.status();
    const rejects = entries.filter((e) => e.path.endsWith('.rej')).map((e) => e.path);
    const landed = entries.filter((e) => !e.path.endsWith('.rej'));

    await Promise.all(rejects.map((p) => fs.rm(join(ctx.workingDir, p), { force: true })));

    if (result.code === 0) return { ok: true, rejectedFiles: [] };
    if (landed.length === 0) {
      return { ok: false, reason: firstErrorLine(result.stderr, 'no hunk applied') };
    }
    return { ok: true, rejectedFiles: rejects.map((p) => p.slice(0, -'.rej'.length)) };
  },
};

/** Uses the blobs named on `index` lines as merge ancestors. Conflicts count as failure. */
export const threeWayStrategy: PatchStrategy = {
  name: 'three-way',
  async apply(diffText, ctx) {
    const result = await gitApply(['--3way', '--whitespace=nowarn'], diffText, ctx);
    if (result.code === 0) return { ok: true, rejectedFiles: [] };
    return { ok: false, reason: firstErrorLine(result.stderr, `git apply --3way exited ${result.code}`) };
  },
};

/** patch(1) with relaxed context matching. Any failed hunk fails the strategy. */
export const fuzzyStrategy: PatchStrategy = {
  name: 'fuzzy',
  async apply(diffText, ctx) {
    const result = await spawnCollect(
      'patch',
      [
        '--batch',
        '--forward',
        '--no-backup-if-mismatch',
        '--ignore-whitespace',
        '--reject-file=-',
        `--fuzz=${ctx.fuzzFactor}`,
        '-p1',
      ],
      { cwd: ctx.workingDir, input: diffText, timeoutMs: ctx.timeoutMs },
    );
    if (result.code === 0) return { ok: true, rejectedFiles: [] };
    const output = `${result.stdout}\n${result.stderr}`;
    return { ok: false, reason: firstErrorLine(output, `patch exited ${result.code}`) };
  },
};

export const DEFAULT_STRATEGIES: readonly PatchStrategy[] = [
  strictStrategy,
  rejectTolerantStrategy,
  threeWayStrategy,
  fuzzyStrategy,
];

export class PatchApplier {
  private readonly options: PatchApplierOptions;

  constructor(options: PatchApplierOptions = {}) {
    this.options = options;
  }

  /**
   * Normalizes `diffText` and applies it to `workingDir` with the first strategy that works.
   * On failure the working copy is reset to the revision it was at on entry.
   */
  async apply(workingDir: string, diffText: string): Promise<PatchApplyResult> {
    const normalized = normalizeDiff(diffText);
    const rejected = (message: string, attempts: PatchStrategyAttempt[] = []): PatchApplyResult => ({
      applied: false,
      filesChanged: [],
      rejectedFiles: [],
      repairs: normalized.repairs,
      error: new PatchInvalidError(message, { attempts }),
    });

    if (normalized.diffText === '') {
      return rejected(diffText.trim() === '' ? 'Empty diff' : 'No applicable diff content found');
    }

    const validationError = this.validateDiff(normalized.diffText);
    if (validationError) {
      return rejected(validationError);
    }

    const git = new GitService({ repoRoot: workingDir, timeoutMs: this.options.timeoutMs });
    const baseRevision = await git.getHeadSha();
    const ctx: StrategyContext = {
      workingDir,
      git,
      fuzzFactor: this.options.fuzzFactor ?? 3,
      timeoutMs: this.options.timeoutMs,
    };

    const attempts: PatchStrategyAttempt[] = [];
    for (const strategy of this.options.strategies ?? DEFAULT_STRATEGIES) {
      let outcome: StrategyOutcome;
      try {
        outcome = await strategy.apply(normalized.diffText, ctx);
      } catch (error) {
        outcome = { ok: false, reason: error instanceof Error ? error.message : String(error) };
      }

      if (outcome.ok) {
        const filesChanged = (await git.status()).map((e) => e.path);
        return {
          applied: true,
          strategyUsed: normalized.changed ? `normalized+${strategy.name}` : strategy.name,
          filesChanged,
          rejectedFiles: outcome.rejectedFiles,
          repairs: normalized.repairs,
        };
      }

      attempts.push({ strategy: strategy.name, reason: outcome.reason });
      await git.resetHard(baseRevision);
    }

    return rejected(
      `No strategy could apply the diff (${attempts.map((a) => a.strategy).join(', ')})`,
      attempts,
    );
  }

  /**
   * Rejects traversal, absolute and binary targets and oversized diffs before anything runs.
   */
  private validateDiff(diffText: string): string | undefined {
    const { maxFilesChanged = 200, maxLinesTouched = 20_000, allowBinary = false } = this.options;

    const shape = summarizeDiff(diffText);
    const targets = shape.paths;
    for (const filePath of targets) {
      const securityError = validatePathSecurity(filePath);
      if (securityError) return securityError;
      if (!allowBinary && isBinaryPath(filePath)) {
        return `Binary file patch detected: ${filePath}`;
      }
    }

    if (targets.length > maxFilesChanged) {
      return `Too many files changed (${targets.length} > ${maxFilesChanged})`;
    }

    if (shape.linesTouched > maxLinesTouched) {
      return `Too many lines touched (${shape.linesTouched} > ${maxLinesTouched})`;
    }
    if (shape.hunks === 0 && !/^(?:new|deleted) file mode |^rename (?:from|to) |^(?:old|new) mode /m.test(diffText)) {
      return 'Diff has file headers but no hunks';
    }

    return undefined;
  }
}

/**
 * Path traversal, absolute paths, null bytes and encoded separators.
 */
export function validatePathSecurity(filePath: string): string | undefined {
  if (filePath.includes('\0') || filePath.includes('%00')) {
    return `Null byte injection detected in path: ${filePath}`;
  }

  let decodedPath = filePath;
  for (let i = 0; i < 5; i++) {
    let next: string;
    try {
      next = decodeURIComponent(decodedPath);
    } catch {
      break;
    }
    if (next === decodedPath) break;
    decodedPath = next;
  }
  const normalizedPath = decodedPath.replace(/\\/g, '/');

  if (normalizedPath.split('/').includes('..')) {
    return `Path traversal detected: ${filePath}`;
  }
  if (normalizedPath.startsWith('/') || /^[a-zA-Z]:/.test(normalizedPath)) {
    return `Absolute path not allowed: ${filePath}`;
  }
  if (/%(?:2f|5c)/i.test(filePath)) {
    return `Encoded path separator detected (potential traversal): ${filePath}`;
  }
  return undefined;
}
