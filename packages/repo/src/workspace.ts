import { ensureDir, remove } from 'fs-extra';
import * as path from 'path';
import type { Task } from '@patchproof/shared';
import { GitService } from './git';

export interface PreparedWorkspace {
  taskId: string;
  dir: string;
  /** Commit the working copy was checked out at, before any patch */
  baseRevision: string;
  git: GitService;
}

export interface PrepareOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Supplies a fresh working copy of a task's repository at its pinned revision.
 */
export interface RepositoryProvider {
  prepare(task: Pick<Task, 'id' | 'repo'>, dest: string, options?: PrepareOptions): Promise<PreparedWorkspace>;
  release(workspace: PreparedWorkspace): Promise<void>;
}

export interface GitRepositoryProviderOptions {
  /** Leave working copies on disk after release, for debugging */
  keep?: boolean;
}

export class GitRepositoryProvider implements RepositoryProvider {
  constructor(private readonly options: GitRepositoryProviderOptions = {}) {}

  async prepare(
    task: Pick<Task, 'id' | 'repo'>,
    dest: string,
    options: PrepareOptions = {},
  ): Promise<PreparedWorkspace> {
    // A leftover copy from an interrupted run is not trusted.
    await remove(dest);
    await ensureDir(path.dirname(dest));

    const git = await GitService.clone(task.repo.url, task.repo.revision, dest, options);
    return {
      taskId: task.id,
      dir: dest,
      baseRevision: await git.getHeadSha(),
      git,
    };
  }

  async release(workspace: PreparedWorkspace): Promise<void> {
    if (this.options.keep) return;
    await remove(workspace.dir);
  }
}
