import { diffSnapshots, isIgnoredPath, type WorkingTreeSnapshot } from '@patchproof/repo';
import { failed, passed, type StageRunner } from './types';

function withoutIgnored(snapshot: WorkingTreeSnapshot, ignore: readonly string[]): WorkingTreeSnapshot {
  return {
    files: Object.fromEntries(
      Object.entries(snapshot.files).filter(([path]) => !isIgnoredPath(path, ignore)),
    ),
  };
}

/**
 * Confirms the evaluated working copy is exactly what the patch produced:
 * nothing changed since the patch landed, and nothing is modified outside the patched files.
 */
export const tweakStage: StageRunner<'tweak'> = {
  kind: 'tweak',
  async run(descriptor, ctx) {
    const ignore = [...ctx.tweakIgnore, ...descriptor.ignore];
    const current = await ctx.workspace.snapshot(ignore);
    const changedSincePatch = diffSnapshots(withoutIgnored(ctx.workspace.baseline, ignore), current);

    const patched = new Set(ctx.workspace.patchedFiles);
    const outsidePatch = Object.keys(current.files)
      .filter((path) => !patched.has(path))
      .sort();

    const modified = [...new Set([...changedSincePatch, ...outsidePatch])].sort();
    if (modified.length === 0) {
      return passed('Working copy matches the applied patch');
    }
    return failed(`Modified outside the applied patch: ${modified.join(', ')}`, {
      changedSincePatch,
      outsidePatch,
    });
  },
};
