import { getPath } from '@patchproof/shared';
import { failed, passed, type StageRunner } from './types';

/**
 * Component failures from deploy output such as `result.details.componentFailures`.
 */
function componentFailures(json: unknown): unknown[] {
  const failures = getPath(json, 'result.details.componentFailures');
  if (Array.isArray(failures)) return failures;
  // A single failure is reported as an object rather than a one-element array
  return failures === undefined ? [] : [failures];
}

export const deployStage: StageRunner<'deploy'> = {
  kind: 'deploy',
  async run(descriptor, ctx) {
    const outcome = await ctx.provider.deploy(
      ctx.env,
      { workingDir: ctx.workspace.dir, sourceDir: descriptor.sourceDir },
      { signal: ctx.signal, timeoutMs: ctx.timeoutMs },
    );

    if (outcome.ok) {
      return passed('Deployed', { durationMs: outcome.durationMs });
    }
    const failures = componentFailures(outcome.json);
    return failed(`Deploy failed: ${outcome.message}`, {
      exitCode: outcome.exitCode,
      componentFailures: failures,
    });
  },
};
