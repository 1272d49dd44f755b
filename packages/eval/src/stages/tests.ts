import { failed, passed, type StageRunner } from './types';
import { parseTestSummary } from './test-summary';

/**
 * Runs the task's test suite. The fraction is tests passed over tests required,
 * forced to zero when a declared coverage floor is not met.
 */
export const testsStage: StageRunner<'tests'> = {
  kind: 'tests',
  async run(descriptor, ctx) {
    const outcome = await ctx.provider.runCommand(
      ctx.env,
      { command: descriptor.command, cwd: ctx.workspace.dir },
      { signal: ctx.signal, timeoutMs: ctx.timeoutMs },
    );

    const summary = parseTestSummary(outcome.json, `${outcome.stdout}\n${outcome.stderr}`);
    if (!summary) {
      // No counts to work with; the exit status decides
      return outcome.ok
        ? passed('Tests passed', { exitCode: outcome.exitCode })
        : failed(`Tests failed: ${outcome.message}`, { exitCode: outcome.exitCode });
    }

    const required = descriptor.requiredTests ?? summary.total;
    const details: Record<string, unknown> = { ...summary, required };
    if (required === 0) {
      return failed('No tests ran', details);
    }

    if (descriptor.minCoverage !== undefined) {
      if (summary.coverage === undefined) {
        return failed(`Coverage not reported; ${descriptor.minCoverage}% required`, details);
      }
      if (summary.coverage < descriptor.minCoverage) {
        return failed(
          `Coverage ${summary.coverage}% below required ${descriptor.minCoverage}%`,
          details,
        );
      }
    }

    const fraction = Math.min(1, summary.passed / required);
    const message = `${summary.passed}/${required} tests passed`;
    return fraction === 1 ? passed(message, details) : failed(message, details, fraction);
  },
};
