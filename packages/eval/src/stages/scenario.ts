import type { OutcomeVerification } from '@patchproof/shared';
import { extractRecords, verifyRecords } from './verify';
import { failed, passed, type StageContext, type StageOutcome, type StageRunner } from './types';

interface Scenario {
  setup: string[];
  command?: string;
  verify?: OutcomeVerification;
}

async function run(
  ctx: StageContext,
  command: string,
  vars: Record<string, string | number>,
) {
  return ctx.provider.runCommand(
    ctx.env,
    { command, cwd: ctx.workspace.dir, vars },
    { signal: ctx.signal, timeoutMs: ctx.timeoutMs },
  );
}

/**
 * Runs setup commands in order, then the scenario command, then the verification query.
 * The first step that does not succeed fails the stage.
 */
async function runScenario(
  ctx: StageContext,
  scenario: Scenario,
  vars: Record<string, string | number> = {},
): Promise<StageOutcome> {
  for (const [index, command] of scenario.setup.entries()) {
    const outcome = await run(ctx, command, vars);
    if (!outcome.ok) {
      return failed(`Setup step ${index + 1} failed: ${outcome.message}`, {
        step: index + 1,
        exitCode: outcome.exitCode,
      });
    }
  }

  if (scenario.command) {
    const outcome = await run(ctx, scenario.command, vars);
    if (!outcome.ok) {
      return failed(`Scenario failed: ${outcome.message}`, { exitCode: outcome.exitCode });
    }
    if (!scenario.verify) {
      return passed('Scenario completed', { exitCode: outcome.exitCode });
    }
  }

  if (!scenario.verify) {
    return passed('Scenario completed');
  }

  const query = await run(ctx, scenario.verify.command, vars);
  if (!query.ok) {
    return failed(`Verification query failed: ${query.message}`, { exitCode: query.exitCode });
  }
  const records = extractRecords(query.json);
  if (!records) {
    return failed('Verification query returned no records');
  }
  const verification = verifyRecords(records, scenario.verify.expect);
  const details = { recordCount: verification.recordCount, expect: scenario.verify.expect };
  return verification.ok ? passed(verification.message, details) : failed(verification.message, details);
}

export const functionalStage: StageRunner<'functional'> = {
  kind: 'functional',
  run: (descriptor, ctx) => runScenario(ctx, descriptor),
};

export const bulkStage: StageRunner<'bulk'> = {
  kind: 'bulk',
  run: async (descriptor, ctx) => {
    const outcome = await runScenario(ctx, descriptor, { scale: descriptor.scale });
    return { ...outcome, details: { ...outcome.details, scale: descriptor.scale } };
  },
};
