import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import {
  ConfigLoader,
  Evaluator,
  ReportRenderer,
  createRunContext,
  createRunId,
  loadTasks,
  openSolutionSource,
  selectTasks,
  writeReport,
} from '@patchproof/core';
import { CommandTemplateProvider, ProcessCommandRunner } from '@patchproof/exec';
import { CompositeLogger, ConsoleLogger, JsonlLogger } from '@patchproof/shared';
import type { GlobalOptions } from '../program';

export interface RunCommandOptions {
  tasks: string;
  solutions: string;
  model: string;
  task?: string[];
  limit?: number;
  workers?: number;
  runId?: string;
  deadline?: number;
  timeoutMultiplier?: number;
  output?: string;
  keepWorkspaces?: boolean;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return parsed;
}

/**
 * Run flags in the shape of the config file. Unset flags stay undefined and do not override.
 */
export function configFlags(options: RunCommandOptions): Record<string, unknown> {
  return {
    run: {
      maxWorkers: options.workers,
      deadlineMs: options.deadline,
      outputDir: options.output,
      keepWorkspaces: options.keepWorkspaces,
    },
    timeouts: { multiplier: options.timeoutMultiplier },
  };
}

export function registerRunCommand(program: Command) {
  program
    .command('run')
    .description('Evaluate a model\'s solutions against a set of tasks')
    .requiredOption('--tasks <file>', 'Task definitions (JSON or YAML)')
    .requiredOption('--solutions <path>', 'Directory of <taskId>.patch files or a JSON file mapping task ids to diffs')
    .requiredOption('--model <id>', 'Identifier of the model that produced the solutions')
    .option('--task <id...>', 'Only evaluate these task ids')
    .option('--limit <n>', 'Evaluate at most n tasks', parsePositiveInt)
    .option('--workers <n>', 'Concurrent attempts', parsePositiveInt)
    .option('--run-id <id>', 'Run id; reuse one to resume an interrupted run')
    .option('--deadline <ms>', 'Wall-clock budget for the whole run', parsePositiveInt)
    .option('--timeout-multiplier <x>', 'Scale every timeout', parsePositiveNumber)
    .option('--output <dir>', 'Directory for run output')
    .option('--keep-workspaces', 'Leave working copies on disk')
    .action(async (options: RunCommandOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const cwd = process.cwd();
      const config = ConfigLoader.load({ configPath: globalOpts.config, flags: configFlags(options), cwd });
      const tasks = selectTasks(await loadTasks(path.resolve(cwd, options.tasks)), {
        ids: options.task,
        limit: options.limit,
      });
      const solutions = await openSolutionSource(path.resolve(cwd, options.solutions), options.model);

      const runId = options.runId ?? createRunId();
      const trace = new JsonlLogger(path.resolve(cwd, config.run.outputDir, runId, 'trace.jsonl'));
      const logger = new CompositeLogger([
        new ConsoleLogger(globalOpts.verbose ? 'debug' : config.logging.level),
        trace,
      ]);

      const interrupt = new AbortController();
      const onSigint = () => {
        console.error('Interrupted; cancelling in-flight attempts and tearing environments down...');
        interrupt.abort();
      };
      process.once('SIGINT', onSigint);

      try {
        const ctx = createRunContext({
          modelId: options.model,
          tasks,
          config,
          logger,
          solutionsDigest: solutions.digest,
          runId,
          interrupt: interrupt.signal,
          cwd,
        });
        ConfigLoader.writeEffectiveConfig(config, ctx.runDir);

        const provider = new CommandTemplateProvider(
          config.environment,
          new ProcessCommandRunner({
            envAllowlist: config.environment.envAllowlist,
            allowShell: config.environment.allowShell,
          }),
          { timeoutMultiplier: config.timeouts.multiplier },
        );
        const { report, leakedEnvironments } = await new Evaluator(ctx, { solutions, provider }).run(tasks);
        const reportPath = await writeReport(report, ctx.runDir);

        if (globalOpts.json) {
          console.log(JSON.stringify(report, null, 2));
        } else {
          for (const line of new ReportRenderer().render(report)) console.log(line);
          console.log(`\nReport: ${reportPath}`);
          if (leakedEnvironments.length > 0) {
            console.log(`Environments to remove manually: ${leakedEnvironments.join(', ')}`);
          }
          if (report.cancelled) {
            console.log(`Resume with: --run-id ${runId}`);
          }
        }

        // Task failures are outcomes; only a cut-short run is a non-zero exit
        if (report.cancelled) process.exitCode = 1;
      } finally {
        process.off('SIGINT', onSigint);
        await trace.flush();
      }
    });
}
