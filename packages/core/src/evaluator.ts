import {
  CancelledError,
  ToolError,
  eventBase,
  scaleTimeout,
  sha256,
  toError,
  type AttemptResult,
  type Report,
  type Sleep,
  type Solution,
  type Task,
} from '@patchproof/shared';
import { GitRepositoryProvider, PatchApplier, type RepositoryProvider } from '@patchproof/repo';
import {
  EnvironmentLifecycleManager,
  ProvisionErrorClassifier,
  type EnvironmentProvider,
  type PreflightReport,
} from '@patchproof/exec';
import { ValidationPipeline, maxScore, type StageRegistry } from '@patchproof/eval';
import { CheckpointStore, type CheckpointLoadResult } from './checkpoint/store';
import { buildReport } from './report/builder';
import { AttemptRunner } from './run/attempt';
import type { RunContext } from './run/context';
import { failureFromError } from './run/failure';
import type { SolutionSource } from './solutions/sources';

export interface EvaluatorOptions {
  solutions: SolutionSource;
  provider: EnvironmentProvider;
  repositories?: RepositoryProvider;
  registry?: StageRegistry;
  /** Replaces the retry backoff sleep */
  sleep?: Sleep;
  now?: () => Date;
}

export interface EvaluationOutcome {
  report: Report;
  checkpoint: CheckpointLoadResult;
  /** Environment ids whose teardown failed after every retry */
  leakedEnvironments: string[];
}

/**
 * Evaluates a batch of tasks on a bounded pool of workers and aggregates the results.
 *
 * Each worker handles one attempt at a time and so owns at most one environment. A task that
 * blows up inside its worker is recorded as errored and the worker moves on. Once the run signal
 * aborts, no new task is started.
 */
export class Evaluator {
  private readonly classifier: ProvisionErrorClassifier;
  private readonly lifecycle: EnvironmentLifecycleManager;
  private readonly runner: AttemptRunner;
  private readonly checkpoint?: CheckpointStore;
  private readonly now: () => Date;

  constructor(
    private readonly ctx: RunContext,
    private readonly options: EvaluatorOptions,
  ) {
    const { config, logger, runId } = ctx;
    this.now = options.now ?? (() => new Date());

    this.classifier = new ProvisionErrorClassifier({
      transient: config.environment.transientPatterns,
      terminal: config.environment.terminalPatterns,
      platformConstraint: config.environment.platformConstraintPatterns,
    });
    this.lifecycle = new EnvironmentLifecycleManager({
      provider: options.provider,
      retry: config.retry,
      logger,
      runId,
      classifier: this.classifier,
      sleep: options.sleep,
      destroyTimeoutMs: scaleTimeout(config.environment.destroyTimeoutMs, config),
    });
    const pipeline = new ValidationPipeline({
      logger,
      runId,
      stageTimeoutMs: scaleTimeout(config.timeouts.stageMs, config),
      timeoutMultiplier: config.timeouts.multiplier,
      tweakIgnore: config.tweakCheck.ignore,
      registry: options.registry,
    });
    const patcher = new PatchApplier({
      maxFilesChanged: config.patch.maxFilesChanged,
      maxLinesTouched: config.patch.maxLinesTouched,
      fuzzFactor: config.patch.fuzzFactor,
      timeoutMs: scaleTimeout(config.timeouts.patchMs, config),
    });

    this.runner = new AttemptRunner(ctx, {
      repositories: options.repositories ?? new GitRepositoryProvider({ keep: config.run.keepWorkspaces }),
      patcher,
      lifecycle: this.lifecycle,
      provider: options.provider,
      pipeline,
      classifier: this.classifier,
      now: options.now,
    });

    if (config.checkpoint.enabled) {
      this.checkpoint = new CheckpointStore({
        runDir: ctx.runDir,
        runId,
        configDigest: ctx.configDigest,
      });
    }
  }

  async run(tasks: readonly Task[]): Promise<EvaluationOutcome> {
    const { config, logger, runId, signal } = this.ctx;
    const startedAt = this.now();

    const checkpoint: CheckpointLoadResult = this.checkpoint
      ? await this.checkpoint.open(config.checkpoint.onMismatch)
      : { status: 'fresh', completedTaskIds: [], results: [] };
    await logger.trace(
      {
        ...eventBase(runId),
        type: 'CheckpointLoaded',
        payload: {
          status: checkpoint.status,
          completedTaskIds: checkpoint.completedTaskIds,
          reason: checkpoint.status === 'mismatch' ? checkpoint.reason : undefined,
        },
      },
      checkpoint.status === 'mismatch'
        ? `Checkpoint discarded (${checkpoint.reason}); starting clean`
        : `Checkpoint ${checkpoint.status}: ${checkpoint.completedTaskIds.length} task(s) already done`,
    );

    const results = new Map<string, AttemptResult>();
    const wanted = new Set(tasks.map((t) => t.id));
    for (const result of checkpoint.results) {
      if (wanted.has(result.taskId)) results.set(result.taskId, result);
    }
    const pending = tasks.filter((t) => !results.has(t.id));
    const workerCount = Math.max(1, Math.min(config.run.maxWorkers, pending.length));
    if (pending.length > 0) await this.preflight(workerCount);

    await logger.trace(
      {
        ...eventBase(runId),
        type: 'RunStarted',
        payload: {
          modelId: this.ctx.modelId,
          taskCount: tasks.length,
          maxWorkers: config.run.maxWorkers,
          configDigest: this.ctx.configDigest,
        },
      },
      `Run ${runId}: ${pending.length} of ${tasks.length} task(s) to evaluate on ${workerCount} worker(s)`,
    );

    let next = 0;
    const worker = async (workerId: number): Promise<void> => {
      while (!signal.aborted && next < pending.length) {
        const task = pending[next++];
        const result = await this.attempt(task, workerId);
        results.set(task.id, result);
        await this.record(result);
      }
    };

    const settled = await Promise.allSettled(
      Array.from({ length: pending.length > 0 ? workerCount : 0 }, (_, i) => worker(i + 1)),
    );
    await this.checkpoint?.flush();

    const teardown = await this.lifecycle.teardownSummary();
    if (teardown.failed.length > 0) {
      await logger.warn(`Environments left behind after failed teardown: ${teardown.failed.join(', ')}`);
    }

    // Only a checkpoint write can reject a worker; losing durability ends the run
    const rejected = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected');
    if (rejected) throw toError(rejected.reason);

    const finishedAt = this.now();
    const report = buildReport({
      runId,
      modelId: this.ctx.modelId,
      configDigest: this.ctx.configDigest,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      cancelled: signal.aborted,
      results: tasks.flatMap((t) => results.get(t.id) ?? []),
    });

    await logger.trace(
      {
        ...eventBase(runId),
        type: 'RunFinished',
        payload: {
          resolved: report.summary.resolved,
          failed: report.summary.failed,
          errored: report.summary.errored,
          cancelled: report.cancelled,
          durationMs: finishedAt.getTime() - startedAt.getTime(),
        },
      },
      `Run ${runId} finished: ${report.summary.resolved} resolved, ${report.summary.failed} failed, ${report.summary.errored} errored`,
    );

    return { report, checkpoint, leakedEnvironments: teardown.failed };
  }

  /**
   * Asks the provider, once, whether it can serve the run. A provider without the capability passes.
   */
  private async preflight(required: number): Promise<void> {
    const { provider } = this.options;
    if (!provider.preflight) return;

    let report: PreflightReport;
    try {
      report = await provider.preflight(
        { required },
        { signal: this.ctx.signal, timeoutMs: scaleTimeout(this.ctx.config.environment.commandTimeoutMs, this.ctx.config) },
      );
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      throw new ToolError(`Pre-flight check failed: ${toError(error).message}`, { cause: error });
    }

    if (report.available !== undefined && report.available < required) {
      throw new ToolError(
        `Pre-flight check failed: ${required} environment(s) needed at once, ${report.available} available`,
        { details: { required, available: report.available } },
      );
    }

    await this.ctx.logger.trace(
      {
        ...eventBase(this.ctx.runId),
        type: 'PreflightChecked',
        payload: { required, available: report.available, message: report.message },
      },
      `Pre-flight passed: ${report.message}`,
    );
  }

  private async attempt(task: Task, workerId: number): Promise<AttemptResult> {
    const startedAt = this.now();
    let solution: Solution | undefined;
    try {
      solution = await this.options.solutions.get(task, this.ctx.signal);
      return await this.runner.run(task, solution, workerId, this.ctx.signal);
    } catch (error) {
      await this.ctx.logger.error(toError(error), `Task ${task.id} failed inside worker ${workerId}`);
      return this.erroredResult(task, solution, error, startedAt);
    }
  }

  private erroredResult(task: Task, solution: Solution | undefined, error: unknown, startedAt: Date): AttemptResult {
    const finishedAt = this.now();
    const diffText = solution?.diffText ?? '';
    return {
      taskId: task.id,
      modelId: this.ctx.modelId,
      solution: { source: solution?.source ?? 'none', digest: sha256(diffText), empty: diffText.trim() === '' },
      patch: { applied: false, filesChanged: [], rejectedFiles: [] },
      stages: [],
      score: 0,
      maxScore: maxScore(task.stages),
      classification: 'errored',
      state: 'errored',
      failure: failureFromError(error),
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
    };
  }

  private async record(result: AttemptResult): Promise<void> {
    // A cancelled attempt is re-run on resume rather than remembered as errored
    if (!this.checkpoint || result.failure?.cancelled) return;
    const saved = await this.checkpoint.save(result);
    await this.ctx.logger.trace(
      {
        ...eventBase(this.ctx.runId),
        type: 'CheckpointSaved',
        payload: { taskId: result.taskId, completedCount: saved.completedCount, digest: saved.digest },
      },
      `Checkpointed ${result.taskId} (${saved.completedCount} done)`,
    );
  }
}
