import path from 'path';
import {
  CancelledError,
  TimeoutError,
  eventBase,
  scaleTimeout,
  sha256,
  toError,
  type AttemptClassification,
  type AttemptResult,
  type AttemptState,
  type FailureRecord,
  type PatchSummary,
  type Solution,
  type StageResult,
  type Task,
} from '@patchproof/shared';
import {
  snapshotWorkingTree,
  type PatchApplier,
  type PreparedWorkspace,
  type RepositoryProvider,
} from '@patchproof/repo';
import type {
  EnvironmentLifecycleManager,
  EnvironmentProvider,
  ProvisionErrorClassifier,
} from '@patchproof/exec';
import {
  classifyStages,
  maxScore,
  totalScore,
  type AttemptDeadline,
  type ValidationPipeline,
  type WorkspaceView,
} from '@patchproof/eval';
import type { RunContext } from './context';
import { failureFromError, failureFromStages } from './failure';

/**
 * An abort surfaces as whatever the interrupted call threw. Run cancellation wins over the
 * attempt's own deadline, which is a timeout rather than a cancellation.
 */
function attributeAbort(error: unknown, signal: AbortSignal, deadline: AttemptDeadline): unknown {
  if (signal.aborted) {
    return error instanceof CancelledError ? error : new CancelledError('Run cancelled', { cause: error });
  }
  if (deadline.signal.aborted && !(error instanceof TimeoutError)) {
    return new TimeoutError(`Attempt timed out after ${deadline.timeoutMs}ms`, {
      timeoutMs: deadline.timeoutMs,
      cause: error,
    });
  }
  return error;
}

export interface AttemptRunnerDeps {
  repositories: RepositoryProvider;
  patcher: PatchApplier;
  lifecycle: EnvironmentLifecycleManager;
  provider: EnvironmentProvider;
  pipeline: ValidationPipeline;
  classifier: ProvisionErrorClassifier;
  now?: () => Date;
}

/** Mutable while the attempt runs; frozen into an AttemptResult at the end */
interface Attempt {
  state: AttemptState;
  patch: PatchSummary;
  stages: StageResult[];
  failure?: FailureRecord;
  envId?: string;
}

/**
 * Evaluates one solution for one task: working copy, patch, environment, stages, result.
 * Never throws; every failure ends up in the returned result.
 */
export class AttemptRunner {
  private readonly now: () => Date;

  constructor(
    private readonly ctx: RunContext,
    private readonly deps: AttemptRunnerDeps,
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  async run(task: Task, solution: Solution, workerId: number, signal: AbortSignal = this.ctx.signal): Promise<AttemptResult> {
    const startedAt = this.now();
    const logger = this.ctx.logger.child({ taskId: task.id, worker: workerId });
    await logger.trace(
      { ...eventBase(this.ctx.runId), type: 'AttemptStarted', payload: { taskId: task.id, workerId } },
      `Starting ${task.id}`,
    );

    const attempt: Attempt = {
      state: 'pending',
      patch: { applied: false, filesChanged: [], rejectedFiles: [] },
      stages: [],
    };

    const attemptMs = scaleTimeout(task.timeouts.attemptMs ?? this.ctx.config.timeouts.attemptMs, this.ctx.config);
    const deadline: AttemptDeadline = { signal: AbortSignal.timeout(attemptMs), timeoutMs: attemptMs };
    const attemptSignal = AbortSignal.any([signal, deadline.signal]);

    let workspace: PreparedWorkspace | undefined;
    try {
      if (signal.aborted) throw new CancelledError('Run cancelled before the attempt started');

      workspace = await this.deps.repositories.prepare(
        task,
        path.join(path.resolve(this.ctx.config.run.workspaceDir), this.ctx.runId, task.id),
        { timeoutMs: scaleTimeout(this.ctx.config.timeouts.cloneMs, this.ctx.config), signal: attemptSignal },
      );
      await this.evaluate(task, solution, workspace, attempt, signal, deadline);
    } catch (error) {
      attempt.failure = failureFromError(attributeAbort(error, signal, deadline));
      attempt.state = attempt.failure.kind === 'PlatformConstraint' ? 'failed' : 'errored';
      await logger.error(toError(error), `Attempt ${task.id} ended early`);
    } finally {
      if (workspace) {
        await this.deps.repositories.release(workspace).catch((error: unknown) =>
          logger.warn(`Could not remove working copy ${workspace?.dir}: ${toError(error).message}`),
        );
      }
    }

    const result = this.finish(task, solution, attempt, startedAt);
    await logger.trace(
      {
        ...eventBase(this.ctx.runId),
        type: 'AttemptFinished',
        payload: {
          taskId: task.id,
          classification: result.classification,
          score: result.score,
          durationMs: result.durationMs,
          failureKind: result.failure?.kind,
        },
      },
      `${task.id}: ${result.classification} (${result.score}/${result.maxScore})`,
    );
    return result;
  }

  private async evaluate(
    task: Task,
    solution: Solution,
    workspace: PreparedWorkspace,
    attempt: Attempt,
    signal: AbortSignal,
    deadline: AttemptDeadline,
  ): Promise<void> {
    const applied = await this.deps.patcher.apply(workspace.dir, solution.diffText);
    attempt.patch = {
      applied: applied.applied,
      strategyUsed: applied.strategyUsed,
      filesChanged: applied.filesChanged,
      rejectedFiles: applied.rejectedFiles,
    };

    if (!applied.applied) {
      const reason = applied.error?.message ?? 'Patch could not be applied';
      await this.ctx.logger.trace(
        {
          ...eventBase(this.ctx.runId),
          type: 'PatchRejected',
          payload: { taskId: task.id, reason, attempts: applied.error?.attempts ?? [] },
        },
        `Patch for ${task.id} rejected: ${reason}`,
      );
      attempt.failure = failureFromError(applied.error);
      attempt.state = 'failed';
      return;
    }

    await this.ctx.logger.trace(
      {
        ...eventBase(this.ctx.runId),
        type: 'PatchApplied',
        payload: {
          taskId: task.id,
          strategyUsed: applied.strategyUsed ?? 'unknown',
          filesChanged: applied.filesChanged,
          rejectedFiles: applied.rejectedFiles,
        },
      },
      `Patch for ${task.id} applied with ${applied.strategyUsed}`,
    );

    const ignore = this.ctx.config.tweakCheck.ignore;
    const view: WorkspaceView = {
      dir: workspace.dir,
      patchedFiles: applied.filesChanged,
      baseline: await snapshotWorkingTree(workspace.git, workspace.dir, ignore),
      snapshot: (paths) => snapshotWorkingTree(workspace.git, workspace.dir, paths),
    };

    const spec = {
      taskId: task.id,
      alias: `${this.ctx.config.environment.aliasPrefix}-${task.id}-${this.now().getTime()}`,
      workingDir: workspace.dir,
    };

    const outcome = await this.deps.lifecycle.withEnvironment(
      spec,
      async ({ handle }) => {
        attempt.envId = handle.envId;
        return this.deps.pipeline.run({
          task,
          env: handle,
          provider: this.deps.provider,
          workspace: view,
          signal,
          deadline,
          onStateChange: (state) => {
            attempt.state = state;
          },
        });
      },
      AbortSignal.any([signal, deadline.signal]),
    );

    attempt.stages = outcome.stages;
    attempt.state = outcome.state;
    if (outcome.error) {
      attempt.failure = failureFromError(outcome.error.error, outcome.error.stage);
    }
  }

  private finish(task: Task, solution: Solution, attempt: Attempt, startedAt: Date): AttemptResult {
    const finishedAt = this.now();
    const stages = attempt.stages;
    const max = stages.length > 0 ? maxScore(stages) : maxScore(task.stages);

    let classification: AttemptClassification;
    let failure = attempt.failure;
    if (failure) {
      classification = failure.kind === 'ToolError' ? 'errored' : 'failed';
    } else {
      classification = classifyStages(stages, this.ctx.config.scoring.resolveThreshold);
      if (classification === 'failed') failure = failureFromStages(stages, this.deps.classifier);
    }

    return {
      taskId: task.id,
      modelId: solution.modelId,
      solution: {
        source: solution.source,
        digest: sha256(solution.diffText),
        empty: solution.diffText.trim() === '',
      },
      patch: attempt.patch,
      stages,
      score: totalScore(stages),
      maxScore: max,
      classification,
      state: attempt.state,
      failure,
      envId: attempt.envId,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
    };
  }
}
