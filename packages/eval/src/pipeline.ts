import {
  CancelledError,
  STAGE_ORDER,
  TimeoutError,
  eventBase,
  isAppError,
  redactString,
  type AttemptState,
  type Logger,
  type StageDescriptor,
  type StageKind,
  type StageResult,
  type Task,
} from '@patchproof/shared';
import type { EnvironmentHandle, EnvironmentProvider } from '@patchproof/exec';
import { createDefaultRegistry, type StageRegistry } from './stages/registry';
import type { StageContext, StageOutcome, StageRunner, WorkspaceView } from './stages/types';
import { stageScore } from './scoring';

export const STAGE_STATE: Record<StageKind, AttemptState> = {
  deploy: 'deploying',
  tests: 'testing',
  functional: 'functional-check',
  bulk: 'bulk-check',
  tweak: 'tweak-check',
};

/** Stages whose plain fail stops the pipeline unless a descriptor says otherwise */
export const DEFAULT_GATES: readonly StageKind[] = ['deploy', 'functional'];

export interface ValidationPipelineOptions {
  logger: Logger;
  runId: string;
  /** Timeout for stages that declare none, already scaled */
  stageTimeoutMs: number;
  /** Applied to descriptor timeouts */
  timeoutMultiplier?: number;
  tweakIgnore?: readonly string[];
  gates?: readonly StageKind[];
  registry?: StageRegistry;
  now?: () => number;
}

/** The attempt's own time limit, kept apart from run cancellation */
export interface AttemptDeadline {
  signal: AbortSignal;
  timeoutMs: number;
}

export interface PipelineInput {
  task: Task;
  env: EnvironmentHandle;
  provider: EnvironmentProvider;
  workspace: WorkspaceView;
  /** Run deadline or external interrupt; aborting it cancels the attempt */
  signal?: AbortSignal;
  deadline?: AttemptDeadline;
  onStateChange?: (state: AttemptState) => void;
}

export interface StageError {
  stage: StageKind;
  error: unknown;
}

export interface PipelineResult {
  /** One result per declared stage, in pipeline order */
  stages: StageResult[];
  /** `scored`, `failed` after a gate stopped the run, or `errored` */
  state: AttemptState;
  error?: StageError;
}

export function orderStages(stages: readonly StageDescriptor[]): StageDescriptor[] {
  return [...stages].sort((a, b) => STAGE_ORDER.indexOf(a.kind) - STAGE_ORDER.indexOf(b.kind));
}

function errorMessage(error: unknown): string {
  const text = error instanceof Error ? error.message : String(error);
  return redactString(text).redacted;
}

/**
 * Runs a task's stages in order against one environment.
 *
 * A stage that throws is recorded as `error` and the remaining stages as `skipped`;
 * a gate stage that fails also skips the rest.
 */
export class ValidationPipeline {
  private readonly registry: StageRegistry;
  private readonly gates: ReadonlySet<StageKind>;
  private readonly now: () => number;

  constructor(private readonly options: ValidationPipelineOptions) {
    this.registry = options.registry ?? createDefaultRegistry();
    this.gates = new Set(options.gates ?? DEFAULT_GATES);
    this.now = options.now ?? Date.now;
  }

  async run(input: PipelineInput): Promise<PipelineResult> {
    const ordered = orderStages(input.task.stages);
    const results: StageResult[] = [];
    let stop: { reason: string; state: AttemptState; error?: StageError } | undefined;

    for (const descriptor of ordered) {
      if (stop) {
        const skipped = this.skipped(descriptor, stop.reason);
        results.push(skipped);
        await this.report(input.task.id, skipped);
        continue;
      }

      input.onStateChange?.(STAGE_STATE[descriptor.kind]);
      const result = await this.runOne(descriptor, input);
      results.push(result.stage);
      await this.report(input.task.id, result.stage);

      if (result.error) {
        stop = {
          reason: `Skipped after ${descriptor.kind} error`,
          state: 'errored',
          error: { stage: descriptor.kind, error: result.error },
        };
      } else if (result.stage.status === 'fail' && this.isGate(descriptor)) {
        stop = { reason: `Skipped after ${descriptor.kind} failed`, state: 'failed' };
      }
    }

    const state = stop?.state ?? 'scored';
    input.onStateChange?.(state);
    return { stages: results, state, error: stop?.error };
  }

  private isGate(descriptor: StageDescriptor): boolean {
    return descriptor.gate ?? this.gates.has(descriptor.kind);
  }

  private timeoutFor(descriptor: StageDescriptor, task: Task): number {
    const declared = descriptor.timeoutMs ?? task.timeouts.stageMs;
    if (declared === undefined) return this.options.stageTimeoutMs;
    return Math.round(declared * (this.options.timeoutMultiplier ?? 1));
  }

  private async runOne(
    descriptor: StageDescriptor,
    input: PipelineInput,
  ): Promise<{ stage: StageResult; error?: unknown }> {
    const runner = this.registry.get(descriptor.kind);
    const timeoutMs = this.timeoutFor(descriptor, input.task);
    const started = this.now();

    try {
      const outcome = await this.withTimeout(runner, descriptor, input, timeoutMs);
      return { stage: this.toResult(descriptor, outcome, this.now() - started) };
    } catch (error) {
      const stage: StageResult = {
        kind: descriptor.kind,
        status: 'error',
        message: errorMessage(error),
        score: 0,
        weight: descriptor.weight,
        fraction: 0,
        durationMs: this.now() - started,
        details: {
          code: isAppError(error) ? error.code : 'UnknownError',
          timeout: error instanceof TimeoutError,
          cancelled: error instanceof CancelledError,
        },
      };
      return { stage, error };
    }
  }

  /**
   * Races the stage against its timeout, the attempt deadline and the run signal. The combined
   * signal is handed to the stage so in-flight commands are killed rather than left running.
   * Only the run signal counts as cancellation; the other two are timeouts.
   */
  private async withTimeout(
    runner: StageRunner,
    descriptor: StageDescriptor,
    input: PipelineInput,
    timeoutMs: number,
  ): Promise<StageOutcome> {
    const timeout = AbortSignal.timeout(timeoutMs);
    const signal = AbortSignal.any(
      [input.signal, input.deadline?.signal, timeout].filter((s): s is AbortSignal => s !== undefined),
    );

    const abortError = (): Error => {
      if (input.signal?.aborted) return new CancelledError(`Stage ${descriptor.kind} cancelled`);
      if (input.deadline?.signal.aborted) {
        const deadlineMs = input.deadline.timeoutMs;
        return new TimeoutError(`Attempt timed out after ${deadlineMs}ms during ${descriptor.kind}`, {
          timeoutMs: deadlineMs,
        });
      }
      return new TimeoutError(`Stage ${descriptor.kind} timed out after ${timeoutMs}ms`, { timeoutMs });
    };

    let rejectAborted: (error: Error) => void = () => undefined;
    const aborted = new Promise<never>((_, reject) => {
      rejectAborted = reject;
    });
    const onAbort = () => rejectAborted(abortError());
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });

    const ctx: StageContext = {
      task: input.task,
      env: input.env,
      provider: input.provider,
      workspace: input.workspace,
      signal,
      timeoutMs,
      tweakIgnore: this.options.tweakIgnore ?? [],
      logger: this.options.logger,
    };

    try {
      return await Promise.race([runner.run(descriptor, ctx), aborted]);
    } catch (error) {
      // A command killed by the stage signal surfaces as the abort reason, not as its own error
      if (signal.aborted && error instanceof CancelledError) throw abortError();
      throw error;
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  private toResult(descriptor: StageDescriptor, outcome: StageOutcome, durationMs: number): StageResult {
    const fraction = Math.max(0, Math.min(1, outcome.fraction));
    return {
      kind: descriptor.kind,
      status: outcome.status,
      message: outcome.message,
      score: stageScore(descriptor.weight, fraction),
      weight: descriptor.weight,
      fraction,
      durationMs,
      details: outcome.details,
    };
  }

  private skipped(descriptor: StageDescriptor, reason: string): StageResult {
    return {
      kind: descriptor.kind,
      status: 'skipped',
      message: reason,
      score: 0,
      weight: descriptor.weight,
      fraction: 0,
      durationMs: 0,
      details: {},
    };
  }

  private async report(taskId: string, stage: StageResult): Promise<void> {
    await this.options.logger.trace(
      {
        ...eventBase(this.options.runId),
        type: 'StageFinished',
        payload: {
          taskId,
          stage: stage.kind,
          status: stage.status,
          score: stage.score,
          durationMs: stage.durationMs,
          message: stage.message,
        },
      },
      `${stage.kind}: ${stage.status} (${stage.score}/${stage.weight}) ${stage.message}`,
    );
  }
}
