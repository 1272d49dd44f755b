import { randomBytes } from 'crypto';
import path from 'path';
import {
  canonicalDigest,
  type HarnessConfig,
  type Logger,
  type Task,
} from '@patchproof/shared';

/**
 * Everything a worker needs about the run it belongs to. Passed explicitly; there is no run-global state.
 */
export interface RunContext {
  runId: string;
  modelId: string;
  config: HarnessConfig;
  logger: Logger;
  /** Aborts on an external interrupt or when the run deadline passes */
  signal: AbortSignal;
  configDigest: string;
  /** `<outputDir>/<runId>` */
  runDir: string;
}

export function createRunId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace(/\.\d+Z$/, 'Z');
  return `${stamp}-${randomBytes(3).toString('hex')}`;
}

/**
 * Digest of everything that affects scoring: the model, the task definitions, the solution set
 * when it is known up front, and the evaluation sections of the config. Worker counts and
 * output paths are left out so a resume may change them.
 */
export function computeConfigDigest(
  modelId: string,
  tasks: readonly Task[],
  config: HarnessConfig,
  solutionsDigest?: string,
): string {
  return canonicalDigest({
    modelId,
    solutions: solutionsDigest ?? null,
    tasks: [...tasks].sort((a, b) => a.id.localeCompare(b.id)),
    scoring: config.scoring,
    retry: config.retry,
    timeouts: config.timeouts,
    environment: config.environment,
    patch: config.patch,
    tweakCheck: config.tweakCheck,
  });
}

/**
 * Combines the caller's interrupt signal with the run deadline, if any.
 */
export function createRunSignal(options: { deadlineMs?: number; interrupt?: AbortSignal } = {}): AbortSignal {
  const signals: AbortSignal[] = [];
  if (options.interrupt) signals.push(options.interrupt);
  if (options.deadlineMs !== undefined) signals.push(AbortSignal.timeout(options.deadlineMs));
  return signals.length > 0 ? AbortSignal.any(signals) : new AbortController().signal;
}

export interface CreateRunContextOptions {
  modelId: string;
  tasks: readonly Task[];
  config: HarnessConfig;
  logger: Logger;
  /** From the solution source, when it has one */
  solutionsDigest?: string;
  runId?: string;
  interrupt?: AbortSignal;
  cwd?: string;
}

export function createRunContext(options: CreateRunContextOptions): RunContext {
  const runId = options.runId ?? createRunId();
  const deadlineMs = options.config.run.deadlineMs;
  return {
    runId,
    modelId: options.modelId,
    config: options.config,
    logger: options.logger,
    signal: createRunSignal({
      deadlineMs:
        deadlineMs === undefined ? undefined : Math.round(deadlineMs * options.config.timeouts.multiplier),
      interrupt: options.interrupt,
    }),
    configDigest: computeConfigDigest(options.modelId, options.tasks, options.config, options.solutionsDigest),
    runDir: path.resolve(options.cwd ?? process.cwd(), options.config.run.outputDir, runId),
  };
}
