import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { Solution, Task } from '@patchproof/shared';
import { GitRepositoryProvider, PatchApplier } from '@patchproof/repo';
import { EnvironmentLifecycleManager, ProvisionErrorClassifier } from '@patchproof/exec';
import { FakeEnvironmentProvider, type FakeProviderScript } from '@patchproof/exec/testing';
import { ValidationPipeline } from '@patchproof/eval';
import {
  ROUTER_DIFF,
  createSourceRepo,
  makeTask,
  makeTempRoot,
  passingCommands,
  testContext,
} from '../__fixtures__/harness';
import { AttemptRunner } from './attempt';

describe('AttemptRunner', () => {
  let root: string;
  let task: Task;

  beforeEach(async () => {
    root = await makeTempRoot();
    task = makeTask('lead-routing', await createSourceRepo(root));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  function setup(script: FakeProviderScript, signal?: AbortSignal) {
    const ctx = testContext({ root, tasks: [task], signal });
    const provider = new FakeEnvironmentProvider(script);
    const sleeps: number[] = [];
    const classifier = new ProvisionErrorClassifier();
    const lifecycle = new EnvironmentLifecycleManager({
      provider,
      retry: ctx.config.retry,
      logger: ctx.logger,
      runId: ctx.runId,
      classifier,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });
    const pipeline = new ValidationPipeline({
      logger: ctx.logger,
      runId: ctx.runId,
      stageTimeoutMs: 10_000,
      tweakIgnore: ctx.config.tweakCheck.ignore,
    });
    const runner = new AttemptRunner(ctx, {
      repositories: new GitRepositoryProvider(),
      patcher: new PatchApplier(),
      lifecycle,
      provider,
      pipeline,
      classifier,
    });
    return { ctx, provider, sleeps, runner };
  }

  const solution = (diffText: string): Solution => ({
    taskId: 'lead-routing',
    modelId: 'model-x',
    diffText,
    source: 'file',
  });

  const workspaceDir = () => path.join(root, 'workspaces', 'run-test', 'lead-routing');

  it('resolves a correct solution and tears its environment down', async () => {
    const { ctx, provider, runner } = setup({ onCommand: passingCommands() });

    const result = await runner.run(task, solution(ROUTER_DIFF), 1);

    expect(result.classification).toBe('resolved');
    expect(result.state).toBe('scored');
    expect(result.score).toBe(100);
    expect(result.maxScore).toBe(100);
    expect(result.failure).toBeUndefined();
    expect(result.patch).toEqual({
      applied: true,
      strategyUsed: 'strict',
      filesChanged: ['src/router.ts'],
      rejectedFiles: [],
    });
    expect(result.envId).toBe('env-1');
    expect(provider.destroyed).toEqual(['env-1']);
    expect(provider.deploys).toEqual([{ workingDir: workspaceDir(), sourceDir: undefined }]);
    expect(ctx.logger.eventsOfType('AttemptFinished').map((e) => e.payload.classification)).toEqual(['resolved']);
    await expect(fs.stat(workspaceDir())).rejects.toThrow();
  });

  it('short-circuits an empty solution before provisioning', async () => {
    const { ctx, provider, runner } = setup({ onCommand: passingCommands() });

    const result = await runner.run(task, solution(''), 1);

    expect(result.classification).toBe('failed');
    expect(result.score).toBe(0);
    expect(result.maxScore).toBe(100);
    expect(result.stages).toEqual([]);
    expect(result.solution.empty).toBe(true);
    expect(result.failure).toEqual({ kind: 'ModelFailure', code: 'PatchInvalid', message: 'Empty diff' });
    expect(provider.createCalls).toBe(0);
    expect(ctx.logger.eventsOfType('PatchRejected').map((e) => e.payload.reason)).toEqual(['Empty diff']);
  });

  it('scores a failed functional check at 30 and attributes it to the model', async () => {
    const { provider, runner } = setup({
      onCommand: passingCommands({ 'query-leads': { json: { status: 0, result: { records: [{ Status: 'Open' }] } } } }),
    });

    const result = await runner.run(task, solution(ROUTER_DIFF), 1);

    expect(result.score).toBe(30);
    expect(result.classification).toBe('failed');
    expect(result.state).toBe('failed');
    expect(result.stages.map((s) => s.status)).toEqual(['pass', 'pass', 'fail', 'skipped', 'skipped']);
    expect(result.failure).toEqual({
      kind: 'ModelFailure',
      code: 'StageFailed',
      message: "Field Status expected 'Qualified', got 'Open'",
      stage: 'functional',
    });
    expect(provider.destroyCalls).toBe(1);
  });

  it('destroys the environment exactly once when a stage throws', async () => {
    const { provider, runner } = setup({
      onCommand: (request) => {
        if (request.command === 'run-tests') throw new Error('connection lost');
        return {};
      },
    });

    const result = await runner.run(task, solution(ROUTER_DIFF), 1);

    expect(result.classification).toBe('errored');
    expect(result.failure).toEqual({ kind: 'ToolError', code: 'UnknownError', message: 'connection lost', stage: 'tests' });
    expect(result.stages.map((s) => s.status)).toEqual(['pass', 'error', 'skipped', 'skipped', 'skipped']);
    expect(provider.createCalls).toBe(1);
    expect(provider.destroyCalls).toBe(1);
    expect(provider.leaked()).toEqual([]);
  });

  it('reports a platform constraint at provisioning as a failure, not an error', async () => {
    const { provider, runner } = setup({
      createFailures: [new Error('NOT_SUPPORTED_BY_EDITION: Platform Encryption is not available')],
    });

    const result = await runner.run(task, solution(ROUTER_DIFF), 1);

    expect(result.classification).toBe('failed');
    expect(result.failure?.kind).toBe('PlatformConstraint');
    expect(result.failure?.constraint).toBe('NOT_SUPPORTED_BY_EDITION');
    expect(provider.createCalls).toBe(1);
    expect(provider.destroyCalls).toBe(0);
  });

  it('errors without retrying when the environment quota is exhausted', async () => {
    const { provider, runner, sleeps } = setup({
      createFailures: [new Error('LIMIT_EXCEEDED: daily scratch org limit reached')],
    });

    const result = await runner.run(task, solution(ROUTER_DIFF), 1);

    expect(result.classification).toBe('errored');
    expect(result.failure?.kind).toBe('ToolError');
    expect(result.failure?.code).toBe('EnvironmentUnavailable');
    expect(result.failure?.constraint).toBeUndefined();
    expect(provider.createCalls).toBe(1);
    expect(sleeps).toEqual([]);
  });

  it('retries an API request limit and then provisions', async () => {
    const limited = () => new Error('REQUEST_LIMIT_EXCEEDED: TotalRequests Limit exceeded.');
    const { provider, runner, sleeps } = setup({
      createFailures: [limited(), limited()],
      onCommand: passingCommands(),
    });

    const result = await runner.run(task, solution(ROUTER_DIFF), 1);

    expect(result.classification).toBe('resolved');
    expect(provider.createCalls).toBe(3);
    expect(sleeps).toEqual([2000, 4000]);
  });

  it('records an attempt that outlives its own deadline as a timeout', async () => {
    task = { ...task, timeouts: { attemptMs: 4000 } };
    const passing = passingCommands();
    const { provider, runner } = setup({
      onCommand: (request, handle) =>
        request.command === 'run-tests' ? new Promise<never>(() => undefined) : passing(request, handle),
    });

    const result = await runner.run(task, solution(ROUTER_DIFF), 1);

    expect(result.classification).toBe('errored');
    expect(result.failure).toEqual({
      kind: 'ToolError',
      code: 'TimeoutError',
      message: 'Attempt timed out after 4000ms during tests',
      stage: 'tests',
      timeout: true,
    });
    expect(result.stages.map((s) => s.status)).toEqual(['pass', 'error', 'skipped', 'skipped', 'skipped']);
    expect(provider.destroyCalls).toBe(1);
  });

  it('errors after transient provisioning failures exhaust the retries', async () => {
    const transient = () => new Error('connect ETIMEDOUT');
    const { provider, runner, sleeps } = setup({
      createFailures: [transient(), transient(), transient()],
    });

    const result = await runner.run(task, solution(ROUTER_DIFF), 1);

    expect(result.classification).toBe('errored');
    expect(result.failure?.kind).toBe('ToolError');
    expect(result.failure?.code).toBe('EnvironmentUnavailable');
    expect(provider.createCalls).toBe(3);
    expect(sleeps).toEqual([2000, 4000]);
  });

  it('records a cancelled attempt without touching the repository', async () => {
    const controller = new AbortController();
    controller.abort();
    const { provider, runner } = setup({ onCommand: passingCommands() }, controller.signal);

    const result = await runner.run(task, solution(ROUTER_DIFF), 1);

    expect(result.classification).toBe('errored');
    expect(result.failure).toEqual({
      kind: 'ToolError',
      code: 'CancelledError',
      message: 'Run cancelled before the attempt started',
      stage: undefined,
      cancelled: true,
    });
    expect(provider.createCalls).toBe(0);
    await expect(fs.stat(workspaceDir())).rejects.toThrow();
  });
});
