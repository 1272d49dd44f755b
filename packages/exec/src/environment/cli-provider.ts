import * as path from 'path';
import { withDir } from 'tmp-promise';
import {
  extractJsonObject,
  getPath,
  isRecord,
  redactString,
  type EnvironmentConfig,
} from '@patchproof/shared';
import type { CommandResult, CommandRunner } from '../runner/runner';
import { ProviderCommandError, type ProviderOperation } from './errors';
import { renderArgv, renderCommand } from './template';
import type {
  DeployRequest,
  EnvironmentHandle,
  EnvironmentProvider,
  EnvironmentSpec,
  PreflightReport,
  PreflightRequest,
  ProviderCallOptions,
  ProviderCommandOutcome,
  RunRequest,
} from './types';

const MAX_ERROR_OUTPUT = 4000;

function tryParseJson(text: string, context: string): unknown {
  if (!text.includes('{')) return undefined;
  try {
    return extractJsonObject(text, context);
  } catch {
    // Plain-text output; the exit code decides.
    return undefined;
  }
}

function lastLine(text: string): string | undefined {
  return text
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean)
    .pop();
}

/**
 * Reads a provider command's result. JSON output may follow warning lines;
 * a numeric `status` in it overrides the process exit code.
 */
export function interpretOutput(result: CommandResult, operation: string): ProviderCommandOutcome {
  const json = tryParseJson(result.stdout, operation);
  const status = isRecord(json) ? json.status : undefined;
  const ok = typeof status === 'number' ? status === 0 : result.exitCode === 0;

  let message = '';
  if (isRecord(json) && typeof json.message === 'string') {
    message = json.message;
  } else if (!ok) {
    message =
      lastLine(result.stderr) ?? lastLine(result.stdout) ?? `exited with code ${result.exitCode}`;
  }

  return { ...result, ok, json, message };
}

export interface CommandTemplateProviderOptions {
  /** Scales the per-operation timeouts from the config */
  timeoutMultiplier?: number;
}

/**
 * Drives an environment through the command templates in `environment.commands`.
 * Creation and teardown run in a scratch directory so the provider CLI never picks up
 * project files from the caller's working directory.
 */
export class CommandTemplateProvider implements EnvironmentProvider {
  private readonly multiplier: number;

  constructor(
    private readonly config: EnvironmentConfig,
    private readonly runner: CommandRunner,
    options: CommandTemplateProviderOptions = {},
  ) {
    this.multiplier = options.timeoutMultiplier ?? 1;
  }

  private timeout(ms: number, override?: number): number {
    return override ?? Math.round(ms * this.multiplier);
  }

  private failure(operation: ProviderOperation, outcome: ProviderCommandOutcome): ProviderCommandError {
    const output = redactString([outcome.stderr, outcome.stdout].filter(Boolean).join('\n')).redacted;
    return new ProviderCommandError(operation, `${operation} failed: ${outcome.message}`, {
      exitCode: outcome.exitCode,
      output: output.slice(0, MAX_ERROR_OUTPUT),
    });
  }

  private inScratchDir(
    operation: ProviderOperation,
    argv: string[],
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<ProviderCommandOutcome> {
    return withDir(
      async ({ path: scratchDir }) =>
        interpretOutput(await this.runner.run({ command: argv, cwd: scratchDir, timeoutMs, signal }), operation),
      { unsafeCleanup: true, prefix: 'patchproof-env-' },
    );
  }

  /**
   * Runs `commands.preflight`, when configured, and reads the remaining capacity from its
   * JSON output at `capacityPath`.
   */
  async preflight(request: PreflightRequest, options: ProviderCallOptions = {}): Promise<PreflightReport> {
    const template = this.config.commands.preflight;
    if (template === undefined || template.trim() === '') {
      return { message: 'No pre-flight command configured' };
    }

    const outcome = await this.inScratchDir(
      'preflight',
      renderArgv(template, { required: request.required }),
      this.timeout(this.config.commandTimeoutMs, options.timeoutMs),
      options.signal,
    );
    if (!outcome.ok) throw this.failure('preflight', outcome);

    const capacityPath = this.config.capacityPath;
    if (capacityPath === undefined) return { message: outcome.message };
    const available = getPath(outcome.json, capacityPath);
    if (typeof available !== 'number') {
      throw new ProviderCommandError('preflight', `preflight output has no capacity at "${capacityPath}"`, {
        exitCode: outcome.exitCode,
        output: outcome.stdout.slice(0, MAX_ERROR_OUTPUT),
      });
    }
    return { available, message: outcome.message };
  }

  async create(spec: EnvironmentSpec, options: ProviderCallOptions = {}): Promise<EnvironmentHandle> {
    const argv = renderArgv(this.config.commands.create, {
      alias: spec.alias,
      taskId: spec.taskId,
      definitionFile: path.resolve(spec.workingDir, this.config.definitionFile),
      durationDays: this.config.durationDays,
      workingDir: spec.workingDir,
    });

    const outcome = await this.inScratchDir(
      'create',
      argv,
      this.timeout(this.config.createTimeoutMs, options.timeoutMs),
      options.signal,
    );
    if (!outcome.ok) throw this.failure('create', outcome);

    const envId = getPath(outcome.json, this.config.idPath);
    if (typeof envId !== 'string' || envId === '') {
      throw new ProviderCommandError(
        'create',
        `create output has no environment id at "${this.config.idPath}"`,
        { exitCode: outcome.exitCode, output: outcome.stdout.slice(0, MAX_ERROR_OUTPUT) },
      );
    }

    const result = getPath(outcome.json, 'result');
    return {
      envId,
      alias: spec.alias,
      createdAt: new Date().toISOString(),
      metadata: isRecord(result) ? result : {},
    };
  }

  async deploy(
    handle: EnvironmentHandle,
    request: DeployRequest,
    options: ProviderCallOptions = {},
  ): Promise<ProviderCommandOutcome> {
    const argv = renderArgv(this.config.commands.deploy, {
      envId: handle.envId,
      alias: handle.alias,
      sourceDir: path.resolve(request.workingDir, request.sourceDir ?? '.'),
      workingDir: request.workingDir,
    });
    const result = await this.runner.run({
      command: argv,
      cwd: request.workingDir,
      timeoutMs: this.timeout(this.config.deployTimeoutMs, options.timeoutMs),
      signal: options.signal,
    });
    return interpretOutput(result, 'deploy');
  }

  async runCommand(
    handle: EnvironmentHandle,
    request: RunRequest,
    options: ProviderCallOptions = {},
  ): Promise<ProviderCommandOutcome> {
    const vars = { envId: handle.envId, alias: handle.alias, ...request.vars };
    const commandLine = renderCommand(request.command, vars);
    const template = this.config.commands.run.trim();
    const command = template === '{command}' ? commandLine : renderArgv(template, { ...vars, command: commandLine });

    const result = await this.runner.run({
      command,
      cwd: request.cwd,
      timeoutMs: this.timeout(this.config.commandTimeoutMs, options.timeoutMs),
      signal: options.signal,
    });
    return interpretOutput(result, 'run');
  }

  async destroy(handle: EnvironmentHandle, options: ProviderCallOptions = {}): Promise<void> {
    const argv = renderArgv(this.config.commands.destroy, {
      envId: handle.envId,
      alias: handle.alias,
    });
    const outcome = await this.inScratchDir(
      'destroy',
      argv,
      this.timeout(this.config.destroyTimeoutMs, options.timeoutMs),
      options.signal,
    );
    if (!outcome.ok) throw this.failure('destroy', outcome);
  }
}
