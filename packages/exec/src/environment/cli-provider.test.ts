import { describe, it, expect } from 'vitest';
import { defaultConfig, type EnvironmentConfig } from '@patchproof/shared';
import type { CommandRequest, CommandResult, CommandRunner } from '../runner/runner';
import { CommandTemplateProvider, interpretOutput } from './cli-provider';
import { ProviderCommandError } from './errors';

class ScriptedRunner implements CommandRunner {
  readonly requests: CommandRequest[] = [];

  constructor(private readonly results: Partial<CommandResult>[]) {}

  async run(request: CommandRequest): Promise<CommandResult> {
    this.requests.push(request);
    return {
      exitCode: 0,
      stdout: '',
      stderr: '',
      durationMs: 1,
      truncated: false,
      ...this.results.shift(),
    };
  }
}

function result(overrides: Partial<CommandResult>): CommandResult {
  return { exitCode: 0, stdout: '', stderr: '', durationMs: 1, truncated: false, ...overrides };
}

const spec = { taskId: 'lead-routing', alias: 'patchproof-lead-routing-1', workingDir: '/work/lead-routing' };

describe('interpretOutput', () => {
  it('reads JSON that follows warning lines', () => {
    const outcome = interpretOutput(
      result({ stdout: 'Warning: update available\n{"status":0,"result":{"username":"u@x"}}' }),
      'create',
    );
    expect(outcome.ok).toBe(true);
    expect(outcome.json).toEqual({ status: 0, result: { username: 'u@x' } });
  });

  it('lets a non-zero JSON status override a zero exit code', () => {
    const outcome = interpretOutput(result({ stdout: '{"status":1,"message":"Deploy failed"}' }), 'deploy');
    expect(outcome.ok).toBe(false);
    expect(outcome.message).toBe('Deploy failed');
  });

  it('lets a zero JSON status override a non-zero exit code', () => {
    const outcome = interpretOutput(result({ exitCode: 1, stdout: '{"status":0,"result":{}}' }), 'deploy');
    expect(outcome.ok).toBe(true);
  });

  it('falls back to the last stderr line for plain-text failures', () => {
    const outcome = interpretOutput(result({ exitCode: 2, stderr: 'first\nsecond\n' }), 'run');
    expect(outcome).toMatchObject({ ok: false, message: 'second', json: undefined });
  });
});

describe('CommandTemplateProvider', () => {
  const config: EnvironmentConfig = defaultConfig().environment;

  it('skips the pre-flight check when no command is configured', async () => {
    const runner = new ScriptedRunner([]);
    const provider = new CommandTemplateProvider(config, runner);

    expect(await provider.preflight({ required: 2 })).toEqual({ message: 'No pre-flight command configured' });
    expect(runner.requests).toEqual([]);
  });

  it('reads the remaining capacity from the pre-flight output', async () => {
    const runner = new ScriptedRunner([
      { stdout: '{"status":0,"message":"Dev hub ready","result":{"remaining":{"active":7}}}' },
    ]);
    const provider = new CommandTemplateProvider(
      {
        ...config,
        commands: { ...config.commands, preflight: 'env-check --need {required} --json' },
        capacityPath: 'result.remaining.active',
      },
      runner,
    );

    expect(await provider.preflight({ required: 3 })).toEqual({ available: 7, message: 'Dev hub ready' });
    expect(runner.requests[0].command).toEqual(['env-check', '--need', '3', '--json']);
    expect(runner.requests[0].timeoutMs).toBe(300_000);
  });

  it('throws when the pre-flight command fails', async () => {
    const runner = new ScriptedRunner([{ exitCode: 1, stderr: 'No authorization information found' }]);
    const provider = new CommandTemplateProvider(
      { ...config, commands: { ...config.commands, preflight: 'env-check' } },
      runner,
    );

    const error = await provider.preflight({ required: 1 }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ProviderCommandError);
    if (!(error instanceof ProviderCommandError)) return;
    expect(error.operation).toBe('preflight');
    expect(error.message).toBe('preflight failed: No authorization information found');
  });

  it('creates in a scratch directory and reads the id from the JSON output', async () => {
    const runner = new ScriptedRunner([
      { stdout: 'Warning: something\n{"status":0,"result":{"username":"test-user@example.com","orgId":"00D1"}}' },
    ]);
    const provider = new CommandTemplateProvider(config, runner);

    const handle = await provider.create(spec);

    expect(handle.envId).toBe('test-user@example.com');
    expect(handle.alias).toBe(spec.alias);
    expect(handle.metadata).toEqual({ username: 'test-user@example.com', orgId: '00D1' });
    expect(runner.requests[0].command).toEqual([
      'sf',
      'org',
      'create',
      'scratch',
      '--alias',
      'patchproof-lead-routing-1',
      '--definition-file',
      '/work/lead-routing/config/project-scratch-def.json',
      '--duration-days',
      '1',
      '--json',
    ]);
    expect(runner.requests[0].cwd).not.toBe(spec.workingDir);
    expect(runner.requests[0].timeoutMs).toBe(600_000);
  });

  it('throws ProviderCommandError with the output when create fails', async () => {
    const runner = new ScriptedRunner([
      { exitCode: 1, stdout: '{"status":1,"name":"LIMIT_EXCEEDED","message":"Daily limit reached"}' },
    ]);
    const provider = new CommandTemplateProvider(config, runner);

    const error = await provider.create(spec).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ProviderCommandError);
    if (!(error instanceof ProviderCommandError)) return;
    expect(error.message).toBe('create failed: Daily limit reached');
    expect(error.operation).toBe('create');
    expect(error.output).toContain('LIMIT_EXCEEDED');
  });

  it('fails create when the id path is missing', async () => {
    const runner = new ScriptedRunner([{ stdout: '{"status":0,"result":{}}' }]);
    const provider = new CommandTemplateProvider(config, runner);
    await expect(provider.create(spec)).rejects.toThrow('create output has no environment id at "result.username"');
  });

  it('scales timeouts by the multiplier', async () => {
    const runner = new ScriptedRunner([{ stdout: '{"status":0,"result":{"username":"u"}}' }]);
    const provider = new CommandTemplateProvider(config, runner, { timeoutMultiplier: 2 });
    await provider.create(spec);
    expect(runner.requests[0].timeoutMs).toBe(1_200_000);
  });

  it('deploys the source directory from the working copy', async () => {
    const runner = new ScriptedRunner([{ stdout: '{"status":0,"result":{"success":true}}' }]);
    const provider = new CommandTemplateProvider(config, runner);
    const handle = { envId: 'u@x', alias: 'a', createdAt: '', metadata: {} };

    const outcome = await provider.deploy(handle, { workingDir: '/work/t', sourceDir: 'force-app' });

    expect(outcome.ok).toBe(true);
    expect(runner.requests[0]).toMatchObject({
      command: ['sf', 'project', 'deploy', 'start', '--source-dir', '/work/t/force-app', '--target-org', 'u@x', '--json'],
      cwd: '/work/t',
    });
  });

  it('runs task commands as written under the default run template', async () => {
    const runner = new ScriptedRunner([{ stdout: 'done' }]);
    const provider = new CommandTemplateProvider(config, runner);
    const handle = { envId: 'u@x', alias: 'a', createdAt: '', metadata: {} };

    await provider.runCommand(handle, {
      command: 'sf data query --target-org {envId} --query "SELECT Id FROM Lead LIMIT {scale}"',
      cwd: '/work/t',
      vars: { scale: 200 },
    });

    expect(runner.requests[0].command).toBe(
      'sf data query --target-org u@x --query "SELECT Id FROM Lead LIMIT 200"',
    );
  });

  it('wraps task commands in a custom run template as one argument', async () => {
    const runner = new ScriptedRunner([{}]);
    const provider = new CommandTemplateProvider(
      { ...config, commands: { ...config.commands, run: 'remote-exec --env {envId} -- {command}' } },
      runner,
    );
    const handle = { envId: 'box-1', alias: 'a', createdAt: '', metadata: {} };

    await provider.runCommand(handle, { command: 'npm test', cwd: '/work/t' });

    expect(runner.requests[0].command).toEqual(['remote-exec', '--env', 'box-1', '--', 'npm test']);
  });

  it('throws when destroy reports failure', async () => {
    const runner = new ScriptedRunner([{ exitCode: 1, stderr: 'ECONNRESET' }]);
    const provider = new CommandTemplateProvider(config, runner);
    const handle = { envId: 'u@x', alias: 'a', createdAt: '', metadata: {} };

    await expect(provider.destroy(handle)).rejects.toThrow('destroy failed: ECONNRESET');
    expect(runner.requests[0].command).toEqual([
      'sf',
      'org',
      'delete',
      'scratch',
      '--target-org',
      'u@x',
      '--no-prompt',
      '--json',
    ]);
  });
});
