import { spawn, spawnSync } from 'child_process';
import { CancelledError, ProcessError, TimeoutError, ToolError } from '@patchproof/shared';
import { isShellCommand, parseCommand } from '../classify/parser';

export interface CommandRequest {
  /** A command line, or an argv that is spawned as given */
  command: string | readonly string[];
  cwd: string;
  env?: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  truncated: boolean;
}

/**
 * Runs one command in a remote environment's local tooling. A non-zero exit is a result, not an error.
 */
export interface CommandRunner {
  run(request: CommandRequest): Promise<CommandResult>;
}

export interface ProcessCommandRunnerOptions {
  /** Variables passed through in addition to the baseline set */
  envAllowlist?: string[];
  /** Run command lines with shell syntax through the shell; otherwise they are refused */
  allowShell?: boolean;
  /** Combined stdout+stderr cap; the process is killed when it is exceeded */
  maxOutputBytes?: number;
}

const DEFAULT_MAX_OUTPUT_BYTES = 10 * 1024 * 1024;
const TRUNCATION_MARKER = '\n[Output truncated due to limit]\n';

function killProcessTree(pid: number, signal: NodeJS.Signals = 'SIGTERM') {
  if (process.platform === 'win32') {
    spawnSync('taskkill', ['/PID', String(pid), '/T', '/F']);
    return;
  }
  // Negative pid signals the whole group; the child is spawned detached so it leads one.
  try {
    process.kill(-pid, signal);
  } catch {
    // already exited
  }
}

// Minimal env vars that are safe and commonly needed by CLIs.
// Credentials must be allowlisted explicitly.
const BASELINE_ENV_KEYS = [
  'HOME',
  'USER',
  'LOGNAME',
  'SHELL',
  'TERM',
  'LANG',
  'LC_ALL',
  'LC_CTYPE',
  'TMPDIR',
  'TMP',
  'TEMP',
  'XDG_CONFIG_HOME',
  'XDG_CACHE_HOME',
  'XDG_DATA_HOME',
  'NODE_ENV',
  'USERPROFILE',
  'APPDATA',
  'LOCALAPPDATA',
  'SYSTEMROOT',
  'COMSPEC',
  'PATHEXT',
];

export function getSafeEnv(
  allowlist: readonly string[],
  baseEnv: NodeJS.ProcessEnv,
  requestEnv: Record<string, string> = {},
): Record<string, string> {
  const safeEnv: Record<string, string> = {};

  const pathValue = baseEnv.PATH ?? baseEnv.Path;
  if (pathValue) {
    safeEnv.PATH = pathValue;
  }

  for (const key of [...BASELINE_ENV_KEYS, ...allowlist]) {
    const value = baseEnv[key];
    if (value !== undefined) safeEnv[key] = value;
  }

  // Variables the request sets itself are always passed.
  return { ...safeEnv, ...requestEnv };
}

interface SpawnPlan {
  bin: string;
  args: string[];
  env: Record<string, string>;
  shell: boolean;
}

export class ProcessCommandRunner implements CommandRunner {
  private readonly envAllowlist: readonly string[];
  private readonly allowShell: boolean;
  private readonly maxOutputBytes: number;

  constructor(options: ProcessCommandRunnerOptions = {}) {
    this.envAllowlist = options.envAllowlist ?? [];
    this.allowShell = options.allowShell ?? true;
    this.maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
  }

  private plan(command: string | readonly string[]): SpawnPlan {
    if (typeof command !== 'string') {
      const [bin, ...args] = command;
      if (!bin) throw new ToolError('Empty command');
      return { bin, args, env: {}, shell: false };
    }

    if (isShellCommand(command)) {
      if (!this.allowShell) {
        throw new ToolError(`Command requires a shell, which is disallowed: ${command}`, {
          details: { reason: 'shell_disallowed' },
        });
      }
      return { bin: command, args: [], env: {}, shell: true };
    }

    const parsed = parseCommand(command);
    if (!parsed.bin) {
      throw new ToolError(`Could not parse command: ${command}`);
    }
    return { bin: parsed.bin, args: parsed.args, env: parsed.env, shell: false };
  }

  async run(request: CommandRequest): Promise<CommandResult> {
    const label = typeof request.command === 'string' ? request.command : request.command.join(' ');
    if (request.signal?.aborted) {
      throw new CancelledError(`Cancelled before running: ${label}`);
    }

    const plan = this.plan(request.command);
    const env = getSafeEnv(this.envAllowlist, process.env, { ...plan.env, ...request.env });
    const start = Date.now();

    return new Promise<CommandResult>((resolve, reject) => {
      let settled = false;
      let stdout = '';
      let stderr = '';
      let outputBytes = 0;
      let truncated = false;

      const child = spawn(plan.bin, plan.args, {
        cwd: request.cwd,
        env,
        stdio: ['ignore', 'pipe', 'pipe'],
        shell: plan.shell,
        detached: true,
      });

      const settle = (fn: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutTimer);
        request.signal?.removeEventListener('abort', onAbort);
        fn();
      };

      const kill = () => {
        if (child.pid) killProcessTree(child.pid);
      };

      const timeoutTimer = setTimeout(() => {
        kill();
        settle(() =>
          reject(
            new TimeoutError(`Command timed out after ${request.timeoutMs}ms: ${label}`, {
              timeoutMs: request.timeoutMs,
              details: { partialStdout: stdout.slice(0, 1000), partialStderr: stderr.slice(0, 1000) },
            }),
          ),
        );
      }, request.timeoutMs);

      const onAbort = () => {
        kill();
        settle(() => reject(new CancelledError(`Cancelled while running: ${label}`)));
      };
      request.signal?.addEventListener('abort', onAbort, { once: true });

      const collect = (chunk: Buffer, append: (text: string) => void) => {
        if (truncated) return;
        const remaining = this.maxOutputBytes - outputBytes;
        outputBytes += chunk.length;
        if (chunk.length > remaining) {
          truncated = true;
          append(chunk.subarray(0, Math.max(0, remaining)).toString() + TRUNCATION_MARKER);
          kill();
        } else {
          append(chunk.toString());
        }
      };

      child.stdout.on('data', (chunk: Buffer) => collect(chunk, (text) => (stdout += text)));
      child.stderr.on('data', (chunk: Buffer) => collect(chunk, (text) => (stderr += text)));

      child.on('error', (err) => {
        settle(() =>
          reject(new ProcessError(`Failed to start process: ${err.message}`, { cause: err })),
        );
      });

      child.on('close', (code) => {
        settle(() =>
          resolve({
            exitCode: code ?? -1,
            stdout,
            stderr,
            durationMs: Date.now() - start,
            truncated,
          }),
        );
      });
    });
  }
}
