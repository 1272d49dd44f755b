import { spawn } from 'node:child_process';
import { CancelledError, ProcessError, TimeoutError } from '@patchproof/shared';

export interface SpawnOptions {
  cwd: string;
  /** Written to stdin, then stdin is closed */
  input?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface SpawnResult {
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs a local binary to completion. A non-zero exit code is returned, not thrown;
 * only a process that cannot start, times out or is cancelled rejects.
 */
export function spawnCollect(bin: string, args: string[], options: SpawnOptions): Promise<SpawnResult> {
  return new Promise((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(new CancelledError(`Cancelled before running ${bin}`));
      return;
    }

    const child = spawn(bin, args, {
      cwd: options.cwd,
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const finish = (fn: () => void) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
      fn();
    };

    const onAbort = () => {
      child.kill('SIGTERM');
      finish(() => reject(new CancelledError(`Cancelled while running ${bin}`)));
    };
    options.signal?.addEventListener('abort', onAbort, { once: true });

    if (options.timeoutMs !== undefined) {
      const timeoutMs = options.timeoutMs;
      timer = setTimeout(() => {
        child.kill('SIGTERM');
        finish(() =>
          reject(
            new TimeoutError(`${bin} ${args[0] ?? ''} timed out after ${timeoutMs}ms`, {
              timeoutMs,
            }),
          ),
        );
      }, timeoutMs);
    }

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    // EPIPE when the child exits before reading all of stdin; the exit code carries the failure.
    child.stdin.on('error', () => {});
    child.stdin.end(options.input ?? '');

    child.on('error', (err) => {
      finish(() =>
        reject(new ProcessError(`Failed to start ${bin}: ${err.message}`, { cause: err })),
      );
    });

    child.on('close', (code) => {
      finish(() => resolve({ code: code ?? -1, stdout, stderr }));
    });
  });
}
