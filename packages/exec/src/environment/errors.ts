import { ToolError, type AppErrorOptions } from '@patchproof/shared';

export type ProviderOperation = 'preflight' | 'create' | 'deploy' | 'run' | 'destroy';

/**
 * A provider command that ran and reported failure, either by exit code or by a JSON `status`.
 */
export class ProviderCommandError extends ToolError {
  public readonly operation: ProviderOperation;
  public readonly exitCode: number;
  /** Captured stderr and stdout, redacted */
  public readonly output: string;

  constructor(
    operation: ProviderOperation,
    message: string,
    options: AppErrorOptions & { exitCode: number; output?: string },
  ) {
    super(message, options);
    this.operation = operation;
    this.exitCode = options.exitCode;
    this.output = options.output ?? '';
  }
}
