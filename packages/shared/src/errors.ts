/**
 * Error codes used throughout the harness.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  | 'TaskDefinitionError'
  // Runtime errors (exit code 1)
  | 'ToolError'
  | 'ProcessError'
  | 'TimeoutError'
  | 'CancelledError'
  | 'PatchInvalid'
  | 'EnvironmentUnavailable'
  | 'CheckpointIntegrityError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all harness errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ToolError', 'git clone failed', {
 *   cause: originalError,
 *   details: { url, revision }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when a task file cannot be parsed or violates the task schema.
 */
export class TaskDefinitionError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('TaskDefinitionError', message, options);
  }
}

/**
 * A defect or transient failure inside the harness itself.
 */
export class ToolError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ToolError', message, options);
  }
}

/**
 * Error thrown when a subprocess fails.
 * Includes the process exit code when available.
 */
export class ProcessError extends AppError {
  /** Exit code of the failed process */
  public readonly exitCode?: number;

  constructor(message: string, options: AppErrorOptions & { exitCode?: number } = {}) {
    super('ProcessError', message, options);
    this.exitCode = options.exitCode;
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends AppError {
  /** The budget that was exceeded, in milliseconds */
  public readonly timeoutMs?: number;

  constructor(message: string, options: AppErrorOptions & { timeoutMs?: number } = {}) {
    super('TimeoutError', message, options);
    this.timeoutMs = options.timeoutMs;
  }
}

/**
 * Error thrown when work is aborted by the run deadline or an external interrupt.
 */
export class CancelledError extends AppError {
  constructor(message = 'Operation cancelled', options: AppErrorOptions = {}) {
    super('CancelledError', message, options);
  }
}

export type PatchStrategyName = 'strict' | 'reject-tolerant' | 'three-way' | 'fuzzy';

export interface PatchStrategyAttempt {
  strategy: PatchStrategyName;
  reason: string;
}

/**
 * A candidate diff that could not be applied by any strategy.
 * Always attributed to the model, never to the harness.
 */
export class PatchInvalidError extends AppError {
  public readonly attempts: PatchStrategyAttempt[];

  constructor(
    message: string,
    options: AppErrorOptions & { attempts?: PatchStrategyAttempt[] } = {},
  ) {
    super('PatchInvalid', message, options);
    this.attempts = options.attempts ?? [];
  }
}

export type ProvisionErrorKind = 'transient' | 'terminal' | 'platform-constraint';

/**
 * Provisioning gave up. `kind` is the classification of the last failure.
 */
export class EnvironmentUnavailableError extends AppError {
  public readonly kind: ProvisionErrorKind;
  public readonly attempts: number;
  /** Pattern that matched when `kind` is `platform-constraint` */
  public readonly constraint?: string;

  constructor(
    message: string,
    options: AppErrorOptions & {
      kind: ProvisionErrorKind;
      attempts: number;
      constraint?: string;
    },
  ) {
    super('EnvironmentUnavailable', message, options);
    this.kind = options.kind;
    this.attempts = options.attempts;
    this.constraint = options.constraint;
  }
}

/**
 * A checkpoint whose digest does not match its contents or the current run configuration.
 */
export class CheckpointIntegrityError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('CheckpointIntegrityError', message, options);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}
