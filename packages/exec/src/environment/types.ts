import type { CommandResult } from '../runner/runner';

export interface EnvironmentSpec {
  taskId: string;
  /** Unique, human-readable name for the environment */
  alias: string;
  /** Patched working copy; relative paths in provider templates resolve against it */
  workingDir: string;
}

/**
 * An opaque reference to one provisioned environment.
 */
export interface EnvironmentHandle {
  envId: string;
  alias: string;
  createdAt: string;
  /** Provider-specific connection metadata */
  metadata: Record<string, unknown>;
}

export interface ProviderCallOptions {
  signal?: AbortSignal;
  /** Overrides the provider's default timeout for the operation */
  timeoutMs?: number;
}

export interface DeployRequest {
  workingDir: string;
  /** Relative to `workingDir`; defaults to the whole working copy */
  sourceDir?: string;
}

export interface RunRequest {
  command: string;
  cwd: string;
  /** Extra placeholder values, e.g. `{scale}` for bulk checks */
  vars?: Record<string, string | number>;
}

/**
 * Outcome of a command the provider ran against an environment.
 * `ok` already accounts for a JSON `status` field overriding the exit code.
 */
export interface ProviderCommandOutcome extends CommandResult {
  ok: boolean;
  /** Parsed JSON output when the command produced any */
  json?: unknown;
  message: string;
}

export interface PreflightRequest {
  /** Environments the run will hold at once */
  required: number;
}

export interface PreflightReport {
  /** Environments that can still be created, when the provider can tell */
  available?: number;
  message: string;
}

export interface EnvironmentProvider {
  /** Checks credentials and capacity once per run. Throws when the provider is unusable. */
  preflight?(request: PreflightRequest, options?: ProviderCallOptions): Promise<PreflightReport>;
  create(spec: EnvironmentSpec, options?: ProviderCallOptions): Promise<EnvironmentHandle>;
  deploy(
    handle: EnvironmentHandle,
    request: DeployRequest,
    options?: ProviderCallOptions,
  ): Promise<ProviderCommandOutcome>;
  runCommand(
    handle: EnvironmentHandle,
    request: RunRequest,
    options?: ProviderCallOptions,
  ): Promise<ProviderCommandOutcome>;
  destroy(handle: EnvironmentHandle, options?: ProviderCallOptions): Promise<void>;
}
