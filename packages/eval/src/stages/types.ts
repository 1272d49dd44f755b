import type { Logger, StageDescriptor, StageKind, Task } from '@patchproof/shared';
import type { EnvironmentHandle, EnvironmentProvider } from '@patchproof/exec';
import type { WorkingTreeSnapshot } from '@patchproof/repo';

/**
 * The patched working copy as the stages see it.
 */
export interface WorkspaceView {
  dir: string;
  /** Files the Patch Applier changed */
  patchedFiles: string[];
  /** Working tree state captured right after the patch was applied */
  baseline: WorkingTreeSnapshot;
  snapshot(ignore: readonly string[]): Promise<WorkingTreeSnapshot>;
}

export interface StageContext {
  task: Task;
  env: EnvironmentHandle;
  provider: EnvironmentProvider;
  workspace: WorkspaceView;
  /** Aborts on run cancellation or when the stage's own timeout fires */
  signal: AbortSignal;
  timeoutMs: number;
  /** Extra ignore prefixes for the working tree comparison */
  tweakIgnore: readonly string[];
  logger: Logger;
}

/**
 * What a stage reports for a normal pass or fail. Errors are thrown instead.
 */
export interface StageOutcome {
  status: 'pass' | 'fail';
  /** Share of the stage weight earned, 0..1 */
  fraction: number;
  message: string;
  details: Record<string, unknown>;
}

export type DescriptorOf<K extends StageKind> = Extract<StageDescriptor, { kind: K }>;

export interface StageRunner<K extends StageKind = StageKind> {
  readonly kind: K;
  run(descriptor: DescriptorOf<K>, ctx: StageContext): Promise<StageOutcome>;
}

export function isKind<K extends StageKind>(
  descriptor: StageDescriptor,
  kind: K,
): descriptor is DescriptorOf<K> {
  return descriptor.kind === kind;
}

export function passed(message: string, details: Record<string, unknown> = {}): StageOutcome {
  return { status: 'pass', fraction: 1, message, details };
}

export function failed(
  message: string,
  details: Record<string, unknown> = {},
  fraction = 0,
): StageOutcome {
  return { status: 'fail', fraction, message, details };
}
