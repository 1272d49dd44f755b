import {
  CancelledError,
  EnvironmentUnavailableError,
  PatchInvalidError,
  TimeoutError,
  isAppError,
  redactString,
  type FailureRecord,
  type StageKind,
  type StageResult,
} from '@patchproof/shared';
import type { ProvisionErrorClassifier } from '@patchproof/exec';
import { REQUIRED_FOR_RESOLUTION } from '@patchproof/eval';

function messageOf(error: unknown): string {
  return redactString(error instanceof Error ? error.message : String(error)).redacted;
}

/**
 * Attributes an error that ended an attempt early.
 * Invalid patches and platform constraints belong to the solution; everything else to the harness.
 */
export function failureFromError(error: unknown, stage?: StageKind): FailureRecord {
  if (error instanceof PatchInvalidError) {
    return { kind: 'ModelFailure', code: error.code, message: error.message };
  }
  if (error instanceof EnvironmentUnavailableError && error.kind === 'platform-constraint') {
    return {
      kind: 'PlatformConstraint',
      code: error.code,
      message: messageOf(error),
      constraint: error.constraint,
    };
  }

  const record: FailureRecord = {
    kind: 'ToolError',
    code: isAppError(error) ? error.code : 'UnknownError',
    message: messageOf(error),
    stage,
  };
  if (error instanceof CancelledError) record.cancelled = true;
  if (error instanceof TimeoutError) record.timeout = true;
  return record;
}

/**
 * Why a fully scored attempt did not resolve. A failed stage whose message names a known
 * platform limitation is tagged as a constraint rather than a model failure.
 */
export function failureFromStages(
  stages: readonly StageResult[],
  classifier: ProvisionErrorClassifier,
): FailureRecord {
  const failed =
    stages.find((s) => s.status === 'fail' && REQUIRED_FOR_RESOLUTION.includes(s.kind)) ??
    stages.find((s) => s.status === 'fail');
  if (!failed) {
    return { kind: 'ModelFailure', code: 'BelowThreshold', message: 'Score below the resolution threshold' };
  }

  const classification = classifier.classify(new Error(failed.message));
  if (classification.kind === 'platform-constraint') {
    return {
      kind: 'PlatformConstraint',
      code: 'StageFailed',
      message: failed.message,
      stage: failed.kind,
      constraint: classification.pattern,
    };
  }
  return { kind: 'ModelFailure', code: 'StageFailed', message: failed.message, stage: failed.kind };
}
