import type {
  AttemptClassification,
  FailureKind,
  StageKind,
  StageStatus,
} from '../eval/types';

/**
 * Base interface for all harness events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Identifier of the evaluation run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted once when a run begins, after the checkpoint has been consulted.
 */
export interface RunStarted extends BaseEvent {
  type: 'RunStarted';
  payload: {
    modelId: string;
    taskCount: number;
    maxWorkers: number;
    configDigest: string;
  };
}

/**
 * Emitted when the provider's pre-flight check passed, before any worker starts.
 */
export interface PreflightChecked extends BaseEvent {
  type: 'PreflightChecked';
  payload: {
    /** Environments the run holds at once */
    required: number;
    available?: number;
    message: string;
  };
}

export interface CheckpointLoaded extends BaseEvent {
  type: 'CheckpointLoaded';
  payload: {
    status: 'fresh' | 'resumed' | 'mismatch';
    completedTaskIds: string[];
    reason?: string;
  };
}

export interface AttemptStarted extends BaseEvent {
  type: 'AttemptStarted';
  payload: {
    taskId: string;
    workerId: number;
  };
}

export interface PatchApplied extends BaseEvent {
  type: 'PatchApplied';
  payload: {
    taskId: string;
    strategyUsed: string;
    filesChanged: string[];
    rejectedFiles: string[];
  };
}

export interface PatchRejected extends BaseEvent {
  type: 'PatchRejected';
  payload: {
    taskId: string;
    reason: string;
    attempts: { strategy: string; reason: string }[];
  };
}

/** Emitted before sleeping between provisioning or teardown attempts */
export interface ProvisionRetryScheduled extends BaseEvent {
  type: 'ProvisionRetryScheduled';
  payload: {
    operation: 'create' | 'destroy';
    alias: string;
    attempt: number;
    delayMs: number;
    error: string;
  };
}

export interface EnvironmentProvisioned extends BaseEvent {
  type: 'EnvironmentProvisioned';
  payload: {
    taskId: string;
    envId: string;
    attempts: number;
  };
}

export interface EnvironmentDestroyed extends BaseEvent {
  type: 'EnvironmentDestroyed';
  payload: {
    envId: string;
  };
}

/** A teardown that exhausted its retries. The environment must be reaped out of band. */
export interface EnvironmentDestroyFailed extends BaseEvent {
  type: 'EnvironmentDestroyFailed';
  payload: {
    envId: string;
    error: string;
  };
}

export interface StageFinished extends BaseEvent {
  type: 'StageFinished';
  payload: {
    taskId: string;
    stage: StageKind;
    status: StageStatus;
    score: number;
    durationMs: number;
    message: string;
  };
}

export interface AttemptFinished extends BaseEvent {
  type: 'AttemptFinished';
  payload: {
    taskId: string;
    classification: AttemptClassification;
    score: number;
    durationMs: number;
    failureKind?: FailureKind;
  };
}

export interface CheckpointSaved extends BaseEvent {
  type: 'CheckpointSaved';
  payload: {
    taskId: string;
    completedCount: number;
    digest: string;
  };
}

export interface RunFinished extends BaseEvent {
  type: 'RunFinished';
  payload: {
    resolved: number;
    failed: number;
    errored: number;
    cancelled: boolean;
    durationMs: number;
  };
}

/**
 * Union of every structured event the harness emits.
 */
export type HarnessEvent =
  | RunStarted
  | PreflightChecked
  | CheckpointLoaded
  | AttemptStarted
  | PatchApplied
  | PatchRejected
  | ProvisionRetryScheduled
  | EnvironmentProvisioned
  | EnvironmentDestroyed
  | EnvironmentDestroyFailed
  | StageFinished
  | AttemptFinished
  | CheckpointSaved
  | RunFinished;

export type HarnessEventType = HarnessEvent['type'];

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Common metadata for a new event, stamped with the current time.
 */
export function eventBase(runId: string): Omit<BaseEvent, 'type'> {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
  };
}
