export const TASK_SCHEMA_VERSION = 1;
export const REPORT_SCHEMA_VERSION = 1;

export type StageKind = 'deploy' | 'tests' | 'functional' | 'bulk' | 'tweak';

export const STAGE_ORDER: readonly StageKind[] = ['deploy', 'tests', 'functional', 'bulk', 'tweak'];

export interface StageDescriptorBase {
  /** Points this stage contributes at full pass */
  weight: number;
  timeoutMs?: number;
  /** When true, a normal fail of this stage stops the pipeline */
  gate?: boolean;
}

export type FieldValue = string | number | boolean | null;

export interface RecordExpectation {
  recordCount?: number;
  fields?: { field: string; value: FieldValue }[];
}

/** A query run after the scenario, whose records must meet `expect` */
export interface OutcomeVerification {
  command: string;
  expect: RecordExpectation;
}

export interface DeployStageDescriptor extends StageDescriptorBase {
  kind: 'deploy';
  /** Directory inside the working copy to deploy; defaults to the root */
  sourceDir?: string;
}

export interface TestsStageDescriptor extends StageDescriptorBase {
  kind: 'tests';
  command: string;
  /** Percentage 0-100 */
  minCoverage?: number;
  requiredTests?: number;
}

export interface FunctionalStageDescriptor extends StageDescriptorBase {
  kind: 'functional';
  setup: string[];
  command?: string;
  verify?: OutcomeVerification;
}

export interface BulkStageDescriptor extends StageDescriptorBase {
  kind: 'bulk';
  scale: number;
  setup: string[];
  command?: string;
  verify?: OutcomeVerification;
}

export interface TweakStageDescriptor extends StageDescriptorBase {
  kind: 'tweak';
  ignore: string[];
}

export type StageDescriptor =
  | DeployStageDescriptor
  | TestsStageDescriptor
  | FunctionalStageDescriptor
  | BulkStageDescriptor
  | TweakStageDescriptor;

export interface Task {
  id: string;
  title?: string;
  repo: {
    url: string;
    revision: string;
  };
  /** Opaque to the harness; handed to the solution generator */
  problemStatement: string;
  totalPoints: number;
  timeouts: {
    attemptMs?: number;
    stageMs?: number;
  };
  stages: StageDescriptor[];
  tags: string[];
}

export interface Solution {
  taskId: string;
  modelId: string;
  diffText: string;
  source: 'file' | 'generator' | 'none';
}

export type StageStatus = 'pass' | 'fail' | 'error' | 'skipped';

export interface StageResult {
  kind: StageKind;
  status: StageStatus;
  message: string;
  /** weight x fraction */
  score: number;
  weight: number;
  fraction: number;
  durationMs: number;
  details: Record<string, unknown>;
}

export type AttemptState =
  | 'pending'
  | 'deploying'
  | 'testing'
  | 'functional-check'
  | 'bulk-check'
  | 'tweak-check'
  | 'scored'
  | 'failed'
  | 'errored';

export type AttemptClassification = 'resolved' | 'failed' | 'errored';

export type FailureKind = 'ModelFailure' | 'PlatformConstraint' | 'ToolError';

export interface FailureRecord {
  kind: FailureKind;
  /** Error code or stage outcome that produced the failure */
  code: string;
  message: string;
  stage?: StageKind;
  constraint?: string;
  cancelled?: boolean;
  timeout?: boolean;
}

export interface PatchSummary {
  applied: boolean;
  strategyUsed?: string;
  filesChanged: string[];
  rejectedFiles: string[];
}

export interface AttemptResult {
  taskId: string;
  modelId: string;
  solution: {
    source: Solution['source'];
    /** sha256 of the diff text */
    digest: string;
    empty: boolean;
  };
  patch: PatchSummary;
  stages: StageResult[];
  score: number;
  maxScore: number;
  classification: AttemptClassification;
  state: AttemptState;
  failure?: FailureRecord;
  envId?: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

export interface StagePassRate {
  passed: number;
  attempted: number;
  rate: number;
}

export interface ReportSummary {
  total: number;
  resolved: number;
  failed: number;
  errored: number;
  resolutionRate: number;
  averageScore: number;
  medianScore: number;
  minScore: number;
  maxScore: number;
  averageDurationMs: number;
  stagePassRates: Partial<Record<StageKind, StagePassRate>>;
  platformConstraintFailures: number;
  emptyPatchCount: number;
}

export interface Report {
  schemaVersion: typeof REPORT_SCHEMA_VERSION;
  runId: string;
  modelId: string;
  configDigest: string;
  startedAt: string;
  finishedAt: string;
  cancelled: boolean;
  results: AttemptResult[];
  summary: ReportSummary;
  resolvedIds: string[];
  failedIds: string[];
  erroredIds: string[];
  emptyPatchIds: string[];
}
