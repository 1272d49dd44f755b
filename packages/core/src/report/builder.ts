import {
  REPORT_SCHEMA_VERSION,
  STAGE_ORDER,
  type AttemptResult,
  type Report,
  type ReportSummary,
  type StagePassRate,
} from '@patchproof/shared';
import { roundScore } from '@patchproof/eval';

export interface ReportInput {
  runId: string;
  modelId: string;
  configDigest: string;
  startedAt: string;
  finishedAt: string;
  cancelled: boolean;
  results: AttemptResult[];
}

function ratio(part: number, whole: number): number {
  return whole > 0 ? Math.round((part / whole) * 10_000) / 10_000 : 0;
}

function median(sorted: readonly number[]): number {
  if (sorted.length === 0) return 0;
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : roundScore((sorted[mid - 1] + sorted[mid]) / 2);
}

/** An empty diff that was evaluated, as opposed to an attempt that errored before its diff was known */
function isEmptyPatch(result: AttemptResult): boolean {
  return result.solution.empty && result.classification !== 'errored';
}

export function summarize(results: readonly AttemptResult[]): ReportSummary {
  const total = results.length;
  const count = (classification: AttemptResult['classification']) =>
    results.filter((r) => r.classification === classification).length;
  const resolved = count('resolved');
  const scores = results.map((r) => r.score).sort((a, b) => a - b);

  const stagePassRates: ReportSummary['stagePassRates'] = {};
  for (const kind of STAGE_ORDER) {
    const ran = results.flatMap((r) => r.stages).filter((s) => s.kind === kind && s.status !== 'skipped');
    if (ran.length === 0) continue;
    const passed = ran.filter((s) => s.status === 'pass').length;
    const rate: StagePassRate = { passed, attempted: ran.length, rate: ratio(passed, ran.length) };
    stagePassRates[kind] = rate;
  }

  return {
    total,
    resolved,
    failed: count('failed'),
    errored: count('errored'),
    resolutionRate: ratio(resolved, total),
    averageScore: total > 0 ? roundScore(scores.reduce((a, b) => a + b, 0) / total) : 0,
    medianScore: median(scores),
    minScore: scores[0] ?? 0,
    maxScore: scores[scores.length - 1] ?? 0,
    averageDurationMs: total > 0 ? Math.round(results.reduce((a, r) => a + r.durationMs, 0) / total) : 0,
    stagePassRates,
    platformConstraintFailures: results.filter((r) => r.failure?.kind === 'PlatformConstraint').length,
    emptyPatchCount: results.filter(isEmptyPatch).length,
  };
}

export function buildReport(input: ReportInput): Report {
  const ids = (predicate: (r: AttemptResult) => boolean) => input.results.filter(predicate).map((r) => r.taskId);
  return {
    schemaVersion: REPORT_SCHEMA_VERSION,
    runId: input.runId,
    modelId: input.modelId,
    configDigest: input.configDigest,
    startedAt: input.startedAt,
    finishedAt: input.finishedAt,
    cancelled: input.cancelled,
    results: input.results,
    summary: summarize(input.results),
    resolvedIds: ids((r) => r.classification === 'resolved'),
    failedIds: ids((r) => r.classification === 'failed'),
    erroredIds: ids((r) => r.classification === 'errored'),
    emptyPatchIds: ids(isEmptyPatch),
  };
}
