import {
  STAGE_ORDER,
  type AttemptClassification,
  type StageKind,
  type StageResult,
} from '@patchproof/shared';

/** Stages that must pass for an attempt to count as resolved */
export const REQUIRED_FOR_RESOLUTION: readonly StageKind[] = STAGE_ORDER.slice(
  0,
  STAGE_ORDER.indexOf('functional') + 1,
);

export function roundScore(value: number): number {
  return Math.round(value * 100) / 100;
}

export function stageScore(weight: number, fraction: number): number {
  return roundScore(weight * fraction);
}

/**
 * Sum of weight x fraction over all stages.
 */
export function totalScore(stages: readonly StageResult[]): number {
  return roundScore(stages.reduce((sum, stage) => sum + stage.weight * stage.fraction, 0));
}

export function maxScore(stages: readonly Pick<StageResult, 'weight'>[]): number {
  return roundScore(stages.reduce((sum, stage) => sum + stage.weight, 0));
}

/**
 * Score as a percentage of the points available.
 */
export function scorePercent(stages: readonly StageResult[]): number {
  const max = maxScore(stages);
  return max > 0 ? (totalScore(stages) / max) * 100 : 0;
}

/**
 * Errored when any stage raised; resolved when the score reaches `threshold` percent and
 * every declared stage up to the functional check passed; failed otherwise.
 */
export function classifyStages(
  stages: readonly StageResult[],
  threshold: number,
): AttemptClassification {
  if (stages.some((s) => s.status === 'error')) return 'errored';

  const requiredPassed = stages
    .filter((s) => REQUIRED_FOR_RESOLUTION.includes(s.kind))
    .every((s) => s.status === 'pass');

  return requiredPassed && scorePercent(stages) >= threshold ? 'resolved' : 'failed';
}
