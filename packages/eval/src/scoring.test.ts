import { describe, it, expect } from 'vitest';
import type { StageKind, StageResult, StageStatus } from '@patchproof/shared';
import { classifyStages, maxScore, totalScore } from './scoring';

function stage(kind: StageKind, status: StageStatus, weight: number, fraction = status === 'pass' ? 1 : 0): StageResult {
  return { kind, status, message: '', score: weight * fraction, weight, fraction, durationMs: 0, details: {} };
}

const passing = (functionalWeight = 50): StageResult[] => [
  stage('deploy', 'pass', 10),
  stage('tests', 'pass', 20),
  stage('functional', 'pass', functionalWeight),
  stage('bulk', 'pass', 10),
  stage('tweak', 'pass', 10),
];

describe('scoring', () => {
  it('scores 30 and fails when the functional check fails after deploy and tests pass', () => {
    const stages = [
      stage('deploy', 'pass', 10),
      stage('tests', 'pass', 20),
      stage('functional', 'fail', 50),
      stage('bulk', 'skipped', 10),
      stage('tweak', 'skipped', 10),
    ];
    expect(totalScore(stages)).toBe(30);
    expect(maxScore(stages)).toBe(100);
    expect(classifyStages(stages, 80)).toBe('failed');
  });

  it('resolves a full pass', () => {
    expect(totalScore(passing())).toBe(100);
    expect(classifyStages(passing(), 80)).toBe('resolved');
  });

  it('does not resolve on partial credit when a required stage did not pass', () => {
    const stages = passing();
    stages[1] = stage('tests', 'fail', 20, 0.5);
    expect(totalScore(stages)).toBe(90);
    expect(classifyStages(stages, 80)).toBe('failed');
  });

  it('resolves with optional stages failing once the threshold is met', () => {
    const stages = passing();
    stages[3] = stage('bulk', 'fail', 10);
    expect(classifyStages(stages, 80)).toBe('resolved');
  });

  it('classifies any stage error as errored', () => {
    const stages = [stage('deploy', 'pass', 10), stage('tests', 'error', 20), stage('functional', 'skipped', 70)];
    expect(classifyStages(stages, 80)).toBe('errored');
  });

  it('never decreases the score when the functional weight grows', () => {
    const outcomes = [
      stage('deploy', 'pass', 10),
      stage('tests', 'fail', 20, 0.25),
      stage('bulk', 'pass', 10),
    ];
    let previous = -Infinity;
    for (const weight of [0, 10, 25, 50, 75]) {
      const score = totalScore([...outcomes, stage('functional', 'pass', weight)]);
      expect(score).toBeGreaterThanOrEqual(previous);
      previous = score;
    }
  });

  it('never resolves a deploy-pass functional-fail attempt at any weight', () => {
    for (const weight of [1, 50, 500]) {
      const stages = [stage('deploy', 'pass', 1000), stage('functional', 'fail', weight)];
      expect(classifyStages(stages, 0)).toBe('failed');
    }
  });

  it('measures the threshold against the points available', () => {
    const stages = [stage('deploy', 'pass', 2), stage('functional', 'pass', 8)];
    expect(classifyStages(stages, 80)).toBe('resolved');
  });
});
