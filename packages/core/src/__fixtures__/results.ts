import type { AttemptResult } from '@patchproof/shared';

export function makeResult(taskId: string, overrides: Partial<AttemptResult> = {}): AttemptResult {
  return {
    taskId,
    modelId: 'model-x',
    solution: { source: 'file', digest: 'd'.repeat(64), empty: false },
    patch: { applied: true, strategyUsed: 'strict', filesChanged: ['src/router.ts'], rejectedFiles: [] },
    stages: [
      {
        kind: 'deploy',
        status: 'pass',
        message: 'Deployed',
        score: 100,
        weight: 100,
        fraction: 1,
        durationMs: 5,
        details: {},
      },
    ],
    score: 100,
    maxScore: 100,
    classification: 'resolved',
    state: 'scored',
    envId: 'env-1',
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:00:01.000Z',
    durationMs: 1000,
    ...overrides,
  };
}
