import { describe, it, expect } from 'vitest';
import { HarnessConfigSchema, MemoryLogger, type Task } from '@patchproof/shared';
import { computeConfigDigest, createRunContext } from './context';

const tasks: Task[] = [
  {
    id: 'lead-routing',
    repo: { url: '/repos/crm', revision: 'main' },
    problemStatement: 'Route new leads to the owner',
    totalPoints: 100,
    timeouts: {},
    stages: [{ kind: 'deploy', weight: 100 }],
    tags: [],
  },
];

describe('computeConfigDigest', () => {
  const config = HarnessConfigSchema.parse({});

  it('changes with the solution set', () => {
    const base = computeConfigDigest('model-x', tasks, config, 'set-a');
    expect(computeConfigDigest('model-x', tasks, config, 'set-a')).toBe(base);
    expect(computeConfigDigest('model-x', tasks, config, 'set-b')).not.toBe(base);
    expect(computeConfigDigest('model-x', tasks, config)).not.toBe(base);
  });

  it('ignores settings a resume may change', () => {
    const wider = HarnessConfigSchema.parse({ run: { maxWorkers: 8, outputDir: 'elsewhere' } });
    expect(computeConfigDigest('model-x', tasks, wider, 'set-a')).toBe(
      computeConfigDigest('model-x', tasks, config, 'set-a'),
    );
  });

  it('is what a run context carries', () => {
    const ctx = createRunContext({
      modelId: 'model-x',
      tasks,
      config,
      logger: new MemoryLogger(),
      solutionsDigest: 'set-a',
      runId: 'run-1',
      cwd: '/work',
    });
    expect(ctx.configDigest).toBe(computeConfigDigest('model-x', tasks, config, 'set-a'));
    expect(ctx.runDir).toBe('/work/.patchproof/runs/run-1');
  });
});
