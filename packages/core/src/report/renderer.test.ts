import { describe, it, expect } from 'vitest';
import { Chalk } from 'chalk';
import { makeResult } from '../__fixtures__/results';
import { buildReport } from './builder';
import { ReportRenderer } from './renderer';

const report = buildReport({
  runId: 'run-1',
  modelId: 'model-x',
  configDigest: 'abc',
  startedAt: '2026-01-01T00:00:00.000Z',
  finishedAt: '2026-01-01T00:10:00.000Z',
  cancelled: false,
  results: [
    makeResult('a'),
    makeResult('d', {
      classification: 'failed',
      state: 'failed',
      score: 0,
      stages: [],
      failure: { kind: 'PlatformConstraint', code: 'EnvironmentUnavailable', message: 'limit', constraint: 'NOT_SUPPORTED_BY_EDITION' },
    }),
  ],
});

describe('ReportRenderer', () => {
  const renderer = new ReportRenderer(new Chalk({ level: 0 }));

  it('renders one row per task with badges and stage cells', () => {
    const lines = renderer.render(report);

    expect(lines[0]).toBe('Run run-1 (model model-x)');
    expect(lines).toContain('PASS   a     100/100  pass');
    expect(lines).toContain('FAIL   d       0/100');
    expect(lines).toContain('        PlatformConstraint [NOT_SUPPORTED_BY_EDITION]: limit');
  });

  it('renders the summary block', () => {
    const lines = renderer.render(report);

    expect(lines).toContain('Resolution:     50.00%');
    expect(lines).toContain('- Resolved:     1');
    expect(lines).toContain('Constraints:    1');
  });

  it('flags a cancelled run', () => {
    expect(renderer.render({ ...report, cancelled: true })[2]).toBe('Run was cancelled; results are partial.');
  });
});
