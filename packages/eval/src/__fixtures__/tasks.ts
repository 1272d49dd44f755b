import type { StageDescriptor, Task } from '@patchproof/shared';
import type { WorkingTreeSnapshot } from '@patchproof/repo';
import type { WorkspaceView } from '../stages/types';

/** deploy 10, tests 20, functional 50, bulk 10, tweak 10 */
export function standardStages(): StageDescriptor[] {
  return [
    { kind: 'deploy', weight: 10 },
    { kind: 'tests', weight: 20, command: 'run-tests' },
    {
      kind: 'functional',
      weight: 50,
      setup: [],
      command: 'run-scenario',
      verify: { command: 'query-leads', expect: { recordCount: 1, fields: [{ field: 'Status', value: 'Qualified' }] } },
    },
    { kind: 'bulk', weight: 10, scale: 200, setup: [], command: 'run-bulk {scale}' },
    { kind: 'tweak', weight: 10, ignore: [] },
  ];
}

export function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 'lead-routing',
    repo: { url: '/repos/lead-routing', revision: 'main' },
    problemStatement: 'Route new leads to the right queue',
    totalPoints: 100,
    timeouts: {},
    stages: standardStages(),
    tags: [],
    ...overrides,
  };
}

export function fakeWorkspace(
  current: WorkingTreeSnapshot = { files: { 'src/router.ts': 'h1' } },
  overrides: Partial<WorkspaceView> = {},
): WorkspaceView {
  return {
    dir: '/work/lead-routing',
    patchedFiles: ['src/router.ts'],
    baseline: { files: { 'src/router.ts': 'h1' } },
    snapshot: async () => current,
    ...overrides,
  };
}
