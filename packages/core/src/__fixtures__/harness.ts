import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { spawn } from 'child_process';
import {
  HarnessConfigSchema,
  MemoryLogger,
  type HarnessConfig,
  type StageDescriptor,
  type Task,
} from '@patchproof/shared';
import type { FakeCommandHandler, FakeOutcome } from '@patchproof/exec/testing';
import { computeConfigDigest, type RunContext } from '../run/context';

const git = (args: string[], cwd: string) =>
  new Promise<void>((resolve, reject) => {
    const p = spawn('git', args, { cwd, stdio: 'ignore' });
    p.on('close', (code) => {
      if (code === 0) resolve();
      else reject(new Error(`git ${args.join(' ')} failed with code ${code}`));
    });
    p.on('error', reject);
  });

export const ROUTER_SOURCE = "export const route = 'queue';\n";

export const ROUTER_DIFF = [
  'diff --git a/src/router.ts b/src/router.ts',
  '--- a/src/router.ts',
  '+++ b/src/router.ts',
  '@@ -1 +1 @@',
  "-export const route = 'queue';",
  "+export const route = 'owner';",
  '',
].join('\n');

/**
 * A throwaway directory holding a one-commit git repository with `src/router.ts`.
 */
export async function createSourceRepo(root: string): Promise<string> {
  const dir = path.join(root, 'source');
  await fs.mkdir(path.join(dir, 'src'), { recursive: true });
  await git(['init', '--quiet'], dir);
  await git(['config', 'user.email', 'test@example.com'], dir);
  await git(['config', 'user.name', 'Test User'], dir);
  await fs.writeFile(path.join(dir, 'src', 'router.ts'), ROUTER_SOURCE);
  await git(['add', '.'], dir);
  await git(['commit', '--quiet', '-m', 'init'], dir);
  return dir;
}

export function makeTempRoot(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'harness-test-'));
}

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

export function makeTask(id: string, repoUrl: string, overrides: Partial<Task> = {}): Task {
  return {
    id,
    repo: { url: repoUrl, revision: 'HEAD' },
    problemStatement: 'Route new leads to the owner',
    totalPoints: 100,
    timeouts: {},
    stages: standardStages(),
    tags: [],
    ...overrides,
  };
}

/**
 * Command handler for a solution that does everything right. Entries in `overrides` replace
 * the answer for one command.
 */
export function passingCommands(overrides: Record<string, FakeOutcome> = {}): FakeCommandHandler {
  const defaults: Record<string, FakeOutcome> = {
    'run-tests': { json: { status: 0, result: { summary: { testsRan: 4, passing: 4, failing: 0 } } } },
    'query-leads': { json: { status: 0, result: { records: [{ Status: 'Qualified' }] } } },
  };
  return (request) => overrides[request.command] ?? defaults[request.command] ?? {};
}

export function testConfig(
  root: string,
  overrides: { maxWorkers?: number; onMismatch?: 'restart' | 'abort' } = {},
): HarnessConfig {
  return HarnessConfigSchema.parse({
    run: {
      outputDir: path.join(root, 'runs'),
      workspaceDir: path.join(root, 'workspaces'),
      maxWorkers: overrides.maxWorkers ?? 2,
    },
    checkpoint: { onMismatch: overrides.onMismatch ?? 'restart' },
  });
}

export interface TestContextOptions {
  root: string;
  tasks: readonly Task[];
  config?: HarnessConfig;
  runId?: string;
  signal?: AbortSignal;
  logger?: MemoryLogger;
}

export function testContext(options: TestContextOptions): RunContext & { logger: MemoryLogger } {
  const config = options.config ?? testConfig(options.root);
  const runId = options.runId ?? 'run-test';
  return {
    runId,
    modelId: 'model-x',
    config,
    logger: options.logger ?? new MemoryLogger(),
    signal: options.signal ?? new AbortController().signal,
    configDigest: computeConfigDigest('model-x', options.tasks, config),
    runDir: path.join(config.run.outputDir, runId),
  };
}
