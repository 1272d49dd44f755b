import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { UsageError, sha256, type Task } from '@patchproof/shared';
import {
  DirectorySolutionSource,
  GeneratorSolutionSource,
  JsonSolutionSource,
  openSolutionSource,
} from './sources';

const task = (id: string): Task => ({
  id,
  repo: { url: '/repos/x', revision: 'main' },
  problemStatement: 'Do the thing',
  totalPoints: 100,
  timeouts: {},
  stages: [{ kind: 'deploy', weight: 100 }],
  tags: [],
});

describe('solution sources', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'solutions-test-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('prefers .patch over .diff and falls back to an empty solution', async () => {
    await fs.writeFile(path.join(dir, 'a.patch'), 'patch-a');
    await fs.writeFile(path.join(dir, 'a.diff'), 'diff-a');
    await fs.writeFile(path.join(dir, 'b.diff'), 'diff-b');
    const source = new DirectorySolutionSource(dir, 'model-x');

    expect(await source.get(task('a'))).toEqual({ taskId: 'a', modelId: 'model-x', diffText: 'patch-a', source: 'file' });
    expect((await source.get(task('b'))).diffText).toBe('diff-b');
    expect(await source.get(task('c'))).toEqual({ taskId: 'c', modelId: 'model-x', diffText: '', source: 'none' });
  });

  it('reads diffs from a JSON map', async () => {
    const file = path.join(dir, 'solutions.json');
    await fs.writeFile(file, JSON.stringify({ a: 'diff-a' }));
    const source = await JsonSolutionSource.open(file, 'model-x');

    expect((await source.get(task('a'))).diffText).toBe('diff-a');
    expect(await source.get(task('b'))).toEqual({ taskId: 'b', modelId: 'model-x', diffText: '', source: 'none' });
    expect((await source.get(task('toString'))).source).toBe('none');
  });

  it('refuses a JSON map with entries that are not diff text when opened', async () => {
    const file = path.join(dir, 'solutions.json');
    await fs.writeFile(file, JSON.stringify({ a: 'diff-a', b: 42, c: null }));

    const error = await openSolutionSource(file, 'model-x').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(UsageError);
    if (!(error instanceof UsageError)) return;
    expect(error.message).toBe(
      `Invalid solutions in ${file}:\n- b: expected diff text, got number\n- c: expected diff text, got null`,
    );
  });

  it('refuses malformed JSON when opened', async () => {
    const file = path.join(dir, 'solutions.json');
    await fs.writeFile(file, '{ "a": ');

    await expect(openSolutionSource(file, 'model-x')).rejects.toBeInstanceOf(UsageError);
  });

  it('fingerprints the solution set so a changed set reads as a different run', async () => {
    await fs.writeFile(path.join(dir, 'a.patch'), 'patch-a');
    await fs.writeFile(path.join(dir, 'notes.txt'), 'ignored');
    const before = await openSolutionSource(dir, 'model-x');
    await fs.writeFile(path.join(dir, 'notes.txt'), 'still ignored');
    const unchanged = await openSolutionSource(dir, 'model-x');
    await fs.writeFile(path.join(dir, 'a.patch'), 'patch-a v2');
    const changed = await openSolutionSource(dir, 'model-x');

    expect(before.digest).toMatch(/^[0-9a-f]{64}$/);
    expect(unchanged.digest).toBe(before.digest);
    expect(changed.digest).not.toBe(before.digest);

    const file = path.join(dir, 'solutions.json');
    await fs.writeFile(file, '{"a":"diff-a"}');
    expect((await openSolutionSource(file, 'model-x')).digest).toBe(sha256('{"a":"diff-a"}'));
  });

  it('asks the generator and tags the provenance', async () => {
    const source = new GeneratorSolutionSource({ generate: async (t) => `diff for ${t.id}` }, 'model-x');
    expect(await source.get(task('a'))).toEqual({
      taskId: 'a',
      modelId: 'model-x',
      diffText: 'diff for a',
      source: 'generator',
    });
  });

  it('opens directories and JSON files and rejects anything else', async () => {
    const json = path.join(dir, 'solutions.json');
    const text = path.join(dir, 'solutions.txt');
    await fs.writeFile(json, '{}');
    await fs.writeFile(text, '');

    expect(await openSolutionSource(dir, 'm')).toBeInstanceOf(DirectorySolutionSource);
    expect(await openSolutionSource(json, 'm')).toBeInstanceOf(JsonSolutionSource);
    await expect(openSolutionSource(text, 'm')).rejects.toBeInstanceOf(UsageError);
    await expect(openSolutionSource(path.join(dir, 'nope'), 'm')).rejects.toBeInstanceOf(UsageError);
  });
});
