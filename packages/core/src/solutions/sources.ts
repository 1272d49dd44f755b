import path from 'path';
import { readFile, readdir, stat } from 'fs/promises';
import { pathExists } from 'fs-extra';
import { UsageError, canonicalDigest, isRecord, sha256, type Solution, type Task } from '@patchproof/shared';

/**
 * Produces candidate diffs, e.g. by prompting a model. Output is untrusted text.
 */
export interface SolutionGenerator {
  generate(task: Task, options?: { signal?: AbortSignal }): Promise<string>;
}

export interface SolutionSource {
  /** Digest of a solution set fixed before the run; part of the run's config digest */
  readonly digest?: string;
  get(task: Task, signal?: AbortSignal): Promise<Solution>;
}

const PATCH_EXTENSIONS = ['.patch', '.diff'];

/**
 * Reads `<taskId>.patch` or `<taskId>.diff` from a directory; `.patch` wins.
 */
export class DirectorySolutionSource implements SolutionSource {
  constructor(
    private readonly dir: string,
    private readonly modelId: string,
    readonly digest?: string,
  ) {}

  static async open(dir: string, modelId: string): Promise<DirectorySolutionSource> {
    const names = (await readdir(dir)).filter((name) => PATCH_EXTENSIONS.includes(path.extname(name))).sort();
    const files = await Promise.all(
      names.map(async (name) => [name, sha256(await readFile(path.join(dir, name), 'utf8'))]),
    );
    return new DirectorySolutionSource(dir, modelId, canonicalDigest(files));
  }

  async get(task: Task): Promise<Solution> {
    for (const ext of PATCH_EXTENSIONS) {
      const file = path.join(this.dir, `${task.id}${ext}`);
      if (await pathExists(file)) {
        return { taskId: task.id, modelId: this.modelId, diffText: await readFile(file, 'utf8'), source: 'file' };
      }
    }
    return { taskId: task.id, modelId: this.modelId, diffText: '', source: 'none' };
  }
}

/**
 * A JSON object mapping task ids to diff text, parsed and checked when opened.
 */
export class JsonSolutionSource implements SolutionSource {
  constructor(
    private readonly diffs: ReadonlyMap<string, string>,
    private readonly modelId: string,
    readonly digest?: string,
  ) {}

  static async open(file: string, modelId: string): Promise<JsonSolutionSource> {
    const text = await readFile(file, 'utf8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new UsageError(`Cannot parse solutions file ${file}: ${reason}`, { cause: error });
    }
    if (!isRecord(parsed)) {
      throw new UsageError(`Solutions file must contain an object of task id to diff: ${file}`);
    }

    const diffs = new Map<string, string>();
    const problems: string[] = [];
    for (const [taskId, diff] of Object.entries(parsed)) {
      if (typeof diff === 'string') diffs.set(taskId, diff);
      else problems.push(`${taskId}: expected diff text, got ${diff === null ? 'null' : typeof diff}`);
    }
    if (problems.length > 0) {
      throw new UsageError(`Invalid solutions in ${file}:\n${problems.map((p) => `- ${p}`).join('\n')}`);
    }
    return new JsonSolutionSource(diffs, modelId, sha256(text));
  }

  async get(task: Task): Promise<Solution> {
    const diff = this.diffs.get(task.id);
    return diff === undefined
      ? { taskId: task.id, modelId: this.modelId, diffText: '', source: 'none' }
      : { taskId: task.id, modelId: this.modelId, diffText: diff, source: 'file' };
  }
}

export class GeneratorSolutionSource implements SolutionSource {
  constructor(
    private readonly generator: SolutionGenerator,
    private readonly modelId: string,
  ) {}

  async get(task: Task, signal?: AbortSignal): Promise<Solution> {
    const diffText = await this.generator.generate(task, { signal });
    return { taskId: task.id, modelId: this.modelId, diffText, source: 'generator' };
  }
}

/**
 * Picks the file-backed source for a path: a directory of patches or a JSON map.
 * Both are read up front so a malformed set fails before the run starts.
 */
export async function openSolutionSource(location: string, modelId: string): Promise<SolutionSource> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(location)).isDirectory();
  } catch (error) {
    throw new UsageError(`Solutions not found: ${location}`, { cause: error });
  }
  if (isDirectory) return DirectorySolutionSource.open(location, modelId);
  if (path.extname(location).toLowerCase() === '.json') return JsonSolutionSource.open(location, modelId);
  throw new UsageError(`Solutions must be a directory of patches or a .json file: ${location}`);
}
