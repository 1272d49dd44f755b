import path from 'path';
import { remove } from 'fs-extra';
import { z } from 'zod';
import {
  AttemptResultSchema,
  CheckpointIntegrityError,
  atomicWriteJson,
  canonicalDigest,
  readJsonIfExists,
  type AttemptResult,
} from '@patchproof/shared';

export const CHECKPOINT_SCHEMA_VERSION = 1;
export const CHECKPOINT_FILE = 'checkpoint.json';

const CheckpointFileSchema = z.object({
  schemaVersion: z.literal(CHECKPOINT_SCHEMA_VERSION),
  runId: z.string(),
  configDigest: z.string(),
  completedTaskIds: z.array(z.string()),
  results: z.array(AttemptResultSchema),
  updatedAt: z.string(),
  digest: z.string(),
});

export type CheckpointFile = z.infer<typeof CheckpointFileSchema>;

type SealedFields = Pick<CheckpointFile, 'schemaVersion' | 'runId' | 'configDigest' | 'completedTaskIds' | 'results'>;

/**
 * Digest over everything a resume trusts: the configuration digest and every stored result.
 */
export function checkpointDigest(fields: SealedFields): string {
  // Hash the JSON form so keys holding undefined hash the same before and after a round trip
  return canonicalDigest(toJsonValue({
    schemaVersion: fields.schemaVersion,
    runId: fields.runId,
    configDigest: fields.configDigest,
    completedTaskIds: fields.completedTaskIds,
    results: fields.results,
  }));
}

function toJsonValue(value: unknown): unknown {
  const json: unknown = JSON.parse(JSON.stringify(value));
  return json;
}

export type CheckpointLoadResult =
  | { status: 'fresh'; completedTaskIds: []; results: [] }
  | { status: 'resumed'; completedTaskIds: string[]; results: AttemptResult[] }
  | { status: 'mismatch'; reason: string; completedTaskIds: []; results: [] };

export interface CheckpointSaveInfo {
  completedCount: number;
  digest: string;
}

export interface CheckpointStoreOptions {
  runDir: string;
  runId: string;
  configDigest: string;
}

/**
 * Durable record of finished attempts for one run.
 *
 * All saves go through one promise chain, so concurrent workers never interleave writes.
 * Each save rewrites the whole manifest atomically and reseals its digest.
 */
export class CheckpointStore {
  readonly filePath: string;
  private readonly runId: string;
  private readonly configDigest: string;
  private results: AttemptResult[] = [];
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: CheckpointStoreOptions) {
    this.filePath = path.join(options.runDir, CHECKPOINT_FILE);
    this.runId = options.runId;
    this.configDigest = options.configDigest;
  }

  /**
   * Reads the checkpoint and decides whether it can be trusted.
   * Only a `resumed` result seeds the store; anything else leaves it empty.
   */
  async load(): Promise<CheckpointLoadResult> {
    this.results = [];
    let raw: unknown;
    try {
      raw = await readJsonIfExists(this.filePath);
    } catch (error) {
      return this.mismatch(`unreadable checkpoint: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (raw === undefined) {
      return { status: 'fresh', completedTaskIds: [], results: [] };
    }

    const parsed = CheckpointFileSchema.safeParse(raw);
    if (!parsed.success) {
      return this.mismatch('checkpoint does not match the expected format');
    }
    const file = parsed.data;
    if (checkpointDigest(file) !== file.digest) {
      return this.mismatch('digest does not match checkpoint contents');
    }
    if (file.runId !== this.runId) {
      return this.mismatch(`checkpoint belongs to run ${file.runId}`);
    }
    if (file.configDigest !== this.configDigest) {
      return this.mismatch('run configuration changed since the checkpoint was written');
    }
    const ids = file.results.map((r) => r.taskId);
    if (ids.length !== file.completedTaskIds.length || ids.some((id, i) => id !== file.completedTaskIds[i])) {
      return this.mismatch('completed task list does not match stored results');
    }

    this.results = file.results;
    return { status: 'resumed', completedTaskIds: [...file.completedTaskIds], results: [...file.results] };
  }

  /**
   * Loads, and on a mismatch either discards the checkpoint or throws.
   */
  async open(onMismatch: 'restart' | 'abort'): Promise<CheckpointLoadResult> {
    const loaded = await this.load();
    if (loaded.status !== 'mismatch') return loaded;
    if (onMismatch === 'abort') {
      throw new CheckpointIntegrityError(`Refusing to resume from ${this.filePath}: ${loaded.reason}`);
    }
    await this.reset();
    return loaded;
  }

  async reset(): Promise<void> {
    await this.enqueue(async () => {
      this.results = [];
      await remove(this.filePath);
    });
  }

  save(result: AttemptResult): Promise<CheckpointSaveInfo> {
    return this.enqueue(() => this.write(result));
  }

  /** Resolves once every queued write has settled. */
  async flush(): Promise<void> {
    await this.queue;
  }

  private enqueue<T>(job: () => Promise<T>): Promise<T> {
    const next = this.queue.then(job);
    // A failed write must not block the ones queued behind it
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async write(result: AttemptResult): Promise<CheckpointSaveInfo> {
    const results = [...this.results.filter((r) => r.taskId !== result.taskId), result];
    const sealed: SealedFields = {
      schemaVersion: CHECKPOINT_SCHEMA_VERSION,
      runId: this.runId,
      configDigest: this.configDigest,
      completedTaskIds: results.map((r) => r.taskId),
      results,
    };
    const digest = checkpointDigest(sealed);
    const file: CheckpointFile = { ...sealed, updatedAt: new Date().toISOString(), digest };
    await atomicWriteJson(this.filePath, file);
    this.results = results;
    return { completedCount: results.length, digest };
  }

  private mismatch(reason: string): CheckpointLoadResult {
    return { status: 'mismatch', reason, completedTaskIds: [], results: [] };
  }
}
