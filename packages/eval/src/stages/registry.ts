import { ConfigError, type StageKind } from '@patchproof/shared';
import { deployStage } from './deploy';
import { testsStage } from './tests';
import { bulkStage, functionalStage } from './scenario';
import { tweakStage } from './tweak';
import type { StageRunner } from './types';

/**
 * Maps a stage kind to the runner that executes it.
 */
export class StageRegistry {
  private readonly runners = new Map<StageKind, StageRunner>();

  register(runner: StageRunner): this {
    this.runners.set(runner.kind, runner);
    return this;
  }

  has(kind: StageKind): boolean {
    return this.runners.has(kind);
  }

  get(kind: StageKind): StageRunner {
    const runner = this.runners.get(kind);
    if (!runner) {
      throw new ConfigError(`No runner registered for stage "${kind}"`);
    }
    return runner;
  }
}

export function createDefaultRegistry(): StageRegistry {
  return new StageRegistry()
    .register(deployStage)
    .register(testsStage)
    .register(functionalStage)
    .register(bulkStage)
    .register(tweakStage);
}
