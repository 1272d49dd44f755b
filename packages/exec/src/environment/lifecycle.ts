import {
  CancelledError,
  EnvironmentUnavailableError,
  RetryExhaustedError,
  eventBase,
  policyFromConfig,
  redactString,
  toError,
  withRetry,
  type Logger,
  type RetryConfig,
  type RetryPolicy,
  type Sleep,
} from '@patchproof/shared';
import { ProvisionErrorClassifier, errorText } from '../classify/provision-errors';
import type { EnvironmentHandle, EnvironmentProvider, EnvironmentSpec } from './types';

export interface EnvironmentLifecycleOptions {
  provider: EnvironmentProvider;
  retry: RetryConfig;
  logger: Logger;
  runId: string;
  classifier?: ProvisionErrorClassifier;
  /** Replaces the real backoff sleep, e.g. in tests */
  sleep?: Sleep;
  destroyTimeoutMs?: number;
}

export interface ProvisionedEnvironment {
  handle: EnvironmentHandle;
  attempts: number;
}

function summarize(error: unknown): string {
  return redactString(errorText(error)).redacted.split('\n')[0];
}

/**
 * Creates environments with retry and guarantees each one is torn down once.
 *
 * `provision` is idempotent per alias and `destroy` per environment id: repeated calls return
 * the first call's outcome without touching the provider again.
 */
export class EnvironmentLifecycleManager {
  private readonly provider: EnvironmentProvider;
  private readonly logger: Logger;
  private readonly runId: string;
  private readonly classifier: ProvisionErrorClassifier;
  private readonly policy: RetryPolicy;
  private readonly sleep?: Sleep;
  private readonly destroyTimeoutMs?: number;

  private readonly provisions = new Map<string, Promise<ProvisionedEnvironment>>();
  private readonly teardowns = new Map<string, Promise<Error | undefined>>();

  constructor(options: EnvironmentLifecycleOptions) {
    this.provider = options.provider;
    this.logger = options.logger;
    this.runId = options.runId;
    this.classifier = options.classifier ?? new ProvisionErrorClassifier();
    this.policy = policyFromConfig(options.retry, (error) => this.classifier.isTransient(error));
    this.sleep = options.sleep;
    this.destroyTimeoutMs = options.destroyTimeoutMs;
  }

  provision(spec: EnvironmentSpec, signal?: AbortSignal): Promise<ProvisionedEnvironment> {
    const existing = this.provisions.get(spec.alias);
    if (existing) return existing;

    const pending = this.createWithRetry(spec, signal);
    this.provisions.set(spec.alias, pending);
    // A failed provision may be attempted again under the same alias.
    void pending.catch(() => this.provisions.delete(spec.alias));
    return pending;
  }

  private async createWithRetry(spec: EnvironmentSpec, signal?: AbortSignal): Promise<ProvisionedEnvironment> {
    try {
      const { value: handle, attempts } = await withRetry(
        () => this.provider.create(spec, { signal }),
        this.policy,
        {
          signal,
          sleep: this.sleep,
          onRetry: ({ attempt, delayMs, error }) =>
            this.logger.trace(
              {
                ...eventBase(this.runId),
                type: 'ProvisionRetryScheduled',
                payload: { operation: 'create', alias: spec.alias, attempt, delayMs, error: summarize(error) },
              },
              `Provisioning ${spec.alias} failed (attempt ${attempt}), retrying in ${delayMs}ms`,
            ),
        },
      );

      await this.logger.trace(
        {
          ...eventBase(this.runId),
          type: 'EnvironmentProvisioned',
          payload: { taskId: spec.taskId, envId: handle.envId, attempts },
        },
        `Provisioned ${handle.envId} for ${spec.taskId} after ${attempts} attempt(s)`,
      );
      return { handle, attempts };
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      if (!(error instanceof RetryExhaustedError)) throw error;

      const classification = this.classifier.classify(error.lastError);
      throw new EnvironmentUnavailableError(
        `Environment provisioning failed after ${error.attempts} attempt(s): ${summarize(error.lastError)}`,
        {
          kind: classification.kind,
          attempts: error.attempts,
          constraint: classification.kind === 'platform-constraint' ? classification.pattern : undefined,
          cause: error.lastError,
        },
      );
    }
  }

  /**
   * Tears the environment down, retrying transient failures. Never throws:
   * the final error, if any, is logged and returned.
   */
  destroy(handle: EnvironmentHandle): Promise<Error | undefined> {
    const existing = this.teardowns.get(handle.envId);
    if (existing) return existing;

    const pending = this.destroyWithRetry(handle);
    this.teardowns.set(handle.envId, pending);
    return pending;
  }

  private async destroyWithRetry(handle: EnvironmentHandle): Promise<Error | undefined> {
    try {
      // Not tied to the run signal; a cancelled attempt still tears down.
      await withRetry(
        () => this.provider.destroy(handle, { timeoutMs: this.destroyTimeoutMs }),
        this.policy,
        {
          sleep: this.sleep,
          onRetry: ({ attempt, delayMs, error }) =>
            this.logger.trace(
              {
                ...eventBase(this.runId),
                type: 'ProvisionRetryScheduled',
                payload: { operation: 'destroy', alias: handle.alias, attempt, delayMs, error: summarize(error) },
              },
              `Teardown of ${handle.envId} failed (attempt ${attempt}), retrying in ${delayMs}ms`,
            ),
        },
      );
      await this.logger.trace(
        { ...eventBase(this.runId), type: 'EnvironmentDestroyed', payload: { envId: handle.envId } },
        `Destroyed ${handle.envId}`,
      );
      return undefined;
    } catch (error) {
      const cause = toError(error instanceof RetryExhaustedError ? error.lastError : error);
      await this.logger.trace(
        {
          ...eventBase(this.runId),
          type: 'EnvironmentDestroyFailed',
          payload: { envId: handle.envId, error: summarize(cause) },
        },
        `Failed to destroy ${handle.envId}; it must be removed manually`,
      );
      return cause;
    }
  }

  /**
   * Runs `fn` against a freshly provisioned environment and destroys it afterwards,
   * whether `fn` returns, throws or is cancelled.
   */
  async withEnvironment<T>(
    spec: EnvironmentSpec,
    fn: (env: ProvisionedEnvironment) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const env = await this.provision(spec, signal);
    try {
      return await fn(env);
    } finally {
      await this.destroy(env.handle);
    }
  }

  /** Environment ids whose teardown has been requested, and whether it failed */
  async teardownSummary(): Promise<{ destroyed: string[]; failed: string[] }> {
    const destroyed: string[] = [];
    const failed: string[] = [];
    for (const [envId, pending] of this.teardowns) {
      ((await pending) ? failed : destroyed).push(envId);
    }
    return { destroyed, failed };
  }
}
