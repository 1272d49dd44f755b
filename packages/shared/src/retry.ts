import { setTimeout as delay } from 'node:timers/promises';
import { CancelledError } from './errors';
import type { RetryConfig } from './config/schema';

/**
 * Bounded retry with backoff.
 *
 * ## Delay Calculation
 *
 * ```
 * delay(attempt) = min(maxDelayMs, initialDelayMs * (backoffFactor ^ (attempt - 1)))
 * ```
 *
 * With the defaults (2000ms, factor 2, cap 8000ms) the schedule is 2s, 4s, 8s, 8s, ...
 * `delay(n)` is slept after the n-th failed attempt, so three attempts sleep 2s then 4s.
 *
 * No jitter is applied: the schedule is observable and asserted in tests.
 */
export interface RetryPolicy {
  maxAttempts: number;
  backoff: (attempt: number) => number;
  isTransient: (error: unknown) => boolean;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryInfo {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  signal?: AbortSignal;
  sleep?: Sleep;
  onRetry?: (info: RetryInfo) => void | Promise<void>;
}

/**
 * Thrown by {@link withRetry} once it stops trying.
 */
export class RetryExhaustedError extends Error {
  constructor(
    public readonly lastError: unknown,
    public readonly attempts: number,
    public readonly transient: boolean,
  ) {
    super(lastError instanceof Error ? lastError.message : String(lastError));
    this.name = 'RetryExhaustedError';
  }
}

export function exponentialBackoff(
  options: Pick<RetryConfig, 'initialDelayMs' | 'backoffFactor' | 'maxDelayMs'>,
): (attempt: number) => number {
  return (attempt) =>
    Math.min(
      options.maxDelayMs,
      options.initialDelayMs * Math.pow(options.backoffFactor, Math.max(0, attempt - 1)),
    );
}

export function policyFromConfig(
  config: RetryConfig,
  isTransient: (error: unknown) => boolean,
): RetryPolicy {
  return {
    maxAttempts: config.maxAttempts,
    backoff: exponentialBackoff(config),
    isTransient,
  };
}

export const abortableSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw new CancelledError('Cancelled while waiting to retry', { cause: error });
    }
    throw error;
  }
};

/**
 * Runs `fn` until it succeeds, a non-transient error is raised, or the policy runs out of attempts.
 * Cancellation is never retried.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<{ value: T; attempts: number }> {
  const sleep = options.sleep ?? abortableSleep;

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) {
      throw new CancelledError();
    }

    try {
      const value = await fn(attempt);
      return { value, attempts: attempt };
    } catch (error) {
      if (error instanceof CancelledError) throw error;

      const transient = policy.isTransient(error);
      if (!transient || attempt >= policy.maxAttempts) {
        throw new RetryExhaustedError(error, attempt, transient);
      }

      const delayMs = policy.backoff(attempt);
      await options.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs, options.signal);
    }
  }
}
