import type { HarnessEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout the harness.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ ...eventBase(runId), type: 'StageFinished', payload: { ... } });
 *
 * // Standard logging
 * logger.info('Provisioned environment');
 * logger.error(new Error('Failed'), 'Teardown failed');
 *
 * // Create a child logger with additional context
 * const attemptLogger = logger.child({ taskId: 'lead-routing-001' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured harness event.
   */
  log(event: HarnessEvent): MaybePromise<void>;

  /**
   * Structured event plus a human-readable summary.
   */
  trace(event: HarnessEvent, message: string): MaybePromise<void>;

  debug(message: string): MaybePromise<void>;
  info(message: string): MaybePromise<void>;
  warn(message: string): MaybePromise<void>;
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger whose messages carry these bindings as a `[k=v]` prefix.
   */
  child(bindings: Record<string, unknown>): Logger;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function formatBindings(bindings: Record<string, unknown>): string {
  return Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
}

export function withPrefix(bindings: Record<string, unknown>, message: string): string {
  const prefix = formatBindings(bindings);
  return prefix ? `[${prefix}] ${message}` : message;
}
