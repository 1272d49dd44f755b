import type { HarnessEvent } from '../types/events';
import { redactString } from '../redaction';
import { LOG_LEVEL_RANK, withPrefix, type LogLevel, type Logger } from './types';

/**
 * Human-facing logger on stderr/stdout. Structured events are only echoed at debug level.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly level: LogLevel = 'info',
    private readonly bindings: Record<string, unknown> = {},
  ) {}

  log(event: HarnessEvent): void {
    if (this.enabled('debug')) {
      console.debug(JSON.stringify(event));
    }
  }

  trace(event: HarnessEvent, message: string): void {
    if (this.enabled('debug')) {
      console.debug(this.format(message), JSON.stringify(event));
    } else {
      this.info(message);
    }
  }

  debug(message: string): void {
    if (this.enabled('debug')) console.debug(this.format(message));
  }

  info(message: string): void {
    if (this.enabled('info')) console.info(this.format(message));
  }

  warn(message: string): void {
    if (this.enabled('warn')) console.warn(this.format(message));
  }

  error(error: Error, message?: string): void {
    if (!this.enabled('error')) return;
    if (message) {
      console.error(this.format(message), redactString(error.message).redacted);
    } else {
      console.error(redactString(error.message).redacted);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ConsoleLogger(this.level, { ...this.bindings, ...bindings });
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVEL_RANK[level] >= LOG_LEVEL_RANK[this.level];
  }

  private format(message: string): string {
    return withPrefix(this.bindings, redactString(message).redacted);
  }
}
