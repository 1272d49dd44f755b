import type { HarnessEvent } from '../types/events';
import type { Logger, LogLevel } from './types';
import { withPrefix } from './types';

export interface MemoryLogEntry {
  level: LogLevel;
  message: string;
}

/**
 * Keeps events and messages in memory. Children share their parent's buffers.
 */
export class MemoryLogger implements Logger {
  constructor(
    readonly events: HarnessEvent[] = [],
    readonly entries: MemoryLogEntry[] = [],
    private readonly bindings: Record<string, unknown> = {},
  ) {}

  log(event: HarnessEvent): void {
    this.events.push(event);
  }

  trace(event: HarnessEvent, message: string): void {
    this.events.push(event);
    this.push('info', message);
  }

  debug(message: string): void {
    this.push('debug', message);
  }

  info(message: string): void {
    this.push('info', message);
  }

  warn(message: string): void {
    this.push('warn', message);
  }

  error(error: Error, message?: string): void {
    this.push('error', message ? `${message}: ${error.message}` : error.message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new MemoryLogger(this.events, this.entries, { ...this.bindings, ...bindings });
  }

  /** Events of one type, narrowed */
  eventsOfType<T extends HarnessEvent['type']>(type: T): Extract<HarnessEvent, { type: T }>[] {
    return this.events.filter((e): e is Extract<HarnessEvent, { type: T }> => e.type === type);
  }

  private push(level: LogLevel, message: string): void {
    this.entries.push({ level, message: withPrefix(this.bindings, message) });
  }
}
