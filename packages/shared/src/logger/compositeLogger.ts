import type { HarnessEvent } from '../types/events';
import type { Logger } from './types';

/**
 * Fans every call out to each wrapped logger and waits for all of them.
 */
export class CompositeLogger implements Logger {
  constructor(private readonly loggers: Logger[]) {}

  async log(event: HarnessEvent): Promise<void> {
    await Promise.all(this.loggers.map((l) => l.log(event)));
  }

  async trace(event: HarnessEvent, message: string): Promise<void> {
    await Promise.all(this.loggers.map((l) => l.trace(event, message)));
  }

  async debug(message: string): Promise<void> {
    await Promise.all(this.loggers.map((l) => l.debug(message)));
  }

  async info(message: string): Promise<void> {
    await Promise.all(this.loggers.map((l) => l.info(message)));
  }

  async warn(message: string): Promise<void> {
    await Promise.all(this.loggers.map((l) => l.warn(message)));
  }

  async error(error: Error, message?: string): Promise<void> {
    await Promise.all(this.loggers.map((l) => l.error(error, message)));
  }

  child(bindings: Record<string, unknown>): Logger {
    return new CompositeLogger(this.loggers.map((l) => l.child(bindings)));
  }
}
