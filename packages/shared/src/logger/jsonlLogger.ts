import * as fs from 'fs/promises';
import { ensureDir } from 'fs-extra';
import { dirname } from 'path';
import type { HarnessEvent } from '../types/events';
import { redact } from '../redaction';
import type { Logger } from './types';

/**
 * Append-only JSON Lines trace. Writes from this logger and all of its children
 * share one queue, so lines never interleave.
 */
export class JsonlLogger implements Logger {
  private readonly sink: JsonlSink;

  constructor(
    filePath: string,
    private readonly bindings: Record<string, unknown> = {},
    sink?: JsonlSink,
  ) {
    this.sink = sink ?? new JsonlSink(filePath);
  }

  get filePath(): string {
    return this.sink.filePath;
  }

  log(event: HarnessEvent): Promise<void> {
    return this.sink.write(redact(event));
  }

  trace(event: HarnessEvent, _message: string): Promise<void> {
    return this.log(event);
  }

  debug(message: string): Promise<void> {
    return this.line('debug', message);
  }

  info(message: string): Promise<void> {
    return this.line('info', message);
  }

  warn(message: string): Promise<void> {
    return this.line('warn', message);
  }

  error(error: Error, message?: string): Promise<void> {
    return this.line('error', message ?? error.message, { error: error.message, name: error.name });
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.sink.filePath, { ...this.bindings, ...bindings }, this.sink);
  }

  /** Resolves once every queued line has been written. */
  flush(): Promise<void> {
    return this.sink.flush();
  }

  private line(level: string, message: string, extra: Record<string, unknown> = {}): Promise<void> {
    return this.sink.write(
      redact({
        timestamp: new Date().toISOString(),
        level,
        message,
        ...(Object.keys(this.bindings).length ? { bindings: this.bindings } : {}),
        ...extra,
      }),
    );
  }
}

class JsonlSink {
  private tail: Promise<void> = Promise.resolve();
  private dirReady?: Promise<void>;

  constructor(readonly filePath: string) {}

  write(record: unknown): Promise<void> {
    const line = JSON.stringify(record) + '\n';
    const next = this.tail.then(async () => {
      this.dirReady ??= ensureDir(dirname(this.filePath));
      await this.dirReady;
      await fs.appendFile(this.filePath, line, 'utf8');
    });
    // A failed append must not wedge the queue for later lines.
    this.tail = next.catch((error: unknown) => {
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    });
    return this.tail;
  }

  flush(): Promise<void> {
    return this.tail;
  }
}
