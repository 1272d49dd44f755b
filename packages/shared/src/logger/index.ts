import { ConsoleLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
import { CompositeLogger } from './compositeLogger';
import { MemoryLogger } from './memoryLogger';
export type { Logger, LogLevel, MaybePromise } from './types';
export type { MemoryLogEntry } from './memoryLogger';
export { ConsoleLogger, JsonlLogger, CompositeLogger, MemoryLogger };
