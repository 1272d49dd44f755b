export const name = '@patchproof/shared';

export * from './types/events';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './retry';
export * from './hash';
export * from './json-utils';
export * from './fs/io';
export * from './fs/path';
export * from './config/schema';
export * from './eval';
