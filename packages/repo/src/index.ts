export * from './process';
export * from './git';
export * from './workspace';
export * from './patch/normalize';
export * from './patch/applier';
export * from './git/snapshot';
