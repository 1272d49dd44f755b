export * from './stages/types';
export * from './stages/test-summary';
export * from './stages/verify';
export * from './stages/deploy';
export * from './stages/tests';
export * from './stages/scenario';
export * from './stages/tweak';
export * from './stages/registry';
export * from './scoring';
export * from './pipeline';
