export * from './classify/parser';
export * from './classify/types';
export * from './classify/provision-errors';
export * from './runner/runner';
export * from './environment/errors';
export * from './environment/types';
export * from './environment/template';
export * from './environment/cli-provider';
export * from './environment/lifecycle';
