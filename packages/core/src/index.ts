export * from './config/loader';
export * from './tasks/loader';
export * from './solutions/sources';
export * from './checkpoint/store';
export * from './run/context';
export * from './run/failure';
export * from './run/attempt';
export * from './report/builder';
export * from './report/writer';
export * from './report/renderer';
export * from './evaluator';
