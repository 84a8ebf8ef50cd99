export * from './cli.utils';
export * from './file-processor';
export * from './output';
export * from './analysis-runner';
export * from './main';
export * from './interactive';
