export * from './constants';
export * from './errors';
export * from './text.utils';
export * from './file.utils';
export * from './csv.utils';
