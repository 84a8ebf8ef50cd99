export * from './html-generator';
export * from './format.utils';
