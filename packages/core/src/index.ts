export * from './types';
export * from './errors';
export * from './constants';
export * from './utils';
export * from './schema';
export * from './expression';
export * from './dialect';
export * from './compiler';
export * from './validation';
export * from './execution';
export * from './result';
export * from './query';
